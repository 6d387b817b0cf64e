import type { ProgressMonitor } from './types.js';

/** Never cancelled. Stands in when a caller passes no monitor. */
export const NULL_PROGRESS_MONITOR: ProgressMonitor = {
  isCanceled: () => false,
  onCancel: () => () => undefined,
};

export class CancellableProgressMonitor implements ProgressMonitor {
  private canceled = false;
  private readonly callbacks = new Set<() => void>();

  cancel(): void {
    if (this.canceled) return;
    this.canceled = true;
    for (const callback of [...this.callbacks]) callback();
    this.callbacks.clear();
  }

  isCanceled(): boolean {
    return this.canceled;
  }

  onCancel(callback: () => void): () => void {
    if (this.canceled) {
      callback();
      return () => undefined;
    }
    this.callbacks.add(callback);
    return () => {
      this.callbacks.delete(callback);
    };
  }
}

export function progressMonitorFromSignal(signal: AbortSignal): ProgressMonitor {
  return {
    isCanceled: () => signal.aborted,
    onCancel(callback) {
      if (signal.aborted) {
        callback();
        return () => undefined;
      }
      signal.addEventListener('abort', callback, { once: true });
      return () => signal.removeEventListener('abort', callback);
    },
  };
}
