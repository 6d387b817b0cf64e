import { MAX_POLL_INTERVAL_MS } from '../types/config.js';
import type { ProgressMonitor } from '../launch/types.js';
import type { ManagedProcess } from '../process/types.js';

export type WaitOutcome = 'terminated' | 'canceled';

export interface WaitOptions {
  pollIntervalMs: number;
}

/**
 * Resolve when the process terminates, or terminate it and resolve as soon
 * as the monitor reports cancellation. Uses the process's and the monitor's
 * event hooks where they exist and polls at pollIntervalMs for whichever
 * side has none.
 */
export function waitForTermination(
  prcs: ManagedProcess,
  monitor: ProgressMonitor,
  options: WaitOptions
): Promise<WaitOutcome> {
  if (prcs.isTerminated()) return Promise.resolve('terminated');
  if (monitor.isCanceled()) {
    prcs.terminate();
    return Promise.resolve('canceled');
  }

  const interval = Math.min(Math.max(1, options.pollIntervalMs), MAX_POLL_INTERVAL_MS);

  return new Promise<WaitOutcome>((resolve) => {
    const cleanups: Array<() => void> = [];
    let settled = false;

    const finish = (outcome: WaitOutcome) => {
      if (settled) return;
      settled = true;
      for (const cleanup of cleanups) cleanup();
      if (outcome === 'canceled') prcs.terminate();
      resolve(outcome);
    };

    if (prcs.onTerminated) cleanups.push(prcs.onTerminated(() => finish('terminated')));
    if (!settled && monitor.onCancel) cleanups.push(monitor.onCancel(() => finish('canceled')));

    if (!settled && (!prcs.onTerminated || !monitor.onCancel)) {
      const timer = setInterval(() => {
        if (prcs.isTerminated()) finish('terminated');
        else if (monitor.isCanceled()) finish('canceled');
      }, interval);
      cleanups.push(() => clearInterval(timer));
    }
  });
}

/** Resolve true once the process has terminated, false if timeoutMs passes first. */
export function waitForExit(prcs: ManagedProcess, timeoutMs: number, pollIntervalMs: number): Promise<boolean> {
  if (prcs.isTerminated()) return Promise.resolve(true);
  if (timeoutMs <= 0) return Promise.resolve(false);

  return new Promise<boolean>((resolve) => {
    const cleanups: Array<() => void> = [];
    const finish = (terminated: boolean) => {
      for (const cleanup of cleanups) cleanup();
      resolve(terminated);
    };

    const deadline = setTimeout(() => finish(prcs.isTerminated()), timeoutMs);
    cleanups.push(() => clearTimeout(deadline));

    if (prcs.onTerminated) {
      cleanups.push(prcs.onTerminated(() => finish(true)));
    } else {
      const interval = Math.min(Math.max(1, pollIntervalMs), MAX_POLL_INTERVAL_MS);
      const timer = setInterval(() => {
        if (prcs.isTerminated()) finish(true);
      }, interval);
      cleanups.push(() => clearInterval(timer));
    }
  });
}
