import type { ManagedProcess } from '../process/types.js';
import type { LaunchConfiguration } from './types.js';

export type LaunchMode = 'run';

/** One launch and the processes it started. */
export class Launch {
  private readonly processes: ManagedProcess[] = [];
  private readonly terminateListeners = new Set<(launch: Launch) => void>();

  constructor(
    readonly configuration: LaunchConfiguration | undefined,
    readonly mode: LaunchMode = 'run'
  ) {}

  addProcess(prcs: ManagedProcess): void {
    if (!this.processes.includes(prcs)) this.processes.push(prcs);
  }

  getProcesses(): readonly ManagedProcess[] {
    return [...this.processes];
  }

  /** A launch with no processes yet counts as running. */
  isTerminated(): boolean {
    return this.processes.length > 0 && this.processes.every((p) => p.isTerminated());
  }

  terminate(): void {
    for (const prcs of this.processes) prcs.terminate();
  }

  onTerminated(listener: (launch: Launch) => void): () => void {
    this.terminateListeners.add(listener);
    return () => {
      this.terminateListeners.delete(listener);
    };
  }

  /** Called by processes of this launch as they exit. */
  processTerminated(prcs: ManagedProcess): void {
    if (!this.processes.includes(prcs) || !this.isTerminated()) return;
    for (const listener of [...this.terminateListeners]) listener(this);
  }
}
