import { constants } from 'node:os';
import type { Launch } from '../launch/launch.js';
import { CoreError, CoreErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { OutputStreamMonitor } from './stream-monitor.js';
import {
  ProcessAttribute,
  type ExitStatus,
  type ManagedProcess,
  type ManagedProcessFactory,
  type ProcessAttributes,
  type RawProcess,
} from './types.js';

/**
 * Exit value for a process: its exit code, or 128 + signal number when a
 * signal ended it (the shell convention).
 */
export function exitValueOf(status: ExitStatus): number {
  if (status.code !== null) return status.code;
  if (status.signal !== null) return 128 + (constants.signals[status.signal] ?? 0);
  return 0;
}

export class RuntimeProcess implements ManagedProcess {
  private readonly output: OutputStreamMonitor;
  private readonly errors: OutputStreamMonitor;
  private readonly attributes: ProcessAttributes;
  private readonly terminationCallbacks = new Set<() => void>();
  private exitValue: number | undefined;

  constructor(
    private readonly launch: Launch,
    private readonly raw: RawProcess,
    private readonly label: string,
    attributes: ProcessAttributes
  ) {
    this.attributes = { ...attributes };
    this.output = new OutputStreamMonitor(raw.stdout, 'stdout');
    this.errors = new OutputStreamMonitor(raw.stderr, 'stderr');
    void raw.exited.then(
      (status) => this.markTerminated(exitValueOf(status)),
      (err: unknown) => {
        logger.error({ err, pid: raw.pid }, 'Lost track of process exit');
        this.markTerminated(-1);
      }
    );
  }

  isTerminated(): boolean {
    return this.exitValue !== undefined;
  }

  terminate(): void {
    if (this.isTerminated()) return;
    if (!this.raw.kill('SIGTERM')) {
      logger.warn({ pid: this.raw.pid, label: this.label }, 'Process did not accept the termination signal');
    }
  }

  getExitValue(): number {
    if (this.exitValue === undefined) {
      throw new CoreError(CoreErrorCode.PROCESS_NOT_TERMINATED, `Process ${this.label} has not terminated`, {
        context: { pid: this.raw.pid },
      });
    }
    return this.exitValue;
  }

  getOutputStream(): OutputStreamMonitor {
    return this.output;
  }

  getErrorStream(): OutputStreamMonitor {
    return this.errors;
  }

  getLabel(): string {
    return this.attributes[ProcessAttribute.PROCESS_LABEL] ?? this.label;
  }

  getAttribute(key: string): string | undefined {
    return this.attributes[key];
  }

  getLaunch(): Launch {
    return this.launch;
  }

  getPid(): number | undefined {
    return this.raw.pid;
  }

  write(input: string): void {
    const stdin = this.raw.stdin;
    if (!stdin || stdin.writableEnded) {
      throw new CoreError(CoreErrorCode.INPUT_CLOSED, `Input of ${this.label} is closed`, {
        severity: 'warning',
        context: { pid: this.raw.pid },
      });
    }
    stdin.write(input);
  }

  closeInput(): void {
    this.raw.stdin?.end();
  }

  onTerminated(callback: () => void): () => void {
    if (this.isTerminated()) {
      callback();
      return () => undefined;
    }
    this.terminationCallbacks.add(callback);
    return () => {
      this.terminationCallbacks.delete(callback);
    };
  }

  private markTerminated(value: number): void {
    this.exitValue = value;
    for (const callback of [...this.terminationCallbacks]) callback();
    this.terminationCallbacks.clear();
    this.launch.processTerminated(this);
  }
}

export const runtimeProcessFactory: ManagedProcessFactory = {
  wrap(launch, raw, label, attributes) {
    const prcs = new RuntimeProcess(launch, raw, label, attributes);
    launch.addProcess(prcs);
    return prcs;
  },
};
