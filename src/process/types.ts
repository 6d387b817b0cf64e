import type { Readable, Writable } from 'node:stream';
import type { Launch } from '../launch/launch.js';

/** Attribute keys recorded on every managed process. */
export const ProcessAttribute = {
  PROCESS_TYPE: 'process.type',
  CMDLINE: 'process.cmdline',
  PROCESS_LABEL: 'process.label',
} as const;

export type ProcessAttributes = Record<string, string>;

export interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

/** A spawned OS process, before the launcher wraps it. */
export interface RawProcess {
  readonly pid: number | undefined;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly stdin: Writable | null;
  /**
   * Settles once the process has exited and its output pipes have closed,
   * or shortly after the exit when a background child still holds them open.
   * Output written after that keeps reaching the streams until they close.
   */
  readonly exited: Promise<ExitStatus>;
  kill(signal?: NodeJS.Signals): boolean;
}

/** Creates OS processes. Rejects when the OS refuses the launch. */
export interface ProcessPrimitive {
  spawn(argv: readonly string[], cwd?: string, env?: Record<string, string>): Promise<RawProcess>;
}

export type StreamListener = (text: string, monitor: StreamMonitor) => void;

export interface StreamMonitor {
  addListener(listener: StreamListener): void;
  removeListener(listener: StreamListener): void;
  /** Everything received so far, unless buffering was switched off or flushed. */
  getContents(): string;
  flushContents(): void;
  setBuffered(buffered: boolean): void;
  isBuffered(): boolean;
}

export interface ManagedProcess {
  isTerminated(): boolean;
  terminate(): void;
  /** Throws CoreError(PROCESS_NOT_TERMINATED) while the process runs. */
  getExitValue(): number;
  getOutputStream(): StreamMonitor;
  getErrorStream(): StreamMonitor;
  getLabel(): string;
  getAttribute(key: string): string | undefined;
  getLaunch(): Launch;
  write(input: string): void;
  closeInput(): void;
  /**
   * Native termination hook. Wrappers that cannot offer one leave it out and
   * the launcher falls back to polling isTerminated().
   */
  onTerminated?(callback: () => void): () => void;
}

export interface ManagedProcessFactory {
  wrap(launch: Launch, raw: RawProcess, label: string, attributes: ProcessAttributes): ManagedProcess;
}
