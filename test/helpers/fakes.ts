import { PassThrough } from 'stream';
import type { TraceLevel, TraceSink } from '../../src/shared/logger.js';
import type { ExitStatus, ProcessPrimitive, RawProcess } from '../../src/process/types.js';

/** Let pending stream events, timers and promise reactions run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export class FakeRawProcess implements RawProcess {
  readonly pid = 4242;
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly stdin = new PassThrough();
  readonly exited: Promise<ExitStatus>;
  readonly kills: NodeJS.Signals[] = [];
  private settle: (status: ExitStatus) => void = () => undefined;

  /** exitOnKill false models a process that ignores SIGTERM. */
  constructor(private readonly exitOnKill = true) {
    this.exited = new Promise<ExitStatus>((resolve) => {
      this.settle = resolve;
    });
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    this.stdout.end();
    this.stderr.end();
    this.settle({ code, signal });
  }

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.kills.push(signal);
    if (this.exitOnKill) this.exit(null, signal);
    return true;
  }
}

export interface SpawnCall {
  argv: string[];
  cwd?: string;
  env?: Record<string, string>;
}

export class FakeProcessPrimitive implements ProcessPrimitive {
  readonly calls: SpawnCall[] = [];
  readonly spawned: FakeRawProcess[] = [];

  constructor(
    private readonly onSpawn: (raw: FakeRawProcess) => void = () => undefined,
    private readonly exitOnKill = true
  ) {}

  async spawn(argv: readonly string[], cwd?: string, env?: Record<string, string>): Promise<RawProcess> {
    this.calls.push({ argv: [...argv], cwd, env });
    const raw = new FakeRawProcess(this.exitOnKill);
    this.spawned.push(raw);
    this.onSpawn(raw);
    return raw;
  }
}

export class RecordingTraceSink implements TraceSink {
  readonly traces: string[] = [];
  readonly logs: Array<{ level: TraceLevel; message: string; error?: unknown }> = [];

  trace(message: string): void {
    this.traces.push(message);
  }

  log(level: TraceLevel, message: string, error?: unknown): void {
    this.logs.push({ level, message, error });
  }
}
