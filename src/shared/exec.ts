import execa, { type ExecaChildProcess } from 'execa';
import type { ExitStatus, ProcessPrimitive, RawProcess } from '../process/types.js';
import { CoreError, CoreErrorCode, errorMessage } from './errors.js';

export interface ExecaPrimitiveOptions {
  /** Delay before a SIGTERM that was not honoured turns into SIGKILL; 0 disables it. */
  forceKillAfterMs?: number;
  /**
   * How long to wait after exit for the output pipes to close. A background
   * child that inherited them can keep them open long after the exit.
   */
  drainTimeoutMs?: number;
}

export const DEFAULT_DRAIN_TIMEOUT_MS = 200;

/**
 * Spawns processes through execa with output left as streams (no buffering,
 * no rejection on non-zero exit) so that the launcher's stream monitors see
 * every chunk as it arrives.
 */
export class ExecaProcessPrimitive implements ProcessPrimitive {
  constructor(private readonly options: ExecaPrimitiveOptions = {}) {}

  async spawn(argv: readonly string[], cwd?: string, env?: Record<string, string>): Promise<RawProcess> {
    const [file, ...args] = argv;
    let child: ExecaChildProcess;
    try {
      child = execa(file, args, {
        cwd,
        env,
        // A supplied environment is the complete environment of the child
        extendEnv: env === undefined,
        reject: false,
        buffer: false,
        stdin: 'pipe',
        windowsHide: true,
      });
    } catch (err) {
      throw spawnFailed(argv, cwd, err);
    }

    try {
      await new Promise<void>((resolve, reject) => {
        child.once('spawn', () => resolve());
        child.once('error', reject);
        // execa rejects its own promise when spawning throws synchronously
        void child.catch(reject);
      });
    } catch (err) {
      throw spawnFailed(argv, cwd, err);
    }

    const drainTimeoutMs = this.options.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS;
    const exitedAndDrained = new Promise<ExitStatus>((resolve) => {
      child.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
        const status: ExitStatus = { code, signal };
        const timer = setTimeout(() => resolve(status), drainTimeoutMs);
        child.once('close', () => {
          clearTimeout(timer);
          resolve(status);
        });
      });
    });
    const forceKillAfterMs = this.options.forceKillAfterMs ?? 0;

    return {
      pid: child.pid,
      stdout: child.stdout,
      stderr: child.stderr,
      stdin: child.stdin,
      // execa settles on exit; the pipes get at most drainTimeoutMs more
      exited: child.then(() => exitedAndDrained),
      kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
        child.kill(signal, { forceKillAfterTimeout: forceKillAfterMs > 0 ? forceKillAfterMs : false });
        return child.killed;
      },
    };
  }
}

function spawnFailed(argv: readonly string[], cwd: string | undefined, err: unknown): CoreError {
  return new CoreError(CoreErrorCode.SPAWN_FAILED, `Command failed to spawn: ${argv[0]}: ${errorMessage(err)}`, {
    context: { argv: [...argv], cwd },
    cause: err,
  });
}
