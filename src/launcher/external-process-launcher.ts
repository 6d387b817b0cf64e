import fs from 'fs/promises';
import { parseArguments, renderCommandLine } from '../shared/command-line.js';
import { CoreError, CoreErrorCode, InvalidArgumentError, errorMessage } from '../shared/errors.js';
import { createTraceSink, type TraceLevel, type TraceSink } from '../shared/logger.js';
import { ExecaProcessPrimitive } from '../shared/exec.js';
import { loadLauncherConfig } from '../config/loader.js';
import { DEFAULT_LAUNCHER_CONFIG, LauncherConfigSchema, type LauncherConfig } from '../types/config.js';
import { Launch } from '../launch/launch.js';
import { NULL_PROGRESS_MONITOR } from '../launch/monitor.js';
import { defaultLaunchRegistry, type LaunchRegistry } from '../launch/registry.js';
import type { LaunchConfiguration, ProgressMonitor } from '../launch/types.js';
import { runtimeProcessFactory } from '../process/runtime-process.js';
import {
  ProcessAttribute,
  type ManagedProcess,
  type ManagedProcessFactory,
  type ProcessAttributes,
  type ProcessPrimitive,
  type RawProcess,
  type StreamListener,
  type StreamMonitor,
} from '../process/types.js';
import { tracingListener } from './tracing-listener.js';
import { waitForExit, waitForTermination } from './wait.js';

/** An argument array, or a command line that is split with parseArguments first. */
export type CommandInput = readonly string[] | string;

export interface LaunchOptions {
  /** Defaults to the launcher's own working directory. */
  workingDirectory?: string;
  outputListener?: StreamListener;
  errorListener?: StreamListener;
  /** Complete environment for the child; replaces the inherited one. */
  env?: Record<string, string>;
  /** Defaults to a monitor that is never cancelled. */
  monitor?: ProgressMonitor;
  /** Source of the environment (when env is absent) and of the process label. */
  launchConfiguration?: LaunchConfiguration;
}

export type AsyncLaunchOptions = Pick<LaunchOptions, 'workingDirectory' | 'outputListener' | 'errorListener' | 'env'>;

export interface LauncherDependencies {
  primitive?: ProcessPrimitive;
  processFactory?: ManagedProcessFactory;
  registry?: LaunchRegistry;
  traceSink?: TraceSink;
}

export class ExternalProcessLauncher {
  readonly config: LauncherConfig;
  private readonly primitive: ProcessPrimitive;
  private readonly processFactory: ManagedProcessFactory;
  private readonly registry: LaunchRegistry;
  private readonly sink: TraceSink;

  constructor(config: Partial<LauncherConfig> = {}, deps: LauncherDependencies = {}) {
    const parsed = LauncherConfigSchema.safeParse({ ...DEFAULT_LAUNCHER_CONFIG, ...config });
    if (!parsed.success) {
      throw new CoreError(CoreErrorCode.CONFIG_INVALID, `Invalid launcher config: ${parsed.error.issues[0]?.message}`, {
        context: { issues: parsed.error.issues },
      });
    }
    this.config = parsed.data;
    this.primitive = deps.primitive ?? new ExecaProcessPrimitive({ forceKillAfterMs: this.config.forceKillAfterMs });
    this.processFactory = deps.processFactory ?? runtimeProcessFactory;
    this.registry = deps.registry ?? defaultLaunchRegistry;
    this.sink = deps.traceSink ?? createTraceSink();
  }

  /** Build a launcher from the YAML config file and PROC_LAUNCH_* variables. */
  static fromConfigFile(configPath?: string, deps: LauncherDependencies = {}): ExternalProcessLauncher {
    return new ExternalProcessLauncher(loadLauncherConfig(configPath).config, deps);
  }

  /**
   * Start the command and return once it is running. Output reaches the
   * listeners for as long as the process lives.
   */
  async launchAsync(command: CommandInput | null | undefined, options: AsyncLaunchOptions = {}): Promise<void> {
    const argv = toCommand(command);
    this.trace(`Async Execute command line: ${formatCommand(argv)}`);
    await this.launch(argv, {
      workingDirectory: options.workingDirectory,
      outputListener: options.outputListener,
      errorListener: options.errorListener,
      env: options.env,
    });
  }

  /**
   * Start the command and resolve with its exit code once it has terminated.
   * Resolves 0 without running anything when the monitor is already cancelled,
   * which callers cannot tell apart from a clean exit.
   */
  async launchSync(command: CommandInput | null | undefined, options: LaunchOptions = {}): Promise<number> {
    const argv = toCommand(command);
    const monitor = options.monitor ?? NULL_PROGRESS_MONITOR;
    this.trace(`Sync Execute command line: ${formatCommand(argv)}`);

    const prcs = await this.launch(argv, { ...options, monitor });
    if (!prcs) return 0;

    const outcome = await waitForTermination(prcs, monitor, { pollIntervalMs: this.config.pollIntervalMs });
    if (outcome === 'canceled') {
      const exited = await waitForExit(prcs, this.config.terminateTimeoutMs, this.config.pollIntervalMs);
      if (!exited) {
        this.log('warn', `${prcs.getLabel()} still running ${this.config.terminateTimeoutMs}ms after cancellation`);
      }
    }
    return prcs.getExitValue();
  }

  /**
   * Spawn the command and hand back its managed process, or undefined when
   * the monitor was cancelled before anything was spawned.
   */
  async launch(
    command: readonly string[] | null | undefined,
    options: LaunchOptions = {}
  ): Promise<ManagedProcess | undefined> {
    if (!command || command.length < 1) {
      throw new InvalidArgumentError('Empty commands array');
    }
    await checkWorkingDirectory(options.workingDirectory);

    const monitor = options.monitor ?? NULL_PROGRESS_MONITOR;
    const configuration = options.launchConfiguration;
    let env = options.env;
    if (env === undefined && configuration !== undefined) {
      env = await resolveEnvironment(configuration);
    }
    if (monitor.isCanceled()) {
      return undefined;
    }

    let raw: RawProcess;
    try {
      raw = await this.primitive.spawn(command, options.workingDirectory, env);
    } catch (err) {
      if (err instanceof CoreError) throw err;
      throw new CoreError(CoreErrorCode.SPAWN_FAILED, `Command failed to spawn: ${command[0]}: ${errorMessage(err)}`, {
        context: { argv: [...command], cwd: options.workingDirectory },
        cause: err,
      });
    }

    const attributes = processAttributes(command, configuration);
    const launch = new Launch(configuration, 'run');
    const prcs = this.processFactory.wrap(launch, raw, command[0], attributes);
    this.attachListeners(command, prcs, options.outputListener, options.errorListener);
    this.registry.addLaunch(launch);
    return prcs;
  }

  private attachListeners(
    command: readonly string[],
    prcs: ManagedProcess,
    outputListener: StreamListener | undefined,
    errorListener: StreamListener | undefined
  ): void {
    if (this.config.debug) {
      this.trace(`Creating tracing stream listeners for ${formatCommand(command)}`);
      outputListener = tracingListener(this.sink, 'stdout', outputListener);
      errorListener = tracingListener(this.sink, 'stderr', errorListener);
    }

    if (outputListener) this.attach(outputListener, prcs.getOutputStream());
    if (errorListener) this.attach(errorListener, prcs.getErrorStream());
  }

  /** Output written between spawn and attachment is replayed from the buffer. */
  private attach(listener: StreamListener, monitor: StreamMonitor): void {
    monitor.addListener(listener);
    const contents = monitor.getContents();
    if (contents.length === 0) return;
    try {
      listener(contents, monitor);
    } catch (err) {
      this.log('warn', 'Stream listener failed while replaying buffered output', err);
    }
  }

  private trace(message: string): void {
    try {
      this.sink.trace(message);
    } catch (err) {
      process.stderr.write(`[proc-launch] trace sink failed: ${errorMessage(err)}\n`);
    }
  }

  private log(level: TraceLevel, message: string, error?: unknown): void {
    try {
      this.sink.log(level, message, error);
    } catch (err) {
      process.stderr.write(`[proc-launch] trace sink failed: ${errorMessage(err)}\n`);
    }
  }
}

function toCommand(command: CommandInput | null | undefined): readonly string[] {
  if (typeof command === 'string') return parseArguments(command);
  if (!command || command.length < 1) throw new InvalidArgumentError('Empty commands array');
  return command;
}

function formatCommand(command: readonly string[]): string {
  return `[${command.join(', ')}]`;
}

async function checkWorkingDirectory(workingDirectory: string | undefined): Promise<void> {
  if (workingDirectory === undefined) return;
  const stat = await fs.stat(workingDirectory).catch(() => undefined);
  if (!stat?.isDirectory()) {
    throw new InvalidArgumentError(`${workingDirectory} is not a valid directory`);
  }
}

async function resolveEnvironment(configuration: LaunchConfiguration): Promise<Record<string, string> | undefined> {
  try {
    return await configuration.resolveEnvironment();
  } catch (err) {
    if (err instanceof CoreError) throw err;
    throw new CoreError(
      CoreErrorCode.ENVIRONMENT_RESOLUTION_FAILED,
      `Cannot resolve environment of launch configuration ${configuration.name}: ${errorMessage(err)}`,
      { context: { configuration: configuration.name }, cause: err }
    );
  }
}

function processAttributes(
  command: readonly string[],
  configuration: LaunchConfiguration | undefined
): ProcessAttributes {
  const attributes: ProcessAttributes = {
    [ProcessAttribute.PROCESS_TYPE]: command[0],
    [ProcessAttribute.CMDLINE]: renderCommandLine(command),
  };
  if (configuration) {
    attributes[ProcessAttribute.PROCESS_LABEL] = configuration.getAttribute(ProcessAttribute.PROCESS_LABEL, command[0]);
  }
  return attributes;
}
