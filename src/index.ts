export { parseArguments, renderCommandLine } from './shared/command-line.js';
export { CoreError, CoreErrorCode, InvalidArgumentError, type Severity } from './shared/errors.js';
export { logger, createTraceSink, type TraceSink, type TraceLevel } from './shared/logger.js';
export { ExecaProcessPrimitive, DEFAULT_DRAIN_TIMEOUT_MS, type ExecaPrimitiveOptions } from './shared/exec.js';
export { loadLauncherConfig, DEFAULT_CONFIG_PATH, type ConfigResult } from './config/loader.js';
export { DEFAULT_LAUNCHER_CONFIG, LauncherConfigSchema, type LauncherConfig } from './types/config.js';
export {
  ProcessAttribute,
  type ExitStatus,
  type ManagedProcess,
  type ManagedProcessFactory,
  type ProcessAttributes,
  type ProcessPrimitive,
  type RawProcess,
  type StreamListener,
  type StreamMonitor,
} from './process/types.js';
export { OutputStreamMonitor } from './process/stream-monitor.js';
export { RuntimeProcess, runtimeProcessFactory, exitValueOf } from './process/runtime-process.js';
export { Launch, type LaunchMode } from './launch/launch.js';
export {
  InMemoryLaunchRegistry,
  defaultLaunchRegistry,
  type InMemoryLaunchRegistryOptions,
  type LaunchRegistry,
  type LaunchRegistryEvent,
  type LaunchRegistryListener,
} from './launch/registry.js';
export { StaticLaunchConfiguration, LaunchAttribute, type StaticLaunchAttributes } from './launch/configuration.js';
export { NULL_PROGRESS_MONITOR, CancellableProgressMonitor, progressMonitorFromSignal } from './launch/monitor.js';
export type { LaunchConfiguration, ProgressMonitor } from './launch/types.js';
export { tracingListener } from './launcher/tracing-listener.js';
export { waitForTermination, waitForExit, type WaitOutcome, type WaitOptions } from './launcher/wait.js';
export {
  ExternalProcessLauncher,
  type AsyncLaunchOptions,
  type CommandInput,
  type LaunchOptions,
  type LauncherDependencies,
} from './launcher/external-process-launcher.js';
