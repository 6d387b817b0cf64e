import { z } from 'zod';

/** Longest wait between two checks when a process or monitor has no event hook. */
export const MAX_POLL_INTERVAL_MS = 1000;

export const LauncherConfigSchema = z.object({
  /** Wrap stream listeners in tracing decorators and trace every output chunk. */
  debug: z.boolean(),
  pollIntervalMs: z.number().int().positive().max(MAX_POLL_INTERVAL_MS),
  /** How long launchSync waits for a cancelled process to exit before giving up. */
  terminateTimeoutMs: z.number().int().nonnegative(),
  /** SIGTERM is followed by SIGKILL after this delay; 0 disables the escalation. */
  forceKillAfterMs: z.number().int().nonnegative(),
});

export type LauncherConfig = z.infer<typeof LauncherConfigSchema>;

export const DEFAULT_LAUNCHER_CONFIG: LauncherConfig = {
  debug: false,
  pollIntervalMs: 50,
  terminateTimeoutMs: 5000,
  forceKillAfterMs: 2000,
};
