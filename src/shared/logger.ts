import pino from 'pino';
import type { Logger } from 'pino';

export const logger = pino({
  name: 'proc-launch',
  level: process.env['PROC_LAUNCH_LOG_LEVEL'] ?? 'info',
  transport:
    process.env['NODE_ENV'] === 'development'
      ? { target: 'pino/file', options: { destination: 2 } }
      : undefined,
});

export type TraceLevel = 'info' | 'warn' | 'error';

/** Diagnostic output for launches. Implementations must not throw. */
export interface TraceSink {
  trace(message: string): void;
  log(level: TraceLevel, message: string, error?: unknown): void;
}

export function createTraceSink(target: Logger = logger): TraceSink {
  return {
    trace(message) {
      target.debug(message);
    },
    log(level, message, error) {
      if (error === undefined) {
        target[level](message);
      } else {
        target[level]({ err: error }, message);
      }
    },
  };
}
