export enum CoreErrorCode {
  ENVIRONMENT_RESOLUTION_FAILED = 'ENVIRONMENT_RESOLUTION_FAILED',
  SPAWN_FAILED = 'SPAWN_FAILED',
  PROCESS_NOT_TERMINATED = 'PROCESS_NOT_TERMINATED',
  INPUT_CLOSED = 'INPUT_CLOSED',
  CONFIG_INVALID = 'CONFIG_INVALID',
}

export type Severity = 'info' | 'warning' | 'error';

/** Operational failure: spawn errors, environment resolution, exit-value reads on live processes. */
export class CoreError extends Error {
  readonly code: CoreErrorCode;
  readonly severity: Severity;
  readonly context?: Record<string, unknown>;

  constructor(
    code: CoreErrorCode,
    message: string,
    options?: { severity?: Severity; context?: Record<string, unknown>; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'CoreError';
    this.code = code;
    this.severity = options?.severity ?? 'error';
    this.context = options?.context;
  }
}

/** Caller mistakes caught before any I/O happens. Never wrapped. */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
