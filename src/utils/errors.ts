export enum ConsoleErrorCode {
  AUTH_ERROR = 'AUTH_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  COMMAND_FAILURE = 'COMMAND_FAILURE',
  LOG_ERROR = 'LOG_ERROR',
}

/** Fatal console failure. Anything recoverable is logged instead of thrown. */
export class ConsoleError extends Error {
  readonly code: ConsoleErrorCode;
  readonly context?: Record<string, string>;

  constructor(code: ConsoleErrorCode, message: string, context?: Record<string, string>) {
    super(message);
    this.name = 'ConsoleError';
    this.code = code;
    this.context = context;
  }
}

export function isConsoleError(err: unknown): err is ConsoleError {
  return err instanceof ConsoleError;
}

/** The message followed by any context, e.g. "Failed to pull or build images. (build: failed with exit code 1)". */
export function formatConsoleError(err: ConsoleError): string {
  const details = Object.entries(err.context ?? {}).map(([key, value]) => `${key}: ${value}`);
  return details.length > 0 ? `${err.message} (${details.join(', ')})` : err.message;
}
