export enum GrassErrorCode {
  CONFIG_INVALID = 'CONFIG_INVALID',
  CONFIG_NOT_FOUND = 'CONFIG_NOT_FOUND',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  SESSION_NOT_ACTIVE = 'SESSION_NOT_ACTIVE',
  SESSION_ALREADY_ALLOCATED = 'SESSION_ALREADY_ALLOCATED',
  SESSION_CLOSED = 'SESSION_CLOSED',
  UNKNOWN_LOCAL = 'UNKNOWN_LOCAL',
  COMMAND_LAUNCH_FAILED = 'COMMAND_LAUNCH_FAILED',
  COMMAND_FAILED = 'COMMAND_FAILED',
}

export class GrassError extends Error {
  readonly code: GrassErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: GrassErrorCode, message: string, context?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, options);
    this.name = 'GrassError';
    this.code = code;
    this.context = context;
  }
}

export function isGrassError(err: unknown, code?: GrassErrorCode): err is GrassError {
  return err instanceof GrassError && (code === undefined || err.code === code);
}
