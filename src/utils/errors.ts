/**
 * @arch depsum.common.errors
 *
 * Error types and codes for depsum.
 * Every error raised on purpose extends DepsumError.
 */

/**
 * Base error class for all depsum errors.
 */
export class DepsumError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DepsumError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration errors (loading, parsing, validation).
 */
export class ConfigError extends DepsumError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (unreadable files, failed writes, parse errors).
 * Error codes: S001-S003
 */
export class SystemError extends DepsumError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // System errors (S001-S003)
  PARSE_ERROR: 'S001',
  READ_ERROR: 'S002',
  WRITE_ERROR: 'S003',

  // Config errors
  CONFIG_LOAD_ERROR: 'CONFIG_LOAD_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Extract a message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
