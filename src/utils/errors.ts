/**
 * Error types and codes for layergate.
 * Every error the gate raises on purpose extends LayerGateError.
 */

/**
 * Base error class for all layergate errors.
 */
export class LayerGateError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LayerGateError';
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
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends LayerGateError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (file not found, parse errors, unwritable report).
 */
export class SystemError extends LayerGateError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

/**
 * Errors that abort a gate run before any finding is produced.
 */
export class GateError extends LayerGateError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'GateError';
  }
}

export const ErrorCodes = {
  ROOT_NOT_FOUND: 'G001',
  UNKNOWN_BINDING: 'G002',
  INVALID_OPTION: 'G003',
  CONFIG_LOAD_ERROR: 'C001',
  PARSE_ERROR: 'S001',
  REPORT_WRITE_ERROR: 'S002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Render any thrown value as a single-line message.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
