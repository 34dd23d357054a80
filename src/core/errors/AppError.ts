/**
 * =============================================================================
 * APPLICATION ERROR CLASSES
 * =============================================================================
 *
 * Errors the client throws. Only caller mistakes and transport failures are
 * thrown; problems in a response payload are reported on the travel result.
 *
 * USAGE:
 * ```typescript
 * throw new RequestShapeError("Can't set both a departure and an arrival time");
 *
 * try { ... } catch (error) {
 *   if (error instanceof ConfigurationError) console.log(error.code);
 * }
 * ```
 *
 * =============================================================================
 */

import { ErrorCode } from '../constants';

/**
 * Base Application Error
 * All custom errors extend this class
 */
export class AppError extends Error {
  public readonly code: ErrorCode | string;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: string;

  constructor(
    message: string,
    code: ErrorCode | string = ErrorCode.INTERNAL_ERROR,
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);

    this.name = new.target.name;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;
    this.timestamp = new Date().toISOString();

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);

    // Set prototype explicitly (TypeScript issue with extending Error)
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Convert error to a plain JSON shape
   */
  toJSON(): ErrorResponse {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.message,
        details: this.details,
        timestamp: this.timestamp,
        ...(process.env.NODE_ENV === 'development' && { stack: this.stack })
      }
    };
  }
}

/**
 * Serialized error format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
    timestamp: string;
    stack?: string;
  };
}

export interface ConfigurationErrorDetail {
  field: string;
  message: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Invalid query configuration or environment (raised at construction)
 */
export class ConfigurationError extends AppError {
  public readonly errors: ConfigurationErrorDetail[];

  constructor(
    message: string = 'Invalid configuration',
    errors: ConfigurationErrorDetail[] = [],
    code: ErrorCode | string = ErrorCode.CONFIG_INVALID
  ) {
    super(message, code, true, { errors });
    this.errors = errors;
  }

  static fromZodError(zodError: { errors: Array<{ path: (string | number)[]; message: string }> }): ConfigurationError {
    const errors = zodError.errors.map(err => ({
      field: err.path.join('.'),
      message: err.message
    }));
    const summary = errors.map(err => (err.field ? `${err.field}: ${err.message}` : err.message)).join('; ');
    return new ConfigurationError(`Invalid configuration: ${summary}`, errors);
  }
}

/**
 * Query request that cannot be turned into a URL (raised at build time)
 */
export class RequestShapeError extends AppError {
  constructor(
    message: string = 'Invalid request',
    code: ErrorCode | string = ErrorCode.REQUEST_TIME_CONFLICT,
    details?: Record<string, unknown>
  ) {
    super(message, code, true, details);
  }
}

/**
 * Location argument that is neither an address, a coordinate pair nor a list of them
 */
export class LocationTypeError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.REQUEST_LOCATION_INVALID, true, details);
  }
}

/**
 * HTTP call failed: network, timeout, non-2xx status or unreadable body
 */
export class TransportError extends AppError {
  constructor(
    message: string,
    code: ErrorCode | string = ErrorCode.TRANSPORT_FAILED,
    details?: Record<string, unknown>
  ) {
    super(message, code, true, details);
  }
}

// =============================================================================
// ERROR TYPE GUARDS
// =============================================================================

/**
 * Check if error is an operational (expected) error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}

/**
 * Message of any thrown value
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
