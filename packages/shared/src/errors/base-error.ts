/**
 * Base error class with error codes
 * @module @kubesim/shared/errors/base-error
 */

/**
 * Error codes for categorization
 */
export enum ErrorCode {
  // General errors (1xxx)
  UNKNOWN = 1000,
  INTERNAL_ERROR = 1001,
  CANCELLED = 1002,

  // Validation errors (2xxx)
  VALIDATION_ERROR = 2000,
  INVALID_INPUT = 2001,
  MISSING_REQUIRED_FIELD = 2002,
  INVALID_FORMAT = 2003,
  OUT_OF_RANGE = 2004,
  CONSTRAINT_VIOLATION = 2005,

  // Resource errors (5xxx)
  NOT_FOUND = 5000,
  ALREADY_EXISTS = 5001,
  CONFLICT = 5002,
  INVALID_STATE = 5003,

  // Runtime errors (6xxx)
  RUNTIME_ERROR = 6000,
  RUNTIME_TIMEOUT = 6001,
  RUNTIME_UNAVAILABLE = 6002,
}

/**
 * Error metadata for additional context
 */
export interface ErrorMeta {
  /** Object kind involved */
  resourceType?: string;
  /** Object ID involved */
  resourceId?: string;
  /** Field that caused the error */
  field?: string;
  /** Additional context */
  [key: string]: unknown;
}

/**
 * Base error class for all kubesim errors
 */
export class KubesimError extends Error {
  /** Error code for categorization */
  public readonly code: ErrorCode;
  /** HTTP status code equivalent */
  public readonly statusCode: number;
  /** Error metadata */
  public readonly meta: ErrorMeta;
  /** Timestamp when error occurred */
  public readonly timestamp: Date;
  /** Correlation ID for tracing */
  public correlationId?: string;
  /** Original error if this wraps another */
  public readonly cause?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    meta: ErrorMeta = {},
    cause?: Error,
  ) {
    super(message);
    this.name = 'KubesimError';
    this.code = code;
    this.meta = meta;
    this.timestamp = new Date();
    this.cause = cause;
    this.statusCode = KubesimError.statusCodeFor(code);

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Map error code to HTTP status code
   */
  static statusCodeFor(code: ErrorCode): number {
    const codeCategory = Math.floor(code / 1000);

    switch (codeCategory) {
      case 2: // Validation
        return 400;
      case 5: // Resource
        if (code === ErrorCode.NOT_FOUND) {
          return 404;
        }
        return 409;
      case 6: // Runtime
        if (code === ErrorCode.RUNTIME_TIMEOUT) {
          return 504;
        }
        if (code === ErrorCode.RUNTIME_UNAVAILABLE) {
          return 503;
        }
        return 502;
      default:
        return 500;
    }
  }

  /**
   * Symbolic name of the error code, used in API envelopes
   */
  get codeName(): string {
    return ErrorCode[this.code];
  }

  /**
   * Set correlation ID for tracing
   */
  withCorrelationId(correlationId: string): this {
    this.correlationId = correlationId;
    return this;
  }

  /**
   * Convert to JSON for API responses
   */
  toJSON(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.codeName,
        message: this.message,
        meta: this.meta,
        timestamp: this.timestamp.toISOString(),
        correlationId: this.correlationId,
      },
    };
  }

  /**
   * Convert to log-friendly format
   */
  toLog(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.codeName,
      message: this.message,
      meta: this.meta,
      timestamp: this.timestamp.toISOString(),
      correlationId: this.correlationId,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }

  /**
   * Check if this is a client error (4xx)
   */
  isClientError(): boolean {
    return this.statusCode >= 400 && this.statusCode < 500;
  }

  /**
   * Check if this is a server error (5xx)
   */
  isServerError(): boolean {
    return this.statusCode >= 500;
  }
}

/**
 * Check if an error is a KubesimError
 */
export function isKubesimError(error: unknown): error is KubesimError {
  return error instanceof KubesimError;
}

/**
 * Wrap an unknown error as a KubesimError
 */
export function wrapError(error: unknown, code: ErrorCode = ErrorCode.UNKNOWN): KubesimError {
  if (isKubesimError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new KubesimError(error.message, code, {}, error);
  }

  return new KubesimError(String(error), code);
}
