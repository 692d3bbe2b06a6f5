/**
 * Validation error class
 * @module @kubesim/shared/errors/validation-error
 */

import { KubesimError, ErrorCode, type ErrorMeta } from './base-error.js';

/**
 * Validation error detail
 */
export interface ValidationErrorDetail {
  /** Field that failed validation */
  field: string;
  /** Error message */
  message: string;
  /** Validation rule that failed */
  rule?: string;
  /** Expected value/format */
  expected?: string;
  /** Actual value received */
  received?: unknown;
}

/**
 * Validation error for input validation failures
 */
export class ValidationError extends KubesimError {
  /** Validation error details */
  public readonly details: ValidationErrorDetail[];

  constructor(
    message: string,
    details: ValidationErrorDetail[] = [],
    meta: ErrorMeta = {},
    code: ErrorCode = ErrorCode.VALIDATION_ERROR,
  ) {
    super(message, code, meta);
    this.name = 'ValidationError';
    this.details = details;
  }

  /**
   * Create from a single field error
   */
  static field(field: string, message: string, rule?: string): ValidationError {
    return new ValidationError(`Validation failed for field: ${field}`, [
      { field, message, rule },
    ], { field });
  }

  /**
   * Create for a required field
   */
  static required(field: string): ValidationError {
    return new ValidationError(
      `Missing required field: ${field}`,
      [{ field, message: 'This field is required', rule: 'required' }],
      { field },
      ErrorCode.MISSING_REQUIRED_FIELD,
    );
  }

  /**
   * Create for an invalid format
   */
  static invalidFormat(field: string, expected: string, received?: unknown): ValidationError {
    return new ValidationError(
      `Invalid format for field: ${field}`,
      [{ field, message: `Expected ${expected}`, rule: 'format', expected, received }],
      { field },
      ErrorCode.INVALID_FORMAT,
    );
  }

  /**
   * Create for an out of range value
   */
  static outOfRange(field: string, min?: number, max?: number, received?: number): ValidationError {
    let expected = '';
    if (min !== undefined && max !== undefined) {
      expected = `between ${min} and ${max}`;
    } else if (min !== undefined) {
      expected = `at least ${min}`;
    } else if (max !== undefined) {
      expected = `at most ${max}`;
    }

    return new ValidationError(
      `Value out of range for field: ${field}`,
      [{ field, message: `Expected value ${expected}`, rule: 'range', expected, received }],
      { field },
      ErrorCode.OUT_OF_RANGE,
    );
  }

  /**
   * Create from multiple field errors
   */
  static multiple(errors: ValidationErrorDetail[]): ValidationError {
    const fieldNames = errors.map(e => e.field).join(', ');
    return new ValidationError(`Validation failed for fields: ${fieldNames}`, errors);
  }

  /**
   * Check if a specific field has an error
   */
  hasFieldError(field: string): boolean {
    return this.details.some(d => d.field === field);
  }

  /**
   * Convert to JSON for API responses
   */
  override toJSON(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.codeName,
        message: this.message,
        details: this.details,
        meta: this.meta,
        timestamp: this.timestamp.toISOString(),
        correlationId: this.correlationId,
      },
    };
  }
}

/**
 * Check if an error is a ValidationError
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}
