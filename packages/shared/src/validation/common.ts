/**
 * Validation primitives shared by the input validators
 * @module @kubesim/shared/validation/common
 */

import { isWholeMillicores } from '../types/resources.js';

/**
 * Single field validation error
 */
export interface FieldValidationError {
  field: string;
  message: string;
  code: string;
}

/**
 * Outcome of validating an untrusted input, carrying the normalized value
 */
export type InputValidation<T> =
  | { valid: true; value: T; errors: [] }
  | { valid: false; errors: FieldValidationError[] };

/**
 * UUID pattern (any version)
 */
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Narrow an unknown value to a plain object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check a UUID string
 */
export function isValidUUID(value: string): boolean {
  return UUID_PATTERN.test(value);
}

/**
 * Validate an object id
 */
export function validateUUID(value: unknown, field = 'id'): FieldValidationError | null {
  if (typeof value !== 'string' || value.length === 0) {
    return { field, message: `${field} is required`, code: 'REQUIRED' };
  }

  if (!isValidUUID(value)) {
    return { field, message: `${field} must be a valid UUID`, code: 'INVALID_FORMAT' };
  }

  return null;
}

/**
 * Validate a resource amount: a finite number greater than zero, optionally
 * an integer or a whole number of millicores
 */
export function validateResourceAmount(
  value: unknown,
  field: string,
  options: { integer?: boolean; millicores?: boolean } = {},
): FieldValidationError | null {
  if (value === undefined || value === null) {
    return { field, message: `${field} is required`, code: 'REQUIRED' };
  }

  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return { field, message: `${field} must be a number`, code: 'INVALID_TYPE' };
  }

  if (options.integer && !Number.isInteger(value)) {
    return { field, message: `${field} must be an integer`, code: 'INVALID_TYPE' };
  }

  if (value <= 0) {
    return { field, message: `${field} must be greater than 0`, code: 'INVALID_VALUE' };
  }

  if (options.millicores && !isWholeMillicores(value)) {
    return { field, message: `${field} must be a multiple of 0.001`, code: 'INVALID_VALUE' };
  }

  return null;
}

/**
 * Validate an optional expected revision
 */
export function validateExpectedRevision(value: unknown): FieldValidationError | null {
  if (value === undefined || value === null) {
    return null;
  }

  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    return {
      field: 'expectedRevision',
      message: 'expectedRevision must be a positive integer',
      code: 'INVALID_VALUE',
    };
  }

  return null;
}

/**
 * Build a validation result from collected errors
 */
export function toInputValidation<T>(errors: FieldValidationError[], build: () => T): InputValidation<T> {
  if (errors.length > 0) {
    return { valid: false, errors };
  }
  return { valid: true, value: build(), errors: [] };
}

/**
 * Failed result for a body that is not an object
 */
export function invalidInput(input: unknown): InputValidation<never> {
  if (input === undefined || input === null) {
    return {
      valid: false,
      errors: [{ field: 'input', message: 'Input is required', code: 'REQUIRED' }],
    };
  }
  return {
    valid: false,
    errors: [{ field: 'input', message: 'Input must be an object', code: 'INVALID_TYPE' }],
  };
}
