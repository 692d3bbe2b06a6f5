/**
 * Error classes for kubesim
 * @module @kubesim/shared/errors
 */

// Base error
export {
  KubesimError,
  ErrorCode,
  isKubesimError,
  wrapError,
} from './base-error.js';

export type { ErrorMeta } from './base-error.js';

// Validation errors
export {
  ValidationError,
  isValidationError,
} from './validation-error.js';

export type { ValidationErrorDetail } from './validation-error.js';

// Store errors
export {
  NotFoundError,
  ConflictError,
  isConflictError,
} from './store-error.js';

// Runtime errors
export {
  RuntimeError,
  isRuntimeError,
} from './runtime-error.js';
