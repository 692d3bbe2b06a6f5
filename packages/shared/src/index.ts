/**
 * kubesim - Shared Package
 * Types, validation, errors, logging, and utilities
 * @module @kubesim/shared
 */

// Types (includes resource arithmetic and phase helpers)
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Validation
export * from './validation/index.js';

// Logging
export {
  Logger,
  createServiceLogger,
  formatLogLine,
  parseLogLevel,
  generateCorrelationId,
  type LogLevel,
  type LogMeta,
  type LogEntry,
  type LoggerConfig,
} from './logging/logger.js';

// Utilities
export {
  sleep,
  withTimeout,
  retry,
  errorMessage,
  type RetryOptions,
} from './utils/async.js';
