/**
 * Validation module - re-exports all validators
 * @module @kubesim/shared/validation
 */

// Common
export type { FieldValidationError, InputValidation } from './common.js';

export {
  isRecord,
  isValidUUID,
  validateUUID,
  validateResourceAmount,
  validateExpectedRevision,
} from './common.js';

// Node validation
export {
  validateNodeName,
  validateNodeCapacity,
  validateNodePhase,
  isNodePhase,
  validateProvisionNodeInput,
  validateUpdateNodeInput,
  MAX_NODE_CPU,
} from './node-validation.js';

// Workload validation
export {
  validateWorkloadName,
  validateResourceRequest,
  validateReplicas,
  validateImage,
  validateCommand,
  validateWorkloadPhase,
  isWorkloadPhase,
  validateCreateWorkloadInput,
  validateUpdateWorkloadInput,
  MAX_REPLICAS,
} from './workload-validation.js';
