/**
 * Node provisioning validation
 * @module @kubesim/shared/validation/node-validation
 */

import { ALL_NODE_PHASES, type NodePhase, type ProvisionNodeInput, type UpdateNodeInput } from '../types/node.js';
import { DEFAULT_NODE_MEMORY, type ResourceQuantity } from '../types/resources.js';
import {
  isRecord,
  invalidInput,
  toInputValidation,
  validateResourceAmount,
  type FieldValidationError,
  type InputValidation,
} from './common.js';

/**
 * Node name pattern: must start with a letter, end with alphanumeric,
 * and contain only alphanumeric characters, hyphens, and underscores.
 * Length: 1-63 chars
 */
const NODE_NAME_PATTERN = /^[a-zA-Z]([a-zA-Z0-9_-]{0,61}[a-zA-Z0-9])?$/;

/**
 * Upper bound on node CPU units
 */
export const MAX_NODE_CPU = 256;

/**
 * Validate node name
 */
export function validateNodeName(name: unknown): FieldValidationError | null {
  if (name === undefined || name === null) {
    return { field: 'name', message: 'Node name is required', code: 'REQUIRED' };
  }

  if (typeof name !== 'string') {
    return { field: 'name', message: 'Node name must be a string', code: 'INVALID_TYPE' };
  }

  if (name.length === 0) {
    return { field: 'name', message: 'Node name cannot be empty', code: 'EMPTY' };
  }

  if (name.length > 63) {
    return { field: 'name', message: 'Node name cannot exceed 63 characters', code: 'TOO_LONG' };
  }

  if (!NODE_NAME_PATTERN.test(name)) {
    return {
      field: 'name',
      message:
        'Node name must start with a letter and contain only alphanumeric characters, hyphens, and underscores',
      code: 'INVALID_FORMAT',
    };
  }

  return null;
}

/**
 * Validate node capacity; memory is always optional
 */
export function validateNodeCapacity(
  capacity: unknown,
  options: { requireCpu?: boolean } = { requireCpu: true },
): FieldValidationError[] {
  if (capacity === undefined || capacity === null) {
    return [{ field: 'capacity', message: 'Node capacity is required', code: 'REQUIRED' }];
  }

  if (!isRecord(capacity)) {
    return [{ field: 'capacity', message: 'Node capacity must be an object', code: 'INVALID_TYPE' }];
  }

  const errors: FieldValidationError[] = [];

  if (options.requireCpu || capacity.cpu !== undefined) {
    const cpuError = validateResourceAmount(capacity.cpu, 'capacity.cpu', { millicores: true });
    if (cpuError) {
      errors.push(cpuError);
    } else if (typeof capacity.cpu === 'number' && capacity.cpu > MAX_NODE_CPU) {
      errors.push({
        field: 'capacity.cpu',
        message: `capacity.cpu cannot exceed ${MAX_NODE_CPU}`,
        code: 'INVALID_VALUE',
      });
    }
  }

  if (capacity.memory !== undefined) {
    const memoryError = validateResourceAmount(capacity.memory, 'capacity.memory', { integer: true });
    if (memoryError) errors.push(memoryError);
  }

  return errors;
}

/**
 * Validate a node phase filter
 */
export function validateNodePhase(phase: unknown): FieldValidationError | null {
  if (typeof phase !== 'string' || !isNodePhase(phase)) {
    return {
      field: 'phase',
      message: `Node phase must be one of: ${ALL_NODE_PHASES.join(', ')}`,
      code: 'INVALID_VALUE',
    };
  }
  return null;
}

/**
 * Narrow a string to a node phase
 */
export function isNodePhase(value: string): value is NodePhase {
  return ALL_NODE_PHASES.some((phase) => phase === value);
}

/**
 * Validate node provisioning input
 */
export function validateProvisionNodeInput(input: unknown): InputValidation<ProvisionNodeInput> {
  if (!isRecord(input)) {
    return invalidInput(input);
  }

  const errors: FieldValidationError[] = [];

  if (input.name !== undefined) {
    const nameError = validateNodeName(input.name);
    if (nameError) errors.push(nameError);
  }

  errors.push(...validateNodeCapacity(input.capacity));

  return toInputValidation(errors, () => {
    const capacity = isRecord(input.capacity) ? input.capacity : {};
    return {
      name: typeof input.name === 'string' ? input.name : undefined,
      capacity: {
        cpu: typeof capacity.cpu === 'number' ? capacity.cpu : 0,
        memory: typeof capacity.memory === 'number' ? capacity.memory : DEFAULT_NODE_MEMORY,
      },
    };
  });
}

/**
 * Validate node update input
 */
export function validateUpdateNodeInput(input: unknown): InputValidation<UpdateNodeInput> {
  if (!isRecord(input)) {
    return invalidInput(input);
  }

  const errors: FieldValidationError[] = [];

  if (input.capacity === undefined) {
    errors.push({ field: 'capacity', message: 'Nothing to update', code: 'REQUIRED' });
  } else {
    errors.push(...validateNodeCapacity(input.capacity, { requireCpu: false }));
  }

  return toInputValidation(errors, () => {
    const capacity = isRecord(input.capacity) ? input.capacity : {};
    const update: Partial<ResourceQuantity> = {};
    if (typeof capacity.cpu === 'number') update.cpu = capacity.cpu;
    if (typeof capacity.memory === 'number') update.memory = capacity.memory;
    return { capacity: update };
  });
}
