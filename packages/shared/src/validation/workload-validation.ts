/**
 * Workload submission validation
 * @module @kubesim/shared/validation/workload-validation
 */

import { DEFAULT_WORKLOAD_MEMORY, type ResourceQuantity } from '../types/resources.js';
import {
  ALL_WORKLOAD_PHASES,
  type CreateWorkloadInput,
  type UpdateWorkloadInput,
  type WorkloadPhase,
} from '../types/workload.js';
import {
  isRecord,
  invalidInput,
  toInputValidation,
  validateResourceAmount,
  type FieldValidationError,
  type InputValidation,
} from './common.js';

/**
 * Workload name pattern: lowercase alphanumeric and hyphens, starting with a
 * letter. Kept short so that replica suffixes still fit a container name.
 */
const WORKLOAD_NAME_PATTERN = /^[a-z]([a-z0-9-]{0,51}[a-z0-9])?$/;

/**
 * Image reference pattern (registry/name:tag@digest, loosely)
 */
const IMAGE_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9._\-/:@]*$/;

/**
 * Maximum replicas per submission
 */
export const MAX_REPLICAS = 100;

/**
 * Maximum command arguments
 */
const MAX_COMMAND_ARGS = 64;

/**
 * Validate workload name
 */
export function validateWorkloadName(name: unknown): FieldValidationError | null {
  if (name === undefined || name === null) {
    return { field: 'name', message: 'Workload name is required', code: 'REQUIRED' };
  }

  if (typeof name !== 'string') {
    return { field: 'name', message: 'Workload name must be a string', code: 'INVALID_TYPE' };
  }

  if (name.length === 0) {
    return { field: 'name', message: 'Workload name cannot be empty', code: 'EMPTY' };
  }

  if (name.length > 53) {
    return { field: 'name', message: 'Workload name cannot exceed 53 characters', code: 'TOO_LONG' };
  }

  if (!WORKLOAD_NAME_PATTERN.test(name)) {
    return {
      field: 'name',
      message:
        'Workload name must start with a lowercase letter and contain only lowercase alphanumeric characters and hyphens',
      code: 'INVALID_FORMAT',
    };
  }

  return null;
}

/**
 * Validate a resource request; memory is always optional
 */
export function validateResourceRequest(
  request: unknown,
  options: { requireCpu?: boolean } = { requireCpu: true },
): FieldValidationError[] {
  if (request === undefined || request === null) {
    return [{ field: 'request', message: 'Resource request is required', code: 'REQUIRED' }];
  }

  if (!isRecord(request)) {
    return [{ field: 'request', message: 'Resource request must be an object', code: 'INVALID_TYPE' }];
  }

  const errors: FieldValidationError[] = [];

  if (options.requireCpu || request.cpu !== undefined) {
    const cpuError = validateResourceAmount(request.cpu, 'request.cpu', { millicores: true });
    if (cpuError) errors.push(cpuError);
  }

  if (request.memory !== undefined) {
    const memoryError = validateResourceAmount(request.memory, 'request.memory', { integer: true });
    if (memoryError) errors.push(memoryError);
  }

  return errors;
}

/**
 * Validate replica count (defaults to 1)
 */
export function validateReplicas(replicas: unknown): FieldValidationError | null {
  if (replicas === undefined || replicas === null) {
    return null;
  }

  if (typeof replicas !== 'number' || !Number.isInteger(replicas)) {
    return { field: 'replicas', message: 'Replicas must be an integer', code: 'INVALID_TYPE' };
  }

  if (replicas < 1) {
    return { field: 'replicas', message: 'Replicas must be at least 1', code: 'INVALID_VALUE' };
  }

  if (replicas > MAX_REPLICAS) {
    return {
      field: 'replicas',
      message: `Replicas cannot exceed ${MAX_REPLICAS}`,
      code: 'INVALID_VALUE',
    };
  }

  return null;
}

/**
 * Validate an optional image reference
 */
export function validateImage(image: unknown): FieldValidationError | null {
  if (image === undefined || image === null) {
    return null;
  }

  if (typeof image !== 'string' || image.length === 0 || image.length > 255 || !IMAGE_PATTERN.test(image)) {
    return { field: 'image', message: 'Image must be a valid image reference', code: 'INVALID_FORMAT' };
  }

  return null;
}

/**
 * Validate an optional command (argv form)
 */
export function validateCommand(command: unknown): FieldValidationError | null {
  if (command === undefined || command === null) {
    return null;
  }

  if (!Array.isArray(command) || command.length === 0) {
    return { field: 'command', message: 'Command must be a non-empty array of strings', code: 'INVALID_TYPE' };
  }

  if (command.length > MAX_COMMAND_ARGS) {
    return {
      field: 'command',
      message: `Command cannot have more than ${MAX_COMMAND_ARGS} arguments`,
      code: 'TOO_LONG',
    };
  }

  if (!command.every((arg) => typeof arg === 'string')) {
    return { field: 'command', message: 'Command arguments must be strings', code: 'INVALID_TYPE' };
  }

  return null;
}

/**
 * Narrow a string to a workload phase
 */
export function isWorkloadPhase(value: string): value is WorkloadPhase {
  return ALL_WORKLOAD_PHASES.some((phase) => phase === value);
}

/**
 * Validate a workload phase filter
 */
export function validateWorkloadPhase(phase: unknown): FieldValidationError | null {
  if (typeof phase !== 'string' || !isWorkloadPhase(phase)) {
    return {
      field: 'phase',
      message: `Workload phase must be one of: ${ALL_WORKLOAD_PHASES.join(', ')}`,
      code: 'INVALID_VALUE',
    };
  }
  return null;
}

function toStringArray(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((arg): arg is string => typeof arg === 'string');
}

/**
 * Validate workload submission input
 */
export function validateCreateWorkloadInput(input: unknown): InputValidation<CreateWorkloadInput> {
  if (!isRecord(input)) {
    return invalidInput(input);
  }

  const errors: FieldValidationError[] = [];

  const nameError = validateWorkloadName(input.name);
  if (nameError) errors.push(nameError);

  errors.push(...validateResourceRequest(input.request));

  const replicasError = validateReplicas(input.replicas);
  if (replicasError) errors.push(replicasError);

  const imageError = validateImage(input.image);
  if (imageError) errors.push(imageError);

  const commandError = validateCommand(input.command);
  if (commandError) errors.push(commandError);

  return toInputValidation(errors, () => {
    const request = isRecord(input.request) ? input.request : {};
    return {
      name: typeof input.name === 'string' ? input.name : '',
      request: {
        cpu: typeof request.cpu === 'number' ? request.cpu : 0,
        memory: typeof request.memory === 'number' ? request.memory : DEFAULT_WORKLOAD_MEMORY,
      },
      replicas: typeof input.replicas === 'number' ? input.replicas : 1,
      image: typeof input.image === 'string' ? input.image : undefined,
      command: toStringArray(input.command),
    };
  });
}

/**
 * Validate workload update input (Pending workloads only)
 */
export function validateUpdateWorkloadInput(input: unknown): InputValidation<UpdateWorkloadInput> {
  if (!isRecord(input)) {
    return invalidInput(input);
  }

  const errors: FieldValidationError[] = [];

  if (input.request === undefined && input.command === undefined) {
    errors.push({ field: 'input', message: 'Nothing to update', code: 'REQUIRED' });
  }

  if (input.request !== undefined) {
    errors.push(...validateResourceRequest(input.request, { requireCpu: false }));
  }

  const commandError = validateCommand(input.command);
  if (commandError) errors.push(commandError);

  return toInputValidation(errors, () => {
    const update: UpdateWorkloadInput = {};
    if (isRecord(input.request)) {
      const request: Partial<ResourceQuantity> = {};
      if (typeof input.request.cpu === 'number') request.cpu = input.request.cpu;
      if (typeof input.request.memory === 'number') request.memory = input.request.memory;
      update.request = request;
    }
    const command = toStringArray(input.command);
    if (command) update.command = command;
    return update;
  });
}
