/**
 * Resource quantity types and arithmetic
 * @module @kubesim/shared/types/resources
 */

/**
 * A quantity of schedulable resources
 */
export interface ResourceQuantity {
  /** CPU units (1 = one core), in steps of 0.001 */
  cpu: number;
  /** Memory in MiB */
  memory: number;
}

/**
 * Zero resources
 */
export const ZERO_RESOURCES: Readonly<ResourceQuantity> = Object.freeze({ cpu: 0, memory: 0 });

/**
 * Default node memory when a provisioning request only names CPU
 */
export const DEFAULT_NODE_MEMORY = 4096;

/**
 * Default workload memory request when a submission only names CPU
 */
export const DEFAULT_WORKLOAD_MEMORY = 128;

/**
 * CPU is accounted in whole millicores; finer amounts are rejected at input
 */
export const MILLICORES_PER_CPU = 1000;

/**
 * Convert CPU units to integer millicores
 */
export function toMillicores(cpu: number): number {
  return Math.round(cpu * MILLICORES_PER_CPU);
}

/**
 * Convert millicores back to CPU units
 */
export function fromMillicores(millicores: number): number {
  return millicores / MILLICORES_PER_CPU;
}

/**
 * Whether a CPU amount is a whole number of millicores
 */
export function isWholeMillicores(cpu: number): boolean {
  return Math.abs(cpu * MILLICORES_PER_CPU - toMillicores(cpu)) < 1e-6;
}

/**
 * Snap a quantity's CPU to the millicore grid so equal amounts compare equal
 */
export function normalizeResources(quantity: ResourceQuantity): ResourceQuantity {
  return { cpu: fromMillicores(toMillicores(quantity.cpu)), memory: quantity.memory };
}

/**
 * Add two resource quantities
 */
export function addResources(a: ResourceQuantity, b: ResourceQuantity): ResourceQuantity {
  return {
    cpu: fromMillicores(toMillicores(a.cpu) + toMillicores(b.cpu)),
    memory: a.memory + b.memory,
  };
}

/**
 * Subtract b from a, clamped at zero
 */
export function subtractResources(a: ResourceQuantity, b: ResourceQuantity): ResourceQuantity {
  return {
    cpu: fromMillicores(Math.max(0, toMillicores(a.cpu) - toMillicores(b.cpu))),
    memory: Math.max(0, a.memory - b.memory),
  };
}

/**
 * Whether `request` fits in `available` on every dimension
 */
export function fitsWithin(request: ResourceQuantity, available: ResourceQuantity): boolean {
  return toMillicores(request.cpu) <= toMillicores(available.cpu) && request.memory <= available.memory;
}

/**
 * Whether two quantities are the same amount
 */
export function resourcesEqual(a: ResourceQuantity, b: ResourceQuantity): boolean {
  return toMillicores(a.cpu) === toMillicores(b.cpu) && a.memory === b.memory;
}

/**
 * Sum a list of resource quantities
 */
export function sumResources(quantities: Iterable<ResourceQuantity>): ResourceQuantity {
  let total: ResourceQuantity = { ...ZERO_RESOURCES };
  for (const quantity of quantities) {
    total = addResources(total, quantity);
  }
  return total;
}

/**
 * Format a quantity as `cpu/memory` for logs and messages
 */
export function formatResources(quantity: ResourceQuantity): string {
  return `${quantity.cpu} cpu, ${quantity.memory} MiB`;
}
