/**
 * Shared types for kubesim
 * @module @kubesim/shared/types
 */

// Resource types
export type { ResourceQuantity } from './resources.js';

export {
  ZERO_RESOURCES,
  DEFAULT_NODE_MEMORY,
  DEFAULT_WORKLOAD_MEMORY,
  addResources,
  subtractResources,
  fitsWithin,
  resourcesEqual,
  normalizeResources,
  toMillicores,
  fromMillicores,
  isWholeMillicores,
  MILLICORES_PER_CPU,
  sumResources,
  formatResources,
} from './resources.js';

// Node types
export type { Node, NodePhase, ProvisionNodeInput, UpdateNodeInput } from './node.js';

export { ALL_NODE_PHASES, getFreeCapacity, isNodeSchedulable, isNodeHosting } from './node.js';

// Workload types
export type {
  Workload,
  WorkloadPhase,
  CreateWorkloadInput,
  UpdateWorkloadInput,
  Placement,
  SchedulingStatus,
} from './workload.js';

export { ALL_WORKLOAD_PHASES, isWorkloadActive, isWorkloadTerminal } from './workload.js';

// Store object types
export type {
  ClusterObjectMap,
  ObjectKind,
  StoredObject,
  ChangeType,
  KindChangeEvent,
  ChangeEvent,
} from './objects.js';

export { isChangeOf } from './objects.js';

// Cluster types
export type {
  ClusterStats,
  ClusterStatus,
  NodeStatusSummary,
  WorkloadStatusSummary,
  ReconcileSummary,
  HealthCheckSummary,
} from './cluster.js';

// Runtime types
export type { ContainerRuntime, EnvironmentSpec, WorkloadProcessSpec } from './runtime.js';
