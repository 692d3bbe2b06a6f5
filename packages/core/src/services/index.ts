/**
 * Services for kubesim
 * @module @kubesim/core/services
 */

// Node lifecycle manager - environments, health and workload processes
export {
  NodeLifecycleManager,
  createNodeLifecycleManager,
  NODE_LIFECYCLE_DEFAULTS,
  type NodeLifecycleManagerOptions,
  type NodeEvictionResult,
} from './node-lifecycle-manager';

// Reconciler - scheduling, start-up and drift repair
export {
  Reconciler,
  createReconciler,
  planPlacements,
  RECONCILER_DEFAULTS,
  type ReconcilerOptions,
  type PlannerNode,
  type PlacementDecision,
} from './reconciler';

// Control plane - composition root
export {
  ControlPlane,
  createControlPlane,
  type ControlPlaneOptions,
} from './control-plane';
