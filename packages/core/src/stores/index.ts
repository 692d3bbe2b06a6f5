/**
 * Stores for kubesim
 * @module @kubesim/core/stores
 */

// Object store - authoritative registry of cluster objects
export {
  ObjectStore,
  StoreTransaction,
  type ObjectFilter,
  type ObjectMutation,
  type ChangeListener,
  type CreateResult,
  type ObjectStoreOptions,
} from './object-store';

// Placement transactions - keep placements, phases and allocations in step
export {
  commitPlacement,
  releaseWorkload,
  removePlacement,
  retryOnConflict,
  DEFAULT_COMMIT_ATTEMPTS,
  type ReleasePhase,
} from './placements';
