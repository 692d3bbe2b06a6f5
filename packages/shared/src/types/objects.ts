/**
 * Cluster object kinds and store entry types
 * @module @kubesim/shared/types/objects
 */

import type { Node } from './node.js';
import type { Workload, Placement } from './workload.js';

/**
 * Object kind to object type map
 */
export interface ClusterObjectMap {
  node: Node;
  workload: Workload;
  placement: Placement;
}

/**
 * Object kinds held by the store
 */
export type ObjectKind = keyof ClusterObjectMap;

/**
 * A stored object with its concurrency metadata
 */
export interface StoredObject<K extends ObjectKind> {
  kind: K;
  id: string;
  /** Per-object revision, starts at 1 and increments on every mutation */
  revision: number;
  /** Store-wide sequence number assigned at creation (FIFO order) */
  createdSequence: number;
  object: ClusterObjectMap[K];
}

/**
 * Store change event types
 */
export type ChangeType = 'created' | 'updated' | 'deleted';

/**
 * Change event for one kind
 */
export interface KindChangeEvent<K extends ObjectKind> {
  type: ChangeType;
  kind: K;
  id: string;
  /** Revision after the change (the last revision for deletes) */
  revision: number;
  /** Store-wide revision that committed the change */
  storeRevision: number;
  /** Object after the change (the removed object for deletes) */
  object: ClusterObjectMap[K];
  /** Object before the change (updates and deletes) */
  previous?: ClusterObjectMap[K];
}

/**
 * Change event for any kind
 */
export type ChangeEvent = KindChangeEvent<ObjectKind>;

/**
 * Narrow a change event to one kind
 */
export function isChangeOf<K extends ObjectKind>(event: ChangeEvent, kind: K): event is KindChangeEvent<K> {
  return event.kind === kind;
}
