/**
 * Node type definitions
 * @module @kubesim/shared/types/node
 */

import type { ResourceQuantity } from './resources.js';
import { subtractResources } from './resources.js';

/**
 * Node lifecycle phases
 * - Pending: recorded, environment not requested yet
 * - Provisioning: runtime environment being created and started
 * - Ready: healthy and accepting workloads
 * - Draining: no new workloads, hosted ones are being evicted
 * - Failed: provisioning error, teardown error or lost heartbeats
 * - Deleted: environment torn down (tombstone)
 */
export type NodePhase = 'Pending' | 'Provisioning' | 'Ready' | 'Draining' | 'Failed' | 'Deleted';

/**
 * All node phases
 */
export const ALL_NODE_PHASES: readonly NodePhase[] = [
  'Pending',
  'Provisioning',
  'Ready',
  'Draining',
  'Failed',
  'Deleted',
];

/**
 * Node entity - a logical cluster member backed by one execution environment
 */
export interface Node {
  /** Unique identifier (UUID) */
  id: string;
  /** Node name (unique among non-deleted nodes) */
  name: string;
  /** Total capacity */
  capacity: ResourceQuantity;
  /** Sum of requests of the placements bound to this node */
  allocated: ResourceQuantity;
  /** Current lifecycle phase */
  phase: NodePhase;
  /** Opaque runtime identifier of the backing environment */
  runtimeHandle: string | null;
  /** Last successful heartbeat */
  lastHeartbeat: Date | null;
  /** Consecutive missed heartbeats */
  missedHeartbeats: number;
  /** Reason for the last transition or failure */
  message?: string;
  /** Creation timestamp */
  createdAt: Date;
  /** Last update timestamp */
  updatedAt: Date;
}

/**
 * Node provisioning input
 */
export interface ProvisionNodeInput {
  /** Node name (generated when omitted) */
  name?: string;
  /** Requested capacity; memory defaults when omitted */
  capacity: {
    cpu: number;
    memory?: number;
  };
}

/**
 * Node update input
 */
export interface UpdateNodeInput {
  capacity?: Partial<ResourceQuantity>;
}

/**
 * Free capacity of a node
 */
export function getFreeCapacity(node: Pick<Node, 'capacity' | 'allocated'>): ResourceQuantity {
  return subtractResources(node.capacity, node.allocated);
}

/**
 * Whether the node accepts new placements
 */
export function isNodeSchedulable(node: Pick<Node, 'phase'>): boolean {
  return node.phase === 'Ready';
}

/**
 * Whether the node is still expected to host its current placements
 */
export function isNodeHosting(node: Pick<Node, 'phase'>): boolean {
  return node.phase === 'Ready' || node.phase === 'Draining';
}
