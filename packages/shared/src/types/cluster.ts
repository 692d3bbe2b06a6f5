/**
 * Cluster status and statistics types
 * @module @kubesim/shared/types/cluster
 */

import type { NodePhase } from './node.js';
import type { ResourceQuantity } from './resources.js';
import type { SchedulingStatus, WorkloadPhase } from './workload.js';

/**
 * Cluster statistics derived from the object store
 */
export interface ClusterStats {
  /** Store-wide revision */
  revision: number;
  /** Nodes per phase (tombstones included) */
  nodesByPhase: Record<NodePhase, number>;
  /** Workloads per phase */
  workloadsByPhase: Record<WorkloadPhase, number>;
  /** Number of placements */
  placementCount: number;
  /** Capacity summed over Ready nodes */
  totalCapacity: ResourceQuantity;
  /** Allocation summed over Ready nodes */
  totalAllocated: ResourceQuantity;
  /** Free capacity summed over Ready nodes */
  totalFree: ResourceQuantity;
}

/**
 * Node row of the cluster status report
 */
export interface NodeStatusSummary {
  id: string;
  name: string;
  phase: NodePhase;
  revision: number;
  capacity: ResourceQuantity;
  allocated: ResourceQuantity;
  free: ResourceQuantity;
  workloadCount: number;
  lastHeartbeat: Date | null;
  message?: string;
}

/**
 * Workload row of the cluster status report
 */
export interface WorkloadStatusSummary {
  id: string;
  name: string;
  group: string;
  phase: WorkloadPhase;
  revision: number;
  request: ResourceQuantity;
  nodeId: string | null;
  message?: string;
  schedulingStatus?: SchedulingStatus;
}

/**
 * Cluster status report
 */
export interface ClusterStatus {
  runtime: string;
  nodes: NodeStatusSummary[];
  workloads: WorkloadStatusSummary[];
  stats: ClusterStats;
  generatedAt: Date;
}

/**
 * Outcome of one reconciliation pass
 */
export interface ReconcileSummary {
  /** Workloads bound to a node */
  scheduled: string[];
  /** Workloads left Pending for lack of capacity */
  unschedulable: string[];
  /** Workloads confirmed running */
  started: string[];
  /** Workloads moved to Failed */
  failed: string[];
  /** Workloads returned to Pending */
  evicted: string[];
  /** Orphan placements removed */
  orphansRemoved: string[];
  /** Workloads skipped after losing a revision race */
  conflicts: string[];
  /** Pass duration in milliseconds */
  durationMs: number;
}

/**
 * Outcome of a node health sweep
 */
export interface HealthCheckSummary {
  checked: number;
  healthy: number;
  missed: number;
  failed: string[];
}
