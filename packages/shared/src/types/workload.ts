/**
 * Workload and placement type definitions
 * @module @kubesim/shared/types/workload
 */

import type { ResourceQuantity } from './resources.js';

/**
 * Workload lifecycle phases
 */
export type WorkloadPhase = 'Pending' | 'Scheduled' | 'Running' | 'Failed' | 'Terminated';

/**
 * All workload phases
 */
export const ALL_WORKLOAD_PHASES: readonly WorkloadPhase[] = [
  'Pending',
  'Scheduled',
  'Running',
  'Failed',
  'Terminated',
];

/**
 * Workload entity - one schedulable instance, analogous to a pod
 */
export interface Workload {
  /** Unique identifier (UUID) */
  id: string;
  /** Instance name (`<group>` or `<group>-<index>`) */
  name: string;
  /** Name of the submission this instance belongs to */
  group: string;
  /** Position of this instance within its submission */
  replicaIndex: number;
  /** Resource request */
  request: ResourceQuantity;
  /** Image the process runs from, where the runtime supports it */
  image?: string;
  /** Command run inside the node environment */
  command?: string[];
  /** Current phase */
  phase: WorkloadPhase;
  /** Node the instance is bound to (null unless Scheduled or Running) */
  nodeId: string | null;
  /** Reason for the last transition */
  message?: string;
  /** Workload this one was resubmitted from */
  resubmittedFrom?: string;
  /** Creation timestamp */
  createdAt: Date;
  /** Last update timestamp */
  updatedAt: Date;
}

/**
 * Workload submission input
 */
export interface CreateWorkloadInput {
  /** Submission name */
  name: string;
  /** Resource request; memory defaults when omitted */
  request: {
    cpu: number;
    memory?: number;
  };
  /** Desired replica count (default 1) */
  replicas?: number;
  /** Image */
  image?: string;
  /** Command */
  command?: string[];
}

/**
 * Workload update input (Pending workloads only)
 */
export interface UpdateWorkloadInput {
  request?: Partial<ResourceQuantity>;
  command?: string[];
}

/**
 * Placement - binding of a workload instance to a node
 */
export interface Placement {
  /** Same as the workload id (one placement per instance) */
  id: string;
  /** Bound workload */
  workloadId: string;
  /** Hosting node */
  nodeId: string;
  /** Request reserved on the node */
  request: ResourceQuantity;
  /** Binding timestamp */
  createdAt: Date;
}

/**
 * Informational status of a Pending workload that did not fit anywhere
 */
export interface SchedulingStatus {
  reason: 'CapacityUnavailable';
  message: string;
  lastChecked: Date;
}

/**
 * Phases in which a workload holds a placement
 */
export function isWorkloadActive(workload: Pick<Workload, 'phase'>): boolean {
  return workload.phase === 'Scheduled' || workload.phase === 'Running';
}

/**
 * Phases a workload never leaves
 */
export function isWorkloadTerminal(workload: Pick<Workload, 'phase'>): boolean {
  return workload.phase === 'Failed' || workload.phase === 'Terminated';
}
