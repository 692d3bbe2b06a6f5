/**
 * Response shapes of the kubesim API as they arrive over JSON
 * @module @kubesim/cli/api-types
 */

import type {
  ClusterStatus,
  NodeStatusSummary,
  ReconcileSummary,
  WorkloadStatusSummary,
} from '@kubesim/shared';

/**
 * Dates become ISO strings on the wire
 */
export type Serialized<T> = T extends Date
  ? string
  : T extends Array<infer U>
    ? Serialized<U>[]
    : T extends object
      ? { [K in keyof T]: Serialized<T[K]> }
      : T;

export type NodeView = Serialized<NodeStatusSummary>;
export type WorkloadView = Serialized<WorkloadStatusSummary>;
export type ClusterStatusView = Serialized<ClusterStatus>;

export interface NodeResponse {
  node: NodeView;
}

export interface NodeListResponse {
  nodes: NodeView[];
  total: number;
}

export interface NodeEvictionResponse {
  node: NodeView;
  evicted: string[];
}

export interface WorkloadResponse {
  workload: WorkloadView;
}

export interface WorkloadListResponse {
  workloads: WorkloadView[];
  total: number;
}

export interface WorkloadSubmitResponse {
  workloads: WorkloadView[];
}

export interface WorkloadDeleteResponse {
  id: string;
  deleted: boolean;
}

export interface ReconcileResponse {
  summary: ReconcileSummary;
}
