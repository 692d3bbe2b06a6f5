/**
 * Container runtime capability
 *
 * The narrow contract between the node lifecycle manager and whatever backs a
 * node: a Docker container, or an in-process simulation in tests.
 *
 * @module @kubesim/shared/types/runtime
 */

import type { ResourceQuantity } from './resources.js';

/**
 * Specification of a node's execution environment
 */
export interface EnvironmentSpec {
  /** Node the environment backs */
  nodeId: string;
  /** Node name, used to name the environment */
  name: string;
  /** Capacity limits applied to the environment */
  capacity: ResourceQuantity;
  /** Image override */
  image?: string;
}

/**
 * Specification of a workload process inside a node environment
 */
export interface WorkloadProcessSpec {
  workloadId: string;
  name: string;
  request: ResourceQuantity;
  image?: string;
  command?: string[];
}

/**
 * Container runtime capability interface
 *
 * Every method may be slow; callers bound them with a timeout and never hold
 * store state across a call.
 */
export interface ContainerRuntime {
  /** Runtime name for logs and status */
  readonly name: string;
  /** Create an environment and return its opaque handle */
  createEnvironment(spec: EnvironmentSpec): Promise<string>;
  /** Start a created environment */
  startEnvironment(handle: string): Promise<void>;
  /** Stop a running environment */
  stopEnvironment(handle: string): Promise<void>;
  /** Remove a stopped environment */
  removeEnvironment(handle: string): Promise<void>;
  /** Whether the environment is live and reachable */
  isAlive(handle: string): Promise<boolean>;
  /** Launch a workload process inside the environment */
  launchWorkload(handle: string, spec: WorkloadProcessSpec): Promise<void>;
  /** Stop a workload process */
  stopWorkload(handle: string, workloadId: string): Promise<void>;
  /** Whether a workload process is still running */
  isWorkloadAlive(handle: string, workloadId: string): Promise<boolean>;
}
