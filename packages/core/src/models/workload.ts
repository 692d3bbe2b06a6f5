/**
 * Workload model: construction of replica instances and phase transitions
 * @module @kubesim/core/models/workload
 */

import { randomUUID } from 'node:crypto';
import type { CreateWorkloadInput, Workload, WorkloadPhase } from '@kubesim/shared';
import { ConflictError, DEFAULT_WORKLOAD_MEMORY, fromMillicores, toMillicores } from '@kubesim/shared';

/**
 * Allowed workload phase transitions. Failed and Terminated are terminal.
 */
export const WORKLOAD_TRANSITIONS: Readonly<Record<WorkloadPhase, readonly WorkloadPhase[]>> = {
  Pending: ['Scheduled', 'Terminated'],
  Scheduled: ['Running', 'Pending', 'Failed', 'Terminated'],
  Running: ['Pending', 'Failed', 'Terminated'],
  Failed: [],
  Terminated: [],
};

/**
 * Whether a workload may move from one phase to another
 */
export function canTransitionWorkload(from: WorkloadPhase, to: WorkloadPhase): boolean {
  return WORKLOAD_TRANSITIONS[from].includes(to);
}

/**
 * Return the workload moved to `phase`, or throw ConflictError when the
 * transition is not allowed. Leaving Scheduled/Running clears the node.
 */
export function transitionWorkload(
  workload: Workload,
  phase: WorkloadPhase,
  message: string,
  nodeId: string | null = null,
  now = new Date(),
): Workload {
  if (!canTransitionWorkload(workload.phase, phase)) {
    throw ConflictError.invalidState('workload', workload.id, workload.phase, `move to ${phase}`);
  }
  const keepsNode = phase === 'Scheduled' || phase === 'Running';
  return {
    ...workload,
    phase,
    message,
    nodeId: keepsNode ? nodeId ?? workload.nodeId : null,
    updatedAt: now,
  };
}

/**
 * Instance name for one replica of a submission
 */
export function instanceName(group: string, replicaIndex: number, replicas: number): string {
  return replicas === 1 ? group : `${group}-${replicaIndex}`;
}

/**
 * Expand a submission into its Pending instances
 */
export function createWorkloadInstances(input: CreateWorkloadInput): Workload[] {
  const replicas = input.replicas ?? 1;
  const now = new Date();
  const instances: Workload[] = [];

  for (let index = 0; index < replicas; index++) {
    instances.push({
      id: randomUUID(),
      name: instanceName(input.name, index, replicas),
      group: input.name,
      replicaIndex: index,
      request: {
        cpu: fromMillicores(toMillicores(input.request.cpu)),
        memory: input.request.memory ?? DEFAULT_WORKLOAD_MEMORY,
      },
      image: input.image,
      command: input.command ? [...input.command] : undefined,
      phase: 'Pending',
      nodeId: null,
      createdAt: now,
      updatedAt: now,
    });
  }

  return instances;
}

/**
 * Clone a terminal workload into a fresh Pending one
 */
export function cloneForResubmit(workload: Workload): Workload {
  const now = new Date();
  return {
    id: randomUUID(),
    name: workload.name,
    group: workload.group,
    replicaIndex: workload.replicaIndex,
    request: { ...workload.request },
    image: workload.image,
    command: workload.command ? [...workload.command] : undefined,
    phase: 'Pending',
    nodeId: null,
    resubmittedFrom: workload.id,
    createdAt: now,
    updatedAt: now,
  };
}
