/**
 * Placement transactions
 * @module @kubesim/core/stores/placements
 *
 * A placement, its workload's phase and its node's `allocated` always change
 * in the same commit, so the capacity invariant holds at every store revision.
 */

import type { Node, Placement, StoredObject, Workload, WorkloadPhase } from '@kubesim/shared';
import {
  ConflictError,
  ErrorCode,
  addResources,
  fitsWithin,
  formatResources,
  getFreeCapacity,
  isConflictError,
  subtractResources,
} from '@kubesim/shared';
import { transitionWorkload } from '../models/workload';
import type { ObjectStore } from './object-store';

/**
 * Default attempts for read-decide-commit steps
 */
export const DEFAULT_COMMIT_ATTEMPTS = 5;

/**
 * Run a read-decide-commit step, re-running it when it loses a revision race
 */
export function retryOnConflict<T>(step: () => T, attempts = DEFAULT_COMMIT_ATTEMPTS): T {
  for (let attempt = 1; ; attempt++) {
    try {
      return step();
    } catch (error) {
      if (!isConflictError(error) || !error.isRevisionConflict() || attempt >= attempts) {
        throw error;
      }
    }
  }
}

/**
 * Bind a Pending workload to a node.
 *
 * Both entries are the revisions the caller decided on. The node mutation
 * re-checks that the node is Ready with room for the request, so a stale
 * decision aborts the whole commit with a ConflictError.
 */
export function commitPlacement(
  store: ObjectStore,
  workload: StoredObject<'workload'>,
  node: StoredObject<'node'>,
): Placement {
  const request = workload.object.request;
  const now = new Date();
  const placement: Placement = {
    id: workload.id,
    workloadId: workload.id,
    nodeId: node.id,
    request: { ...request },
    createdAt: now,
  };

  store.transaction((tx) => {
    tx.update('workload', workload.id, workload.revision, (draft) => {
      if (draft.phase !== 'Pending') {
        throw ConflictError.invalidState('workload', draft.id, draft.phase, 'schedule');
      }
      return transitionWorkload(draft, 'Scheduled', `Scheduled on ${node.object.name}`, node.id, now);
    });

    tx.update('node', node.id, node.revision, (draft) => reserveCapacity(draft, request, now));

    tx.create('placement', placement);
  });

  return placement;
}

function reserveCapacity(node: Node, request: Workload['request'], now: Date): Node {
  if (node.phase !== 'Ready') {
    throw ConflictError.invalidState('node', node.id, node.phase, 'place a workload on');
  }
  if (!fitsWithin(request, getFreeCapacity(node))) {
    throw new ConflictError(
      `Node '${node.id}' has ${formatResources(getFreeCapacity(node))} free, ${formatResources(request)} requested`,
      ErrorCode.INVALID_STATE,
      { resourceType: 'node', resourceId: node.id },
    );
  }
  return { ...node, allocated: addResources(node.allocated, request), updatedAt: now };
}

/**
 * Phase a workload leaves its node for
 */
export type ReleasePhase = Extract<WorkloadPhase, 'Pending' | 'Failed' | 'Terminated'>;

/**
 * Move a workload to `phase` and release its placement and node allocation in
 * one commit. `guard` sees the current workload; returning false skips the
 * commit. Returns the updated entry, or null when the workload is gone or
 * the guard declined.
 */
export function releaseWorkload(
  store: ObjectStore,
  workloadId: string,
  phase: ReleasePhase,
  message: string,
  guard?: (workload: Workload) => boolean,
): StoredObject<'workload'> | null {
  return retryOnConflict(() => {
    const workload = store.find('workload', workloadId);
    if (!workload || (guard && !guard(workload.object))) {
      return null;
    }

    const placement = store.find('placement', workloadId);
    const node = placement ? store.find('node', placement.object.nodeId) : undefined;
    const now = new Date();

    store.transaction((tx) => {
      tx.update('workload', workload.id, workload.revision, (draft) =>
        transitionWorkload(draft, phase, message, null, now),
      );
      if (placement) {
        tx.delete('placement', placement.id, placement.revision);
        if (node) {
          tx.update('node', node.id, node.revision, (draft) => ({
            ...draft,
            allocated: subtractResources(draft.allocated, placement.object.request),
            updatedAt: now,
          }));
        }
      }
    });

    return store.find('workload', workloadId) ?? null;
  });
}

/**
 * Remove a placement whose workload no longer holds it and give the capacity
 * back to its node
 */
export function removePlacement(store: ObjectStore, placementId: string): boolean {
  return retryOnConflict(() => {
    const placement = store.find('placement', placementId);
    if (!placement) {
      return false;
    }
    const node = store.find('node', placement.object.nodeId);
    const now = new Date();

    store.transaction((tx) => {
      tx.delete('placement', placement.id, placement.revision);
      if (node) {
        tx.update('node', node.id, node.revision, (draft) => ({
          ...draft,
          allocated: subtractResources(draft.allocated, placement.object.request),
          updatedAt: now,
        }));
      }
    });
    return true;
  });
}
