/**
 * Node model: construction and phase transitions
 * @module @kubesim/core/models/node
 */

import { randomUUID } from 'node:crypto';
import type { Node, NodePhase, ProvisionNodeInput } from '@kubesim/shared';
import { ConflictError, DEFAULT_NODE_MEMORY, ZERO_RESOURCES, fromMillicores, toMillicores } from '@kubesim/shared';

/**
 * Allowed node phase transitions
 */
export const NODE_TRANSITIONS: Readonly<Record<NodePhase, readonly NodePhase[]>> = {
  Pending: ['Provisioning', 'Failed', 'Draining'],
  Provisioning: ['Ready', 'Failed', 'Draining'],
  Ready: ['Draining', 'Failed'],
  Draining: ['Deleted', 'Failed'],
  Failed: ['Draining', 'Deleted'],
  Deleted: [],
};

/**
 * Whether a node may move from one phase to another
 */
export function canTransitionNode(from: NodePhase, to: NodePhase): boolean {
  return from === to || NODE_TRANSITIONS[from].includes(to);
}

/**
 * Return the node moved to `phase`, or throw ConflictError when the
 * transition is not allowed
 */
export function transitionNode(node: Node, phase: NodePhase, message?: string, now = new Date()): Node {
  if (!canTransitionNode(node.phase, phase)) {
    throw ConflictError.invalidState('node', node.id, node.phase, `move to ${phase}`);
  }
  if (node.phase === phase && node.message === message) {
    return node;
  }
  return { ...node, phase, message, updatedAt: now };
}

/**
 * Default node name derived from its id
 */
export function generateNodeName(id: string): string {
  return `node-${id.slice(0, 8)}`;
}

/**
 * Build a new Pending node
 */
export function createNodeObject(input: ProvisionNodeInput, id: string = randomUUID()): Node {
  const now = new Date();
  return {
    id,
    name: input.name ?? generateNodeName(id),
    capacity: {
      cpu: fromMillicores(toMillicores(input.capacity.cpu)),
      memory: input.capacity.memory ?? DEFAULT_NODE_MEMORY,
    },
    allocated: { ...ZERO_RESOURCES },
    phase: 'Pending',
    runtimeHandle: null,
    lastHeartbeat: null,
    missedHeartbeats: 0,
    createdAt: now,
    updatedAt: now,
  };
}
