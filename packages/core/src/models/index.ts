/**
 * Object models
 * @module @kubesim/core/models
 */

export {
  NODE_TRANSITIONS,
  canTransitionNode,
  transitionNode,
  generateNodeName,
  createNodeObject,
} from './node';

export {
  WORKLOAD_TRANSITIONS,
  canTransitionWorkload,
  transitionWorkload,
  instanceName,
  createWorkloadInstances,
  cloneForResubmit,
} from './workload';
