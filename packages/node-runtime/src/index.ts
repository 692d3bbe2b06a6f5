/**
 * kubesim - Node Runtime
 * Container runtimes that back kubesim nodes
 * @module @kubesim/node-runtime
 */

export * from './adapters/index.js';

export type { ContainerRuntime, EnvironmentSpec, WorkloadProcessSpec } from '@kubesim/shared';
