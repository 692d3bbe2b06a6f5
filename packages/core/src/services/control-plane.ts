/**
 * Control plane
 * Owns one object store, one node lifecycle manager and one reconciler, and
 * exposes the cluster operations the API layer forwards to.
 * @module @kubesim/core/services/control-plane
 */

import type {
  ClusterStatus,
  ContainerRuntime,
  CreateWorkloadInput,
  Logger,
  NodeStatusSummary,
  StoredObject,
  UpdateWorkloadInput,
  WorkloadStatusSummary,
} from '@kubesim/shared';
import {
  ConflictError,
  DEFAULT_WORKLOAD_MEMORY,
  createServiceLogger,
  getFreeCapacity,
  isWorkloadActive,
  isWorkloadTerminal,
  normalizeResources,
} from '@kubesim/shared';
import { createWorkloadInstances } from '../models/workload';
import { ObjectStore } from '../stores/object-store';
import { NodeLifecycleManager, type NodeLifecycleManagerOptions } from './node-lifecycle-manager';
import { Reconciler, type ReconcilerOptions } from './reconciler';

/**
 * Control plane options
 */
export interface ControlPlaneOptions {
  /** Container runtime backing the nodes */
  runtime: ContainerRuntime;
  /** Node lifecycle manager options */
  nodes?: Omit<NodeLifecycleManagerOptions, 'enableMonitoring' | 'logger'>;
  /** Reconciler options */
  reconciler?: Omit<ReconcilerOptions, 'autoStart' | 'logger'>;
  /** Logger override */
  logger?: Logger;
}

/**
 * Control plane
 */
export class ControlPlane {
  readonly store: ObjectStore;
  readonly nodes: NodeLifecycleManager;
  readonly reconciler: Reconciler;
  private readonly logger: Logger;
  private started = false;

  constructor(options: ControlPlaneOptions) {
    this.logger =
      options.logger ?? createServiceLogger({ level: 'debug', service: 'kubesim' }, { component: 'control-plane' });
    this.store = new ObjectStore({ logger: this.logger.child({ component: 'object-store' }) });
    this.nodes = new NodeLifecycleManager(this.store, options.runtime, {
      ...options.nodes,
      logger: this.logger.child({ component: 'node-lifecycle-manager' }),
    });
    this.reconciler = new Reconciler(this.store, this.nodes, {
      ...options.reconciler,
      logger: this.logger.child({ component: 'reconciler' }),
    });
  }

  /**
   * Whether start() has been called without a matching stop()
   */
  get isStarted(): boolean {
    return this.started;
  }

  /**
   * Name of the container runtime
   */
  get runtimeName(): string {
    return this.nodes.runtimeName;
  }

  /**
   * Start health monitoring and the reconciliation loop
   */
  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    this.nodes.startMonitoring();
    this.reconciler.start();
    this.logger.info('Control plane started', { runtime: this.runtimeName });
  }

  /**
   * Stop background work and wait for the pass in progress
   */
  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    this.started = false;
    this.nodes.stopMonitoring();
    await this.reconciler.stop();
    this.logger.info('Control plane stopped');
  }

  // ===========================================================================
  // Workloads
  // ===========================================================================

  /**
   * Submit a workload: one Pending instance per replica, created in one commit
   */
  submitWorkload(input: CreateWorkloadInput): StoredObject<'workload'>[] {
    const instances = createWorkloadInstances(input);

    const names = new Set(instances.map((instance) => instance.name));
    const clash = this.store.list('workload', (workload) => !isWorkloadTerminal(workload) && names.has(workload.name));
    const taken = clash[0];
    if (taken) {
      throw ConflictError.alreadyExists('workload', taken.object.name);
    }

    this.store.transaction((tx) => {
      for (const instance of instances) {
        tx.create('workload', instance);
      }
    });

    this.logger.info('Workload submitted', {
      workloadName: input.name,
      replicas: instances.length,
      cpu: input.request.cpu,
      memory: input.request.memory ?? DEFAULT_WORKLOAD_MEMORY,
    });

    this.reconciler.wake();
    return instances.map((instance) => this.store.get('workload', instance.id));
  }

  /**
   * Change the request or command of a Pending workload
   */
  updateWorkload(workloadId: string, input: UpdateWorkloadInput, expectedRevision?: number): StoredObject<'workload'> {
    const entry = this.store.get('workload', workloadId);
    const revision = expectedRevision ?? entry.revision;

    this.store.update('workload', workloadId, revision, (draft) => {
      if (draft.phase !== 'Pending') {
        throw ConflictError.invalidState('workload', workloadId, draft.phase, 'update');
      }
      return {
        ...draft,
        request: normalizeResources({ ...draft.request, ...input.request }),
        command: input.command ?? draft.command,
        updatedAt: new Date(),
      };
    });

    return this.store.get('workload', workloadId);
  }

  /**
   * Terminate a workload if it is active, then remove it from the store
   */
  async deleteWorkload(workloadId: string, expectedRevision?: number): Promise<void> {
    const entry = this.store.get('workload', workloadId);
    if (expectedRevision !== undefined && entry.revision !== expectedRevision) {
      throw ConflictError.revisionMismatch('workload', workloadId, expectedRevision, entry.revision);
    }

    if (!isWorkloadTerminal(entry.object)) {
      await this.reconciler.terminateWorkload(workloadId);
    }

    const current = this.store.find('workload', workloadId);
    if (current) {
      this.store.delete('workload', workloadId, current.revision);
    }
    this.logger.info('Workload deleted', { workloadId });
  }

  // ===========================================================================
  // Status
  // ===========================================================================

  /**
   * Node row with free capacity and workload count
   */
  describeNode(entry: StoredObject<'node'>): NodeStatusSummary {
    const node = entry.object;
    return {
      id: node.id,
      name: node.name,
      phase: node.phase,
      revision: entry.revision,
      capacity: node.capacity,
      allocated: node.allocated,
      free: getFreeCapacity(node),
      workloadCount: this.store.list('workload', (workload) => workload.nodeId === node.id && isWorkloadActive(workload))
        .length,
      lastHeartbeat: node.lastHeartbeat,
      message: node.message,
    };
  }

  /**
   * Workload row with its scheduling status
   */
  describeWorkload(entry: StoredObject<'workload'>): WorkloadStatusSummary {
    const workload = entry.object;
    return {
      id: workload.id,
      name: workload.name,
      group: workload.group,
      phase: workload.phase,
      revision: entry.revision,
      request: workload.request,
      nodeId: workload.nodeId,
      message: workload.message,
      schedulingStatus: this.reconciler.getSchedulingStatus(workload.id),
    };
  }

  /**
   * Cluster status: non-deleted nodes, all workloads, totals
   */
  getStatus(): ClusterStatus {
    return {
      runtime: this.runtimeName,
      nodes: this.store.list('node', (node) => node.phase !== 'Deleted').map((entry) => this.describeNode(entry)),
      workloads: this.store.list('workload').map((entry) => this.describeWorkload(entry)),
      stats: this.store.stats.value,
      generatedAt: new Date(),
    };
  }
}

/**
 * Create a control plane
 */
export function createControlPlane(options: ControlPlaneOptions): ControlPlane {
  return new ControlPlane(options);
}
