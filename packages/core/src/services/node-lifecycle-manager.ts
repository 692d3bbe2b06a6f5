/**
 * Node lifecycle manager
 * Provisions, monitors and tears down the execution environment behind each
 * logical node, and starts/stops workload processes inside them.
 * @module @kubesim/core/services/node-lifecycle-manager
 */

import type {
  ContainerRuntime,
  HealthCheckSummary,
  Logger,
  Node,
  NodePhase,
  ProvisionNodeInput,
  StoredObject,
  UpdateNodeInput,
  Workload,
} from '@kubesim/shared';
import {
  ConflictError,
  ErrorCode,
  RuntimeError,
  createServiceLogger,
  errorMessage,
  fitsWithin,
  formatResources,
  isKubesimError,
  isNodeHosting,
  isRuntimeError,
  normalizeResources,
  withTimeout,
} from '@kubesim/shared';
import { createNodeObject, transitionNode } from '../models/node';
import type { ObjectStore } from '../stores/object-store';
import { releaseWorkload, retryOnConflict } from '../stores/placements';

// ============================================================================
// Types
// ============================================================================

/**
 * Node lifecycle manager options
 */
export interface NodeLifecycleManagerOptions {
  /** Upper bound on every runtime call in milliseconds (default: 30000) */
  runtimeTimeoutMs?: number;
  /** Consecutive missed health checks before a node fails (default: 3) */
  maxMissedHeartbeats?: number;
  /** Health check interval in milliseconds (default: 5000) */
  healthCheckIntervalMs?: number;
  /** Image for node environments (runtime default when omitted) */
  image?: string;
  /** Start health monitoring on construction */
  enableMonitoring?: boolean;
  /** Logger override */
  logger?: Logger;
}

/**
 * Outcome of draining or terminating a node
 */
export interface NodeEvictionResult {
  node: StoredObject<'node'>;
  /** Workloads returned to Pending */
  evicted: string[];
}

/**
 * Default options
 */
export const NODE_LIFECYCLE_DEFAULTS = {
  runtimeTimeoutMs: 30_000,
  maxMissedHeartbeats: 3,
  healthCheckIntervalMs: 5_000,
} as const;

// ============================================================================
// Node Lifecycle Manager
// ============================================================================

/**
 * Node lifecycle manager
 *
 * The only component that talks to the container runtime. Store writes are
 * read-decide-commit steps; no store state is held across a runtime call.
 */
export class NodeLifecycleManager {
  private readonly runtimeTimeoutMs: number;
  private readonly maxMissedHeartbeats: number;
  private readonly healthCheckIntervalMs: number;
  private readonly image?: string;
  private readonly logger: Logger;
  private healthCheckTimer: ReturnType<typeof setInterval> | null = null;
  private isCheckingHealth = false;

  constructor(
    private readonly store: ObjectStore,
    private readonly runtime: ContainerRuntime,
    options: NodeLifecycleManagerOptions = {},
  ) {
    this.runtimeTimeoutMs = options.runtimeTimeoutMs ?? NODE_LIFECYCLE_DEFAULTS.runtimeTimeoutMs;
    this.maxMissedHeartbeats = options.maxMissedHeartbeats ?? NODE_LIFECYCLE_DEFAULTS.maxMissedHeartbeats;
    this.healthCheckIntervalMs = options.healthCheckIntervalMs ?? NODE_LIFECYCLE_DEFAULTS.healthCheckIntervalMs;
    this.image = options.image;
    this.logger =
      options.logger ??
      createServiceLogger({ level: 'debug', service: 'kubesim' }, { component: 'node-lifecycle-manager' });

    if (options.enableMonitoring) {
      this.startMonitoring();
    }
  }

  /**
   * Name of the backing runtime
   */
  get runtimeName(): string {
    return this.runtime.name;
  }

  /**
   * Whether health monitoring is running
   */
  get isMonitoring(): boolean {
    return this.healthCheckTimer !== null;
  }

  // ===========================================================================
  // Provisioning
  // ===========================================================================

  /**
   * Provision a node: Pending → Provisioning → Ready.
   *
   * The node is in the store (Pending) before the first runtime call. On a
   * runtime failure or timeout it ends Failed, any half-created environment is
   * removed, and a RuntimeError is thrown.
   */
  async provision(input: ProvisionNodeInput): Promise<StoredObject<'node'>> {
    const node = createNodeObject(input);
    this.assertNameAvailable(node.name);
    this.store.create('node', node);

    this.logger.info('Provisioning node', {
      nodeId: node.id,
      nodeName: node.name,
      capacity: formatResources(node.capacity),
    });

    this.commitNode(node.id, (draft) => transitionNode(draft, 'Provisioning', 'Creating environment'));

    let handle: string | null = null;
    try {
      handle = await this.callRuntime(
        'createEnvironment',
        node.id,
        () =>
          this.runtime.createEnvironment({
            nodeId: node.id,
            name: node.name,
            capacity: node.capacity,
            image: this.image,
          }),
        async (lateHandle) => {
          this.logger.warn('Removing environment created after timeout', { nodeId: node.id, runtimeHandle: lateHandle });
          await this.cleanupEnvironment(node.id, lateHandle);
        },
      );
      const createdHandle = handle;
      this.commitNode(node.id, (draft) => {
        this.assertPhase(draft, 'Provisioning', 'record environment for');
        return { ...draft, runtimeHandle: createdHandle, message: 'Starting environment', updatedAt: new Date() };
      });

      await this.callRuntime('startEnvironment', node.id, () => this.runtime.startEnvironment(createdHandle));

      const alive = await this.callRuntime('isAlive', node.id, () => this.runtime.isAlive(createdHandle));
      if (!alive) {
        throw RuntimeError.refused('isAlive', 'environment is not running after start', { nodeId: node.id });
      }

      const ready = this.commitNode(node.id, (draft) => {
        this.assertPhase(draft, 'Provisioning', 'mark ready');
        return {
          ...transitionNode(draft, 'Ready', 'Environment running'),
          lastHeartbeat: new Date(),
          missedHeartbeats: 0,
        };
      });

      this.logger.info('Node ready', { nodeId: node.id, nodeName: node.name, runtimeHandle: createdHandle });
      return ready;
    } catch (error) {
      const failure = isKubesimError(error)
        ? error
        : RuntimeError.refused('provision', errorMessage(error), { nodeId: node.id }, error instanceof Error ? error : undefined);

      failure.meta.nodeId ??= node.id;
      this.logger.error('Node provisioning failed', failure, { nodeId: node.id, nodeName: node.name });
      const removed = handle ? await this.cleanupEnvironment(node.id, handle) : true;
      this.markFailed(node.id, `Provisioning failed: ${failure.message}`, removed);
      throw failure;
    }
  }

  // ===========================================================================
  // Draining and termination
  // ===========================================================================

  /**
   * Move a Ready node to Draining and evict its workloads. The environment
   * keeps running; evicted processes are stopped.
   */
  async drain(nodeId: string, expectedRevision?: number): Promise<NodeEvictionResult> {
    const entry = this.store.get('node', nodeId);
    this.assertRevision(entry, expectedRevision);
    if (entry.object.phase !== 'Ready' && entry.object.phase !== 'Draining') {
      throw ConflictError.invalidState('node', nodeId, entry.object.phase, 'drain');
    }

    const hosted = this.hostedWorkloads(nodeId);
    this.commitNode(nodeId, (draft) => transitionNode(draft, 'Draining', 'Draining'), expectedRevision);
    const evicted = this.evictWorkloads(nodeId, 'node draining');

    const handle = entry.object.runtimeHandle;
    if (handle) {
      await Promise.all(
        hosted
          .filter((workload) => evicted.includes(workload.id))
          .map((workload) => this.stopProcessQuietly(handle, workload.id, nodeId)),
      );
    }

    this.logger.info('Node drained', { nodeId, evicted: evicted.length });
    return { node: this.store.get('node', nodeId), evicted };
  }

  /**
   * Terminate a node: Draining, evict everything, stop and remove the
   * environment, then Deleted. A Deleted node is left as it is.
   */
  async terminate(nodeId: string, expectedRevision?: number): Promise<NodeEvictionResult> {
    const entry = this.store.get('node', nodeId);
    this.assertRevision(entry, expectedRevision);
    if (entry.object.phase === 'Deleted') {
      return { node: entry, evicted: [] };
    }

    this.logger.info('Terminating node', { nodeId, nodeName: entry.object.name, phase: entry.object.phase });

    this.commitNode(nodeId, (draft) => transitionNode(draft, 'Draining', 'Terminating'), expectedRevision);
    const evicted = this.evictWorkloads(nodeId, 'node terminating');

    const handle = this.store.get('node', nodeId).object.runtimeHandle;
    if (handle) {
      try {
        await this.callRuntime('stopEnvironment', nodeId, () => this.runtime.stopEnvironment(handle));
        await this.callRuntime('removeEnvironment', nodeId, () => this.runtime.removeEnvironment(handle));
      } catch (error) {
        const failure = isRuntimeError(error)
          ? error
          : RuntimeError.refused('terminate', errorMessage(error), { nodeId }, error instanceof Error ? error : undefined);
        this.logger.error('Node teardown failed', failure, { nodeId });
        this.markFailed(nodeId, `Teardown failed: ${failure.message}`, false);
        throw failure;
      }
    }

    const deleted = this.commitNode(nodeId, (draft) => ({
      ...transitionNode(draft, 'Deleted', 'Terminated'),
      runtimeHandle: null,
    }));

    this.logger.info('Node terminated', { nodeId, evicted: evicted.length });
    return { node: deleted, evicted };
  }

  /**
   * Return every workload bound to the node to Pending, releasing placements
   * and capacity. Returns the evicted workload ids.
   */
  evictWorkloads(nodeId: string, reason: string): string[] {
    const evicted: string[] = [];

    for (const workload of this.hostedWorkloads(nodeId)) {
      const updated = releaseWorkload(
        this.store,
        workload.id,
        'Pending',
        `Evicted: ${reason}`,
        (current) => current.nodeId === nodeId && (current.phase === 'Scheduled' || current.phase === 'Running'),
      );
      if (updated) {
        evicted.push(workload.id);
        this.logger.warn('Workload evicted', {
          workloadId: workload.id,
          workloadName: workload.name,
          nodeId,
          reason,
          previousPhase: workload.phase,
        });
      }
    }

    return evicted;
  }

  // ===========================================================================
  // Capacity and heartbeats
  // ===========================================================================

  /**
   * Change a node's capacity; it may not drop below what is allocated
   */
  updateCapacity(nodeId: string, input: UpdateNodeInput, expectedRevision?: number): StoredObject<'node'> {
    return this.commitNode(
      nodeId,
      (draft) => {
        if (draft.phase === 'Deleted') {
          throw ConflictError.invalidState('node', nodeId, draft.phase, 'update');
        }
        const capacity = normalizeResources({ ...draft.capacity, ...input.capacity });
        if (!fitsWithin(draft.allocated, capacity)) {
          throw new ConflictError(
            `Capacity ${formatResources(capacity)} is below the ${formatResources(draft.allocated)} allocated on node '${nodeId}'`,
            ErrorCode.INVALID_STATE,
            { resourceType: 'node', resourceId: nodeId },
          );
        }
        return { ...draft, capacity, updatedAt: new Date() };
      },
      expectedRevision,
    );
  }

  /**
   * Record a heartbeat reported by the node itself
   */
  recordHeartbeat(nodeId: string): StoredObject<'node'> {
    return this.commitNode(nodeId, (draft) => {
      if (!isNodeHosting(draft)) {
        throw ConflictError.invalidState('node', nodeId, draft.phase, 'record a heartbeat for');
      }
      return { ...draft, lastHeartbeat: new Date(), missedHeartbeats: 0 };
    });
  }

  /**
   * Check one node. Only Ready nodes are probed; a live answer resets the miss
   * count, a miss (false, error or timeout) increments it, and reaching the
   * threshold fails the node and evicts its workloads.
   */
  async healthCheck(nodeId: string): Promise<NodePhase> {
    const entry = this.store.get('node', nodeId);
    const handle = entry.object.runtimeHandle;
    if (entry.object.phase !== 'Ready') {
      return entry.object.phase;
    }

    let alive = false;
    if (handle) {
      try {
        alive = await this.callRuntime('isAlive', nodeId, () => this.runtime.isAlive(handle));
      } catch (error) {
        this.logger.warn('Health check failed', { nodeId, error: errorMessage(error) });
      }
    }

    const current = this.store.find('node', nodeId);
    if (!current || current.object.phase !== 'Ready') {
      return current ? current.object.phase : 'Deleted';
    }

    const updated = this.commitNode(nodeId, (draft) => {
      if (draft.phase !== 'Ready') {
        return draft;
      }
      if (alive) {
        return { ...draft, lastHeartbeat: new Date(), missedHeartbeats: 0 };
      }
      const missedHeartbeats = draft.missedHeartbeats + 1;
      if (missedHeartbeats >= this.maxMissedHeartbeats) {
        return {
          ...transitionNode(draft, 'Failed', `Missed ${missedHeartbeats} consecutive health checks`),
          missedHeartbeats,
        };
      }
      return { ...draft, missedHeartbeats, updatedAt: new Date() };
    });

    if (!alive) {
      this.logger.warn('Node missed health check', {
        nodeId,
        missedHeartbeats: updated.object.missedHeartbeats,
        threshold: this.maxMissedHeartbeats,
      });
    }

    if (updated.object.phase === 'Failed') {
      const evicted = this.evictWorkloads(nodeId, 'node failed health checks');
      this.logger.error('Node failed', { nodeId, evicted: evicted.length });
    }

    return updated.object.phase;
  }

  /**
   * Check every Ready node
   */
  async healthCheckAll(): Promise<HealthCheckSummary> {
    const ready = this.store.list('node', (node) => node.phase === 'Ready');
    const summary: HealthCheckSummary = { checked: ready.length, healthy: 0, missed: 0, failed: [] };

    const results = await Promise.allSettled(ready.map((entry) => this.healthCheck(entry.id)));
    results.forEach((result, index) => {
      const nodeId = ready[index]?.id ?? '';
      if (result.status === 'rejected') {
        this.logger.warn('Health check errored', { nodeId, error: errorMessage(result.reason) });
        return;
      }
      if (result.value === 'Failed') {
        summary.failed.push(nodeId);
        return;
      }
      const missed = this.store.find('node', nodeId)?.object.missedHeartbeats ?? 0;
      if (missed > 0) {
        summary.missed++;
      } else {
        summary.healthy++;
      }
    });

    return summary;
  }

  /**
   * Start periodic health checks; overlapping sweeps are skipped
   */
  startMonitoring(): void {
    if (this.healthCheckTimer) {
      return;
    }

    this.logger.info('Starting node health monitoring', {
      intervalMs: this.healthCheckIntervalMs,
      maxMissedHeartbeats: this.maxMissedHeartbeats,
    });

    this.healthCheckTimer = setInterval(() => {
      void this.runHealthSweep();
    }, this.healthCheckIntervalMs);
  }

  /**
   * Stop periodic health checks
   */
  stopMonitoring(): void {
    if (this.healthCheckTimer) {
      clearInterval(this.healthCheckTimer);
      this.healthCheckTimer = null;
      this.logger.info('Stopped node health monitoring');
    }
  }

  private async runHealthSweep(): Promise<void> {
    if (this.isCheckingHealth) {
      return;
    }
    this.isCheckingHealth = true;
    try {
      const summary = await this.healthCheckAll();
      if (summary.missed > 0 || summary.failed.length > 0) {
        this.logger.info('Health sweep completed', { ...summary });
      }
    } catch (error) {
      this.logger.error('Health sweep failed', error instanceof Error ? error : undefined);
    } finally {
      this.isCheckingHealth = false;
    }
  }

  // ===========================================================================
  // Workload processes
  // ===========================================================================

  /**
   * Launch a bound workload's process and confirm it is running
   */
  async startWorkload(workload: Workload): Promise<void> {
    const { handle, nodeId } = this.requireHostingNode(workload, 'launchWorkload');

    await this.callRuntime(
      'launchWorkload',
      nodeId,
      () =>
        this.runtime.launchWorkload(handle, {
          workloadId: workload.id,
          name: workload.name,
          request: workload.request,
          image: workload.image,
          command: workload.command,
        }),
      async () => {
        this.logger.warn('Stopping workload launched after timeout', { workloadId: workload.id, nodeId });
        await this.stopProcessQuietly(handle, workload.id, nodeId);
      },
    );

    const alive = await this.callRuntime('isWorkloadAlive', nodeId, () =>
      this.runtime.isWorkloadAlive(handle, workload.id),
    );
    if (!alive) {
      throw RuntimeError.refused('launchWorkload', 'process is not running after launch', {
        nodeId,
        workloadId: workload.id,
      });
    }

    this.logger.debug('Workload process started', { workloadId: workload.id, nodeId });
  }

  /**
   * Stop a workload's process on the node it is bound to
   */
  async stopWorkload(workload: Workload, nodeId: string | null = workload.nodeId): Promise<void> {
    if (!nodeId) {
      return;
    }
    const node = this.store.find('node', nodeId);
    const handle = node?.object.runtimeHandle;
    if (!node || !handle) {
      return;
    }
    await this.callRuntime('stopWorkload', nodeId, () => this.runtime.stopWorkload(handle, workload.id));
    this.logger.debug('Workload process stopped', { workloadId: workload.id, nodeId });
  }

  /**
   * Whether a workload's process is still running. A missing node or
   * environment counts as dead; runtime errors propagate.
   */
  async isWorkloadAlive(workload: Workload): Promise<boolean> {
    if (!workload.nodeId) {
      return false;
    }
    const node = this.store.find('node', workload.nodeId);
    const handle = node?.object.runtimeHandle;
    if (!node || !handle) {
      return false;
    }
    return this.callRuntime('isWorkloadAlive', workload.nodeId, () =>
      this.runtime.isWorkloadAlive(handle, workload.id),
    );
  }

  /**
   * Stop monitoring and release timers
   */
  dispose(): void {
    this.stopMonitoring();
    this.logger.info('NodeLifecycleManager disposed');
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  /**
   * Bound a runtime call by the runtime timeout, converting failures to
   * RuntimeError. After a timeout the call keeps running; when it later
   * succeeds, `undoLate` receives its result so whatever it created can be
   * torn down.
   */
  private async callRuntime<T>(
    operation: string,
    nodeId: string,
    call: () => Promise<T>,
    undoLate?: (result: T) => Promise<void>,
  ): Promise<T> {
    let pending: Promise<T> | undefined;
    try {
      pending = call();
      return await withTimeout(pending, this.runtimeTimeoutMs, operation);
    } catch (error) {
      if (isRuntimeError(error)) {
        if (pending && undoLate && error.isTimeout()) {
          this.undoWhenSettled(operation, nodeId, pending, undoLate);
        }
        throw error;
      }
      throw RuntimeError.refused(operation, errorMessage(error), { nodeId }, error instanceof Error ? error : undefined);
    }
  }

  /**
   * Read-decide-commit on a node, retried on revision conflicts. When
   * `expectedRevision` is given the first attempt uses it and a mismatch is
   * reported to the caller instead of retried.
   */
  private commitNode(
    nodeId: string,
    mutation: (draft: Node) => Node,
    expectedRevision?: number,
  ): StoredObject<'node'> {
    if (expectedRevision !== undefined) {
      this.store.update('node', nodeId, expectedRevision, mutation);
      return this.store.get('node', nodeId);
    }
    return retryOnConflict(() => {
      const entry = this.store.get('node', nodeId);
      this.store.update('node', nodeId, entry.revision, mutation);
      return this.store.get('node', nodeId);
    });
  }

  private markFailed(nodeId: string, message: string, environmentRemoved: boolean): void {
    const entry = this.store.find('node', nodeId);
    if (!entry || entry.object.phase === 'Deleted') {
      return;
    }
    this.commitNode(nodeId, (draft) => ({
      ...transitionNode(draft, 'Failed', message),
      runtimeHandle: environmentRemoved ? null : draft.runtimeHandle,
    }));
    this.evictWorkloads(nodeId, 'node failed');
  }

  /**
   * Best-effort removal of a half-created environment; returns whether it is gone
   */
  private undoWhenSettled<T>(
    operation: string,
    nodeId: string,
    pending: Promise<T>,
    undo: (result: T) => Promise<void>,
  ): void {
    void pending.then(undo, () => undefined).catch((error: unknown) => {
      this.logger.warn('Cleanup after timed out call failed', { nodeId, operation, error: errorMessage(error) });
    });
  }

  private async cleanupEnvironment(nodeId: string, handle: string): Promise<boolean> {
    let removed = true;
    try {
      await this.callRuntime('stopEnvironment', nodeId, () => this.runtime.stopEnvironment(handle));
    } catch (error) {
      this.logger.warn('Cleanup stop failed', { nodeId, runtimeHandle: handle, error: errorMessage(error) });
    }
    try {
      await this.callRuntime('removeEnvironment', nodeId, () => this.runtime.removeEnvironment(handle));
    } catch (error) {
      removed = false;
      this.logger.warn('Cleanup remove failed', { nodeId, runtimeHandle: handle, error: errorMessage(error) });
    }
    return removed;
  }

  private async stopProcessQuietly(handle: string, workloadId: string, nodeId: string): Promise<void> {
    try {
      await this.callRuntime('stopWorkload', nodeId, () => this.runtime.stopWorkload(handle, workloadId));
    } catch (error) {
      this.logger.warn('Failed to stop evicted workload', { nodeId, workloadId, error: errorMessage(error) });
    }
  }

  private hostedWorkloads(nodeId: string): Workload[] {
    return this.store
      .list('workload', (workload) => workload.nodeId === nodeId && (workload.phase === 'Scheduled' || workload.phase === 'Running'))
      .map((entry) => entry.object);
  }

  private requireHostingNode(workload: Workload, operation: string): { handle: string; nodeId: string } {
    if (!workload.nodeId) {
      throw ConflictError.invalidState('workload', workload.id, workload.phase, 'start an unbound');
    }
    const node = this.store.find('node', workload.nodeId);
    if (!node || !isNodeHosting(node.object) || !node.object.runtimeHandle) {
      throw RuntimeError.refused(operation, `node '${workload.nodeId}' is not hosting workloads`, {
        nodeId: workload.nodeId,
        workloadId: workload.id,
      });
    }
    return { handle: node.object.runtimeHandle, nodeId: node.id };
  }

  private assertNameAvailable(name: string): void {
    const taken = this.store.list('node', (node) => node.phase !== 'Deleted' && node.name === name);
    if (taken.length > 0) {
      throw ConflictError.alreadyExists('node', name);
    }
  }

  private assertPhase(node: Node, phase: NodePhase, operation: string): void {
    if (node.phase !== phase) {
      throw ConflictError.invalidState('node', node.id, node.phase, operation);
    }
  }

  private assertRevision(entry: StoredObject<'node'>, expectedRevision?: number): void {
    if (expectedRevision !== undefined && entry.revision !== expectedRevision) {
      throw ConflictError.revisionMismatch('node', entry.id, expectedRevision, entry.revision);
    }
  }
}

/**
 * Create a node lifecycle manager
 */
export function createNodeLifecycleManager(
  store: ObjectStore,
  runtime: ContainerRuntime,
  options?: NodeLifecycleManagerOptions,
): NodeLifecycleManager {
  return new NodeLifecycleManager(store, runtime, options);
}

