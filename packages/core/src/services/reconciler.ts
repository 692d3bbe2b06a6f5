/**
 * Scheduler / reconciler
 * @module @kubesim/core/services/reconciler
 *
 * One pass converges the store and the runtime:
 * 1. consistency: orphan placements removed, allocations corrected, active
 *    workloads on nodes that no longer host them evicted
 * 2. drift: Running workloads whose process is gone move to Failed
 * 3. scheduling: Pending workloads (FIFO) placed first-fit on Ready nodes
 *    (ascending id)
 * 4. start: Scheduled workloads launched and confirmed Running
 *
 * A pass over converged state writes nothing.
 */

import type {
  ChangeEvent,
  Logger,
  ReconcileSummary,
  ResourceQuantity,
  SchedulingStatus,
  StoredObject,
  Workload,
} from '@kubesim/shared';
import {
  ConflictError,
  createServiceLogger,
  errorMessage,
  fitsWithin,
  formatResources,
  getFreeCapacity,
  isChangeOf,
  isConflictError,
  isNodeHosting,
  isNodeSchedulable,
  isRuntimeError,
  isWorkloadActive,
  isWorkloadTerminal,
  resourcesEqual,
  subtractResources,
  sumResources,
} from '@kubesim/shared';
import { cloneForResubmit, transitionWorkload } from '../models/workload';
import type { ObjectStore } from '../stores/object-store';
import { commitPlacement, releaseWorkload, removePlacement, retryOnConflict } from '../stores/placements';
import type { NodeLifecycleManager } from './node-lifecycle-manager';

// ============================================================================
// Types
// ============================================================================

/**
 * Reconciler options
 */
export interface ReconcilerOptions {
  /** Interval between periodic passes in milliseconds (default: 5000) */
  intervalMs?: number;
  /** Delay that coalesces wake-ups into one pass in milliseconds (default: 10) */
  wakeDebounceMs?: number;
  /** Start the periodic loop on construction (default: false) */
  autoStart?: boolean;
  /** Logger override */
  logger?: Logger;
}

/**
 * Node view used by the placement planner
 */
export interface PlannerNode {
  id: string;
  free: ResourceQuantity;
}

/**
 * One placement decision
 */
export interface PlacementDecision {
  workloadId: string;
  /** Chosen node, or null when nothing fits */
  nodeId: string | null;
}

/**
 * Default options
 */
export const RECONCILER_DEFAULTS = {
  intervalMs: 5_000,
  wakeDebounceMs: 10,
} as const;

// ============================================================================
// Placement policy
// ============================================================================

/**
 * First-fit placement. Workloads are taken in the given order and each goes to
 * the first node (in the given order) whose free CPU and memory both cover its
 * request. Pure: identical inputs give identical decisions.
 */
export function planPlacements(
  workloads: readonly Pick<Workload, 'id' | 'request'>[],
  nodes: readonly PlannerNode[],
): PlacementDecision[] {
  const free = nodes.map((node) => ({ id: node.id, free: { ...node.free } }));

  return workloads.map((workload) => {
    const target = free.find((node) => fitsWithin(workload.request, node.free));
    if (!target) {
      return { workloadId: workload.id, nodeId: null };
    }
    target.free = subtractResources(target.free, workload.request);
    return { workloadId: workload.id, nodeId: target.id };
  });
}

function emptySummary(): ReconcileSummary {
  return {
    scheduled: [],
    unschedulable: [],
    started: [],
    failed: [],
    evicted: [],
    orphansRemoved: [],
    conflicts: [],
    durationMs: 0,
  };
}

// ============================================================================
// Reconciler
// ============================================================================

/**
 * Scheduler / reconciler
 *
 * Passes are serialized per instance: a request during a pass queues exactly
 * one follow-up pass. Separate instances on one store stay safe because every
 * commit is revision checked.
 */
export class Reconciler {
  private readonly intervalMs: number;
  private readonly wakeDebounceMs: number;
  private readonly logger: Logger;
  private readonly schedulingStatus = new Map<string, SchedulingStatus>();
  private readonly starting = new Set<string>();
  private intervalTimer: ReturnType<typeof setInterval> | null = null;
  private wakeTimer: ReturnType<typeof setTimeout> | null = null;
  private unsubscribe: (() => void) | null = null;
  private current: Promise<ReconcileSummary> | null = null;
  private queued: Promise<ReconcileSummary> | null = null;
  private passCount = 0;

  constructor(
    private readonly store: ObjectStore,
    private readonly nodes: NodeLifecycleManager,
    options: ReconcilerOptions = {},
  ) {
    this.intervalMs = options.intervalMs ?? RECONCILER_DEFAULTS.intervalMs;
    this.wakeDebounceMs = options.wakeDebounceMs ?? RECONCILER_DEFAULTS.wakeDebounceMs;
    this.logger =
      options.logger ?? createServiceLogger({ level: 'debug', service: 'kubesim' }, { component: 'reconciler' });

    if (options.autoStart) {
      this.start();
    }
  }

  /**
   * Whether the periodic loop is running
   */
  get isRunning(): boolean {
    return this.intervalTimer !== null;
  }

  /**
   * Number of completed passes
   */
  get passes(): number {
    return this.passCount;
  }

  // ===========================================================================
  // Loop control
  // ===========================================================================

  /**
   * Start periodic passes and event-triggered wake-ups
   */
  start(): void {
    if (this.intervalTimer) {
      return;
    }

    this.logger.info('Starting reconciler', { intervalMs: this.intervalMs });

    this.unsubscribe = this.store.subscribe((event) => this.onChange(event));
    this.intervalTimer = setInterval(() => {
      this.runInBackground('interval');
    }, this.intervalMs);

    this.wake();
  }

  /**
   * Stop the loop and wait for the pass in progress
   */
  async stop(): Promise<void> {
    if (this.intervalTimer) {
      clearInterval(this.intervalTimer);
      this.intervalTimer = null;
    }
    if (this.wakeTimer) {
      clearTimeout(this.wakeTimer);
      this.wakeTimer = null;
    }
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = null;
    }

    const inFlight = this.queued ?? this.current;
    if (inFlight) {
      await inFlight.catch((error: unknown) => {
        this.logger.warn('Pass failed during shutdown', { error: errorMessage(error) });
      });
    }
    this.logger.info('Stopped reconciler');
  }

  /**
   * Request a pass soon; wake-ups within the debounce window coalesce
   */
  wake(): void {
    if (this.wakeTimer) {
      return;
    }
    this.wakeTimer = setTimeout(() => {
      this.wakeTimer = null;
      this.runInBackground('wake');
    }, this.wakeDebounceMs);
  }

  /**
   * Run one pass. If a pass is running, resolves with the single follow-up
   * pass queued behind it.
   */
  reconcile(): Promise<ReconcileSummary> {
    if (this.queued) {
      return this.queued;
    }
    if (this.current) {
      const next = this.current
        .then(
          () => undefined,
          () => undefined,
        )
        .then(() => {
          this.queued = null;
          return this.runPass();
        });
      this.queued = next;
      return next;
    }
    return this.runPass();
  }

  private runInBackground(trigger: string): void {
    void this.reconcile().catch((error: unknown) => {
      this.logger.error('Reconciliation pass failed', error instanceof Error ? error : undefined, { trigger });
    });
  }

  private runPass(): Promise<ReconcileSummary> {
    const pass: Promise<ReconcileSummary> = this.executePass().finally(() => {
      if (this.current === pass) {
        this.current = null;
      }
    });
    this.current = pass;
    return pass;
  }

  private onChange(event: ChangeEvent): void {
    if (isChangeOf(event, 'workload')) {
      if (event.type === 'deleted' || event.object.phase !== 'Pending') {
        this.schedulingStatus.delete(event.id);
      }
      const previous = event.previous;
      const newlyPending = event.object.phase === 'Pending' && (!previous || previous.phase !== 'Pending');
      const resized =
        event.object.phase === 'Pending' &&
        previous !== undefined &&
        !resourcesEqual(previous.request, event.object.request);
      if (event.type !== 'deleted' && (newlyPending || resized)) {
        this.wake();
      }
      return;
    }

    if (isChangeOf(event, 'node')) {
      const becameReady = event.object.phase === 'Ready' && event.previous?.phase !== 'Ready';
      const stoppedHosting = !isNodeHosting(event.object) && event.previous !== undefined && isNodeHosting(event.previous);
      const grew =
        event.previous !== undefined &&
        (event.object.capacity.cpu > event.previous.capacity.cpu ||
          event.object.capacity.memory > event.previous.capacity.memory);
      if (becameReady || stoppedHosting || grew) {
        this.wake();
      }
      return;
    }

    if (event.type === 'deleted') {
      this.wake();
    }
  }

  // ===========================================================================
  // Pass
  // ===========================================================================

  private async executePass(): Promise<ReconcileSummary> {
    const startedAt = Date.now();
    const summary = emptySummary();

    this.restoreConsistency(summary);
    await this.detectDeadProcesses(summary);
    this.schedulePending(summary);
    await this.startScheduled(summary);

    summary.durationMs = Date.now() - startedAt;
    this.passCount++;

    const changed =
      summary.scheduled.length +
      summary.started.length +
      summary.failed.length +
      summary.evicted.length +
      summary.orphansRemoved.length;
    if (changed > 0) {
      this.logger.info('Reconciliation pass completed', {
        scheduled: summary.scheduled.length,
        started: summary.started.length,
        failed: summary.failed.length,
        evicted: summary.evicted.length,
        orphansRemoved: summary.orphansRemoved.length,
        unschedulable: summary.unschedulable.length,
        durationMs: summary.durationMs,
      });
    }

    return summary;
  }

  /**
   * Remove placements no workload holds, evict active workloads whose node
   * stopped hosting, and correct node allocations that drifted from their
   * placements
   */
  private restoreConsistency(summary: ReconcileSummary): void {
    for (const placement of this.store.list('placement')) {
      const workload = this.store.find('workload', placement.object.workloadId)?.object;
      const held = workload && isWorkloadActive(workload) && workload.nodeId === placement.object.nodeId;
      if (!held && removePlacement(this.store, placement.id)) {
        summary.orphansRemoved.push(placement.id);
        this.logger.warn('Removed orphan placement', {
          placementId: placement.id,
          nodeId: placement.object.nodeId,
        });
      }
    }

    for (const entry of this.store.list('workload', isWorkloadActive)) {
      const workload = entry.object;
      const node = workload.nodeId ? this.store.find('node', workload.nodeId) : undefined;
      const hasPlacement = this.store.find('placement', workload.id) !== undefined;
      if (node && isNodeHosting(node.object) && hasPlacement) {
        continue;
      }

      const reason = !node
        ? `node '${workload.nodeId ?? 'none'}' no longer exists`
        : !hasPlacement
          ? 'placement missing'
          : `node '${node.object.name}' is ${node.object.phase}`;
      const evicted = releaseWorkload(
        this.store,
        workload.id,
        'Pending',
        `Evicted: ${reason}`,
        (current) => isWorkloadActive(current) && current.nodeId === workload.nodeId,
      );
      if (evicted) {
        summary.evicted.push(workload.id);
        this.logger.warn('Workload evicted', { workloadId: workload.id, nodeId: workload.nodeId, reason });
      }
    }

    const placements = this.store.list('placement');
    for (const node of this.store.list('node', (candidate) => candidate.phase !== 'Deleted')) {
      const allocated = sumResources(
        placements.filter((placement) => placement.object.nodeId === node.id).map((placement) => placement.object.request),
      );
      if (!resourcesEqual(allocated, node.object.allocated)) {
        retryOnConflict(() => {
          const current = this.store.get('node', node.id);
          this.store.update('node', node.id, current.revision, (draft) => ({ ...draft, allocated, updatedAt: new Date() }));
        });
        this.logger.warn('Corrected node allocation', { nodeId: node.id, allocated: formatResources(allocated) });
      }
    }
  }

  /**
   * Fail Running workloads whose process the runtime reports dead
   */
  private async detectDeadProcesses(summary: ReconcileSummary): Promise<void> {
    const running = this.store.list('workload', (workload) => workload.phase === 'Running');

    await Promise.all(
      running.map(async ({ object: workload }) => {
        let alive: boolean;
        try {
          alive = await this.nodes.isWorkloadAlive(workload);
        } catch (error) {
          this.logger.warn('Could not check workload process', {
            workloadId: workload.id,
            nodeId: workload.nodeId,
            error: errorMessage(error),
          });
          return;
        }
        if (alive) {
          return;
        }

        const failed = releaseWorkload(
          this.store,
          workload.id,
          'Failed',
          'Process exited',
          (current) => current.phase === 'Running' && current.nodeId === workload.nodeId,
        );
        if (failed) {
          summary.failed.push(workload.id);
          this.logger.warn('Workload process died', { workloadId: workload.id, nodeId: workload.nodeId });
        }
      }),
    );
  }

  /**
   * Place Pending workloads, FIFO, first-fit over Ready nodes by ascending id
   */
  private schedulePending(summary: ReconcileSummary): void {
    const pending = this.store.list('workload', (workload) => workload.phase === 'Pending');
    const pendingIds = new Set(pending.map((entry) => entry.id));
    for (const id of this.schedulingStatus.keys()) {
      if (!pendingIds.has(id)) {
        this.schedulingStatus.delete(id);
      }
    }
    if (pending.length === 0) {
      return;
    }

    const ready = this.store
      .list('node', isNodeSchedulable)
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    const decisions = planPlacements(
      pending.map((entry) => entry.object),
      ready.map((entry) => ({ id: entry.id, free: getFreeCapacity(entry.object) })),
    );

    decisions.forEach((decision, index) => {
      const workload = pending[index];
      if (!workload) {
        return;
      }

      if (!decision.nodeId) {
        this.schedulingStatus.set(workload.id, {
          reason: 'CapacityUnavailable',
          message: `No Ready node has ${formatResources(workload.object.request)} free`,
          lastChecked: new Date(),
        });
        summary.unschedulable.push(workload.id);
        return;
      }

      // Earlier placements in this pass moved the node's revision on
      const node = this.store.find('node', decision.nodeId);
      if (!node) {
        summary.conflicts.push(workload.id);
        return;
      }

      try {
        commitPlacement(this.store, workload, node);
        this.schedulingStatus.delete(workload.id);
        summary.scheduled.push(workload.id);
        this.logger.info('Workload scheduled', {
          workloadId: workload.id,
          workloadName: workload.object.name,
          nodeId: node.id,
        });
      } catch (error) {
        if (!isConflictError(error)) {
          throw error;
        }
        summary.conflicts.push(workload.id);
        this.logger.debug('Placement lost a race; retrying next pass', {
          workloadId: workload.id,
          nodeId: node.id,
          error: error.message,
        });
      }
    });
  }

  /**
   * Launch every Scheduled workload not already being started
   */
  private async startScheduled(summary: ReconcileSummary): Promise<void> {
    const scheduled = this.store.list(
      'workload',
      (workload) => workload.phase === 'Scheduled' && !this.starting.has(workload.id),
    );
    await Promise.allSettled(scheduled.map((entry) => this.startOne(entry, summary)));
  }

  private async startOne(entry: StoredObject<'workload'>, summary: ReconcileSummary): Promise<void> {
    const workload = entry.object;
    const nodeId = workload.nodeId;
    this.starting.add(workload.id);

    try {
      await this.nodes.startWorkload(workload);

      const running = retryOnConflict(() => {
        const current = this.store.find('workload', workload.id);
        if (!current || current.object.phase !== 'Scheduled' || current.object.nodeId !== nodeId) {
          return null;
        }
        this.store.update('workload', workload.id, current.revision, (draft) =>
          transitionWorkload(draft, 'Running', 'Process running'),
        );
        return this.store.get('workload', workload.id);
      });

      if (running) {
        summary.started.push(workload.id);
        this.logger.info('Workload running', { workloadId: workload.id, nodeId });
        return;
      }

      // Evicted or terminated while starting: the process has no placement
      const current = this.store.find('workload', workload.id)?.object;
      if (!current || current.phase !== 'Running' || current.nodeId !== nodeId) {
        await this.stopQuietly(workload, nodeId);
      }
    } catch (error) {
      if (!isRuntimeError(error)) {
        this.logger.error('Unexpected error starting workload', error instanceof Error ? error : undefined, {
          workloadId: workload.id,
        });
        return;
      }

      const failed = releaseWorkload(
        this.store,
        workload.id,
        'Failed',
        `Start failed: ${error.message}`,
        (current) => current.phase === 'Scheduled' && current.nodeId === nodeId,
      );
      if (failed) {
        summary.failed.push(workload.id);
        this.logger.warn('Workload failed to start', { workloadId: workload.id, nodeId, error: error.message });
      }
      // A refused or timed out launch may still have left a process behind
      await this.stopQuietly(workload, nodeId);
    } finally {
      this.starting.delete(workload.id);
    }
  }

  private async stopQuietly(workload: Workload, nodeId: string | null): Promise<void> {
    try {
      await this.nodes.stopWorkload(workload, nodeId);
    } catch (error) {
      this.logger.warn('Failed to stop workload process', {
        workloadId: workload.id,
        nodeId,
        error: errorMessage(error),
      });
    }
  }

  // ===========================================================================
  // Workload operations
  // ===========================================================================

  /**
   * Terminate a workload: release its placement, mark it Terminated, then stop
   * its process. Terminating a Terminated workload changes nothing.
   */
  async terminateWorkload(workloadId: string, expectedRevision?: number): Promise<StoredObject<'workload'>> {
    const entry = this.store.get('workload', workloadId);
    if (expectedRevision !== undefined && entry.revision !== expectedRevision) {
      throw ConflictError.revisionMismatch('workload', workloadId, expectedRevision, entry.revision);
    }
    if (entry.object.phase === 'Terminated') {
      return entry;
    }
    if (entry.object.phase === 'Failed') {
      throw ConflictError.invalidState('workload', workloadId, entry.object.phase, 'terminate');
    }

    const previous = entry.object;
    const terminated = releaseWorkload(
      this.store,
      workloadId,
      'Terminated',
      'Terminated by request',
      (current) => !isWorkloadTerminal(current),
    );
    if (!terminated) {
      return this.store.get('workload', workloadId);
    }
    this.schedulingStatus.delete(workloadId);

    if (isWorkloadActive(previous)) {
      await this.stopQuietly(previous, previous.nodeId);
    }

    this.logger.info('Workload terminated', { workloadId, previousPhase: previous.phase });
    return terminated;
  }

  /**
   * Clone a Failed or Terminated workload into a new Pending one
   */
  resubmitWorkload(workloadId: string): StoredObject<'workload'> {
    const entry = this.store.get('workload', workloadId);
    if (!isWorkloadTerminal(entry.object)) {
      throw ConflictError.invalidState('workload', workloadId, entry.object.phase, 'resubmit');
    }

    const clone = cloneForResubmit(entry.object);
    const active = this.store.list('workload', (workload) => !isWorkloadTerminal(workload) && workload.name === clone.name);
    if (active.length > 0) {
      throw ConflictError.alreadyExists('workload', clone.name);
    }

    this.store.create('workload', clone);
    this.logger.info('Workload resubmitted', { workloadId: clone.id, resubmittedFrom: workloadId });
    this.wake();
    return this.store.get('workload', clone.id);
  }

  /**
   * Why a Pending workload is still waiting, if a pass found no room for it
   */
  getSchedulingStatus(workloadId: string): SchedulingStatus | undefined {
    const status = this.schedulingStatus.get(workloadId);
    return status ? { ...status } : undefined;
  }

  /**
   * Stop timers and subscriptions
   */
  async dispose(): Promise<void> {
    await this.stop();
    this.schedulingStatus.clear();
  }
}

/**
 * Create a reconciler
 */
export function createReconciler(
  store: ObjectStore,
  nodes: NodeLifecycleManager,
  options?: ReconcilerOptions,
): Reconciler {
  return new Reconciler(store, nodes, options);
}
