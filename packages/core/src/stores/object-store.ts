/**
 * Reactive object store - the authoritative registry of cluster objects
 * @module @kubesim/core/stores/object-store
 *
 * Every operation is synchronous, so each one (and each transaction) is
 * atomic on the event loop. Objects are versioned per entry; writers name the
 * revision they read and lose with a ConflictError when it moved on.
 */

import { isDeepStrictEqual } from 'node:util';
import { computed, ref, shallowReactive, type ComputedRef, type Ref } from '@vue/reactivity';
import type {
  ChangeEvent,
  ClusterObjectMap,
  ClusterStats,
  KindChangeEvent,
  Logger,
  NodePhase,
  ObjectKind,
  StoredObject,
  WorkloadPhase,
} from '@kubesim/shared';
import {
  ConflictError,
  ErrorCode,
  KubesimError,
  NotFoundError,
  ZERO_RESOURCES,
  addResources,
  createServiceLogger,
  subtractResources,
} from '@kubesim/shared';

/**
 * Per-kind tables
 */
type Tables = { [K in ObjectKind]: Map<string, StoredObject<K>> };

/**
 * Object filter for list queries
 */
export type ObjectFilter<K extends ObjectKind> = (object: ClusterObjectMap[K]) => boolean;

/**
 * Mutation applied to a working copy of an object.
 * Returning an object deep-equal to the current one commits nothing.
 */
export type ObjectMutation<K extends ObjectKind> = (draft: ClusterObjectMap[K]) => ClusterObjectMap[K];

/**
 * Change listener
 */
export type ChangeListener = (event: ChangeEvent) => void;

/**
 * Result of a create
 */
export interface CreateResult {
  id: string;
  revision: number;
}

/**
 * Object store options
 */
export interface ObjectStoreOptions {
  logger?: Logger;
}

/**
 * A change validated against the store and waiting to be applied
 */
interface StagedChange {
  key: string;
  /** Re-check the precondition right before applying */
  verify: () => void;
  apply: (storeRevision: number) => ChangeEvent | null;
}

function keyOf(kind: ObjectKind, id: string): string {
  return `${kind}/${id}`;
}

function copyEntry<K extends ObjectKind>(entry: StoredObject<K>): StoredObject<K> {
  return { ...entry, object: structuredClone(entry.object) };
}

/**
 * Multi-object transaction. Every change is checked when it is staged; the
 * store applies all of them at once when the transaction function returns.
 */
export class StoreTransaction {
  private readonly staged: StagedChange[] = [];
  private readonly touched = new Set<string>();

  constructor(private readonly store: ObjectStore) {}

  /**
   * Stage a create
   */
  create<K extends ObjectKind>(kind: K, object: ClusterObjectMap[K]): void {
    this.claim(kind, object.id);
    this.staged.push(this.store.prepareCreate(kind, object));
  }

  /**
   * Stage a revision-checked update
   */
  update<K extends ObjectKind>(kind: K, id: string, expectedRevision: number, mutation: ObjectMutation<K>): void {
    this.claim(kind, id);
    this.staged.push(this.store.prepareUpdate(kind, id, expectedRevision, mutation));
  }

  /**
   * Stage a revision-checked delete
   */
  delete<K extends ObjectKind>(kind: K, id: string, expectedRevision: number): void {
    this.claim(kind, id);
    this.staged.push(this.store.prepareDelete(kind, id, expectedRevision));
  }

  /** @internal */
  get changes(): readonly StagedChange[] {
    return this.staged;
  }

  private claim(kind: ObjectKind, id: string): void {
    const key = keyOf(kind, id);
    if (this.touched.has(key)) {
      throw new KubesimError(`${key} is already staged in this transaction`, ErrorCode.INTERNAL_ERROR, {
        resourceType: kind,
        resourceId: id,
      });
    }
    this.touched.add(key);
  }
}

/**
 * Object store
 */
export class ObjectStore {
  private readonly tables: Tables = {
    node: shallowReactive(new Map<string, StoredObject<'node'>>()),
    workload: shallowReactive(new Map<string, StoredObject<'workload'>>()),
    placement: shallowReactive(new Map<string, StoredObject<'placement'>>()),
  };
  private readonly revisionRef: Ref<number> = ref(0);
  private sequence = 0;
  private readonly listeners = new Set<ChangeListener>();
  private readonly outbox: ChangeEvent[] = [];
  private delivering = false;
  private readonly logger: Logger;

  /**
   * Derived cluster statistics, recomputed when the tables change
   */
  readonly stats: ComputedRef<ClusterStats>;

  constructor(options: ObjectStoreOptions = {}) {
    this.logger = options.logger ?? createServiceLogger({ level: 'debug', service: 'kubesim' }, { component: 'object-store' });
    this.stats = computed(() => this.computeStats());
  }

  /**
   * Store-wide revision
   */
  get revision(): number {
    return this.revisionRef.value;
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  /**
   * Get an entry or throw NotFoundError
   */
  get<K extends ObjectKind>(kind: K, id: string): StoredObject<K> {
    return copyEntry(this.requireEntry(kind, id));
  }

  /**
   * Get an entry if it exists
   */
  find<K extends ObjectKind>(kind: K, id: string): StoredObject<K> | undefined {
    const entry = this.tables[kind].get(id);
    return entry ? copyEntry(entry) : undefined;
  }

  /**
   * List entries of a kind in creation order
   */
  list<K extends ObjectKind>(kind: K, filter?: ObjectFilter<K>): StoredObject<K>[] {
    const entries = [...this.tables[kind].values()].map(copyEntry);
    return entries
      .filter((entry) => !filter || filter(entry.object))
      .sort((a, b) => a.createdSequence - b.createdSequence);
  }

  /**
   * Count entries of a kind
   */
  count(kind: ObjectKind): number {
    return this.tables[kind].size;
  }

  // ===========================================================================
  // Writes
  // ===========================================================================

  /**
   * Create an object; a duplicate id throws ConflictError
   */
  create<K extends ObjectKind>(kind: K, object: ClusterObjectMap[K]): CreateResult {
    this.commit([this.prepareCreate(kind, object)]);
    return { id: object.id, revision: 1 };
  }

  /**
   * Update an object at `expectedRevision`; returns the resulting revision
   */
  update<K extends ObjectKind>(
    kind: K,
    id: string,
    expectedRevision: number,
    mutation: ObjectMutation<K>,
  ): number {
    this.commit([this.prepareUpdate(kind, id, expectedRevision, mutation)]);
    return this.requireEntry(kind, id).revision;
  }

  /**
   * Delete an object at `expectedRevision`
   */
  delete(kind: ObjectKind, id: string, expectedRevision: number): void {
    this.commit([this.prepareDelete(kind, id, expectedRevision)]);
  }

  /**
   * Run `fn` against a transaction and commit everything it staged, or
   * nothing if it throws
   */
  transaction<T>(fn: (tx: StoreTransaction) => T): T {
    const tx = new StoreTransaction(this);
    const result = fn(tx);
    this.commit(tx.changes);
    return result;
  }

  /**
   * Subscribe to change events; returns an unsubscribe function
   */
  subscribe(listener: ChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ===========================================================================
  // Staging (shared by single writes and transactions)
  // ===========================================================================

  /** @internal */
  prepareCreate<K extends ObjectKind>(kind: K, object: ClusterObjectMap[K]): StagedChange {
    const table = this.tables[kind];
    const id = object.id;
    if (table.has(id)) {
      throw ConflictError.alreadyExists(kind, id);
    }
    const value = structuredClone(object);

    return {
      key: keyOf(kind, id),
      verify: () => {
        if (table.has(id)) throw ConflictError.alreadyExists(kind, id);
      },
      apply: (storeRevision) => {
        const entry: StoredObject<K> = {
          kind,
          id,
          revision: 1,
          createdSequence: ++this.sequence,
          object: value,
        };
        table.set(id, entry);
        return this.toEvent('created', entry, storeRevision);
      },
    };
  }

  /** @internal */
  prepareUpdate<K extends ObjectKind>(
    kind: K,
    id: string,
    expectedRevision: number,
    mutation: ObjectMutation<K>,
  ): StagedChange {
    const table = this.tables[kind];
    const current = this.requireEntry(kind, id);
    if (current.revision !== expectedRevision) {
      throw ConflictError.revisionMismatch(kind, id, expectedRevision, current.revision);
    }

    const next = mutation(structuredClone(current.object));
    if (next.id !== id) {
      throw new KubesimError(`Mutation changed the id of ${kind} '${id}'`, ErrorCode.INTERNAL_ERROR, {
        resourceType: kind,
        resourceId: id,
      });
    }
    const unchanged = isDeepStrictEqual(next, current.object);
    const value = structuredClone(next);

    return {
      key: keyOf(kind, id),
      verify: () => this.verifyRevision(kind, id, current.revision),
      apply: (storeRevision) => {
        if (unchanged) {
          return null;
        }
        const entry: StoredObject<K> = { ...current, revision: current.revision + 1, object: value };
        table.set(id, entry);
        return this.toEvent('updated', entry, storeRevision, current.object);
      },
    };
  }

  /** @internal */
  prepareDelete<K extends ObjectKind>(kind: K, id: string, expectedRevision: number): StagedChange {
    const table = this.tables[kind];
    const current = this.requireEntry(kind, id);
    if (current.revision !== expectedRevision) {
      throw ConflictError.revisionMismatch(kind, id, expectedRevision, current.revision);
    }

    return {
      key: keyOf(kind, id),
      verify: () => this.verifyRevision(kind, id, current.revision),
      apply: (storeRevision) => {
        table.delete(id);
        return this.toEvent('deleted', current, storeRevision, current.object);
      },
    };
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private requireEntry<K extends ObjectKind>(kind: K, id: string): StoredObject<K> {
    const entry = this.tables[kind].get(id);
    if (!entry) {
      throw NotFoundError.object(kind, id);
    }
    return entry;
  }

  private verifyRevision(kind: ObjectKind, id: string, expectedRevision: number): void {
    const revision = this.requireEntry(kind, id).revision;
    if (revision !== expectedRevision) {
      throw ConflictError.revisionMismatch(kind, id, expectedRevision, revision);
    }
  }

  private toEvent<K extends ObjectKind>(
    type: ChangeEvent['type'],
    entry: StoredObject<K>,
    storeRevision: number,
    previous?: ClusterObjectMap[K],
  ): KindChangeEvent<K> {
    return {
      type,
      kind: entry.kind,
      id: entry.id,
      revision: entry.revision,
      storeRevision,
      object: structuredClone(entry.object),
      previous: previous === undefined ? undefined : structuredClone(previous),
    };
  }

  /**
   * Apply staged changes all-or-nothing: every precondition is verified
   * before the first change is applied.
   */
  private commit(changes: readonly StagedChange[]): void {
    if (changes.length === 0) {
      return;
    }

    for (const change of changes) {
      change.verify();
    }

    const storeRevision = this.revisionRef.value + 1;
    const events: ChangeEvent[] = [];
    for (const change of changes) {
      const event = change.apply(storeRevision);
      if (event) events.push(event);
    }

    if (events.length === 0) {
      return;
    }

    this.revisionRef.value = storeRevision;
    this.outbox.push(...events);
    this.deliver();
  }

  /**
   * Deliver queued events in commit order. Commits made by listeners are
   * queued behind the events currently being delivered.
   */
  private deliver(): void {
    if (this.delivering) {
      return;
    }
    this.delivering = true;
    try {
      let event = this.outbox.shift();
      while (event) {
        for (const listener of [...this.listeners]) {
          try {
            listener(event);
          } catch (error) {
            const meta = { kind: event.kind, resourceId: event.id, changeType: event.type };
            if (error instanceof Error) {
              this.logger.error('Change listener failed', error, meta);
            } else {
              this.logger.error('Change listener failed', { ...meta, error: String(error) });
            }
          }
        }
        event = this.outbox.shift();
      }
    } finally {
      this.delivering = false;
    }
  }

  private computeStats(): ClusterStats {
    const nodesByPhase: Record<NodePhase, number> = {
      Pending: 0,
      Provisioning: 0,
      Ready: 0,
      Draining: 0,
      Failed: 0,
      Deleted: 0,
    };
    const workloadsByPhase: Record<WorkloadPhase, number> = {
      Pending: 0,
      Scheduled: 0,
      Running: 0,
      Failed: 0,
      Terminated: 0,
    };

    let totalCapacity = { ...ZERO_RESOURCES };
    let totalAllocated = { ...ZERO_RESOURCES };

    for (const { object: node } of this.tables.node.values()) {
      nodesByPhase[node.phase]++;
      if (node.phase === 'Ready') {
        totalCapacity = addResources(totalCapacity, node.capacity);
        totalAllocated = addResources(totalAllocated, node.allocated);
      }
    }

    for (const { object: workload } of this.tables.workload.values()) {
      workloadsByPhase[workload.phase]++;
    }

    return {
      revision: this.revisionRef.value,
      nodesByPhase,
      workloadsByPhase,
      placementCount: this.tables.placement.size,
      totalCapacity,
      totalAllocated,
      totalFree: subtractResources(totalCapacity, totalAllocated),
    };
  }
}
