/**
 * Unit tests for NodeLifecycleManager
 * @module @kubesim/core/tests/unit/node-lifecycle-manager
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { StoredObject, Workload } from '@kubesim/shared';
import { ConflictError, ErrorCode, RuntimeError } from '@kubesim/shared';
import { SimulatedRuntime } from '@kubesim/node-runtime';
import {
  NodeLifecycleManager,
  ObjectStore,
  commitPlacement,
  createNodeLifecycleManager,
  createWorkloadInstances,
} from '../../src';

describe('NodeLifecycleManager', () => {
  let store: ObjectStore;
  let runtime: SimulatedRuntime;
  let manager: NodeLifecycleManager;

  function place(nodeId: string, name: string, cpu = 1): Workload {
    const [workload] = createWorkloadInstances({ name, request: { cpu, memory: 128 } });
    if (!workload) throw new Error('no instance');
    store.create('workload', workload);
    commitPlacement(store, store.get('workload', workload.id), store.get('node', nodeId));
    return store.get('workload', workload.id).object;
  }

  async function placeRunning(node: StoredObject<'node'>, name: string): Promise<Workload> {
    const workload = place(node.id, name);
    await manager.startWorkload(workload);
    return workload;
  }

  beforeEach(() => {
    store = new ObjectStore();
    runtime = new SimulatedRuntime();
    manager = createNodeLifecycleManager(store, runtime, { runtimeTimeoutMs: 50, maxMissedHeartbeats: 2 });
  });

  afterEach(() => {
    manager.dispose();
  });

  describe('provision', () => {
    it('should bring a node to Ready behind a running environment', async () => {
      const node = await manager.provision({ name: 'alpha', capacity: { cpu: 4 } });

      expect(node.object).toMatchObject({
        name: 'alpha',
        phase: 'Ready',
        capacity: { cpu: 4, memory: 4096 },
        runtimeHandle: 'sim-1',
        missedHeartbeats: 0,
        message: 'Environment running',
      });
      expect(node.object.lastHeartbeat).toBeInstanceOf(Date);
      expect(runtime.getEnvironment('sim-1')).toMatchObject({
        state: 'running',
        spec: { nodeId: node.id, name: 'alpha', capacity: { cpu: 4, memory: 4096 } },
      });
    });

    it('should generate a name when none is given', async () => {
      const node = await manager.provision({ capacity: { cpu: 1 } });
      expect(node.object.name).toBe(`node-${node.id.slice(0, 8)}`);
    });

    it('should reject a name used by a live node', async () => {
      await manager.provision({ name: 'alpha', capacity: { cpu: 1 } });

      await expect(manager.provision({ name: 'alpha', capacity: { cpu: 1 } })).rejects.toThrow(
        "Node 'alpha' already exists",
      );
      expect(store.count('node')).toBe(1);
    });

    it('should allow reusing the name of a deleted node', async () => {
      const first = await manager.provision({ name: 'alpha', capacity: { cpu: 1 } });
      await manager.terminate(first.id);

      const second = await manager.provision({ name: 'alpha', capacity: { cpu: 1 } });
      expect(second.object.phase).toBe('Ready');
    });

    it('should mark the node Failed when the runtime refuses', async () => {
      runtime.refuse('createEnvironment', 'no capacity');

      const error = await manager.provision({ name: 'alpha', capacity: { cpu: 1 } }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RuntimeError);
      expect(error instanceof RuntimeError && error.message).toBe('Runtime createEnvironment failed: no capacity');
      const [node] = store.list('node');
      expect(node?.object).toMatchObject({
        phase: 'Failed',
        runtimeHandle: null,
        message: 'Provisioning failed: Runtime createEnvironment failed: no capacity',
      });
    });

    it('should remove a half-created environment', async () => {
      runtime.refuse('startEnvironment', 'image missing');

      await expect(manager.provision({ name: 'alpha', capacity: { cpu: 1 } })).rejects.toThrow('image missing');

      expect(runtime.listEnvironments()).toEqual([]);
      expect(store.list('node')[0]?.object).toMatchObject({ phase: 'Failed', runtimeHandle: null });
    });

    it('should fail when the environment is not alive after start', async () => {
      runtime.refuse('isAlive', 'unreachable', 1);

      await expect(manager.provision({ name: 'alpha', capacity: { cpu: 1 } })).rejects.toThrow(
        'Runtime isAlive failed: unreachable',
      );
      expect(store.list('node')[0]?.object.phase).toBe('Failed');
    });

    it('should time out a runtime call that never answers', async () => {
      runtime.hang('createEnvironment');

      const error = await manager.provision({ name: 'alpha', capacity: { cpu: 1 } }).catch((e: unknown) => e);

      expect(error instanceof RuntimeError && error.code).toBe(ErrorCode.RUNTIME_TIMEOUT);
      expect(error instanceof RuntimeError && error.message).toBe('Runtime createEnvironment timed out after 50ms');
      expect(store.list('node')[0]?.object.phase).toBe('Failed');
    });

    it('should remove an environment whose creation finishes after the timeout', async () => {
      runtime.delay('createEnvironment', 120);

      await expect(manager.provision({ name: 'alpha', capacity: { cpu: 1 } })).rejects.toThrow(
        'Runtime createEnvironment timed out after 50ms',
      );
      expect(store.list('node')[0]?.object).toMatchObject({ phase: 'Failed', runtimeHandle: null });

      await vi.waitFor(() => {
        expect(runtime.callCount('removeEnvironment')).toBe(1);
        expect(runtime.listEnvironments()).toEqual([]);
      });
    });
  });

  describe('drain', () => {
    it('should evict hosted workloads and stop their processes', async () => {
      const node = await manager.provision({ name: 'alpha', capacity: { cpu: 4 } });
      const w1 = await placeRunning(node, 'w1');
      const w2 = await placeRunning(node, 'w2');

      const result = await manager.drain(node.id);

      expect(result.evicted).toEqual([w1.id, w2.id]);
      expect(result.node.object.phase).toBe('Draining');
      expect(result.node.object.allocated).toEqual({ cpu: 0, memory: 0 });
      expect(store.get('workload', w1.id).object).toMatchObject({
        phase: 'Pending',
        nodeId: null,
        message: 'Evicted: node draining',
      });
      expect(store.count('placement')).toBe(0);
      expect(runtime.getEnvironment('sim-1')).toMatchObject({ state: 'running', workloads: [] });
    });

    it('should refuse to drain a Failed node', async () => {
      runtime.refuse('createEnvironment', 'no capacity', 1);
      await manager.provision({ name: 'alpha', capacity: { cpu: 1 } }).catch(() => undefined);
      const [node] = store.list('node');
      if (!node) throw new Error('no node');

      await expect(manager.drain(node.id)).rejects.toThrow(`Cannot drain node '${node.id}' in phase Failed`);
    });
  });

  describe('terminate', () => {
    it('should evict, tear down and leave a Deleted tombstone', async () => {
      const node = await manager.provision({ name: 'alpha', capacity: { cpu: 4 } });
      const w1 = place(node.id, 'w1');

      const result = await manager.terminate(node.id);

      expect(result.evicted).toEqual([w1.id]);
      expect(result.node.object).toMatchObject({ phase: 'Deleted', runtimeHandle: null, message: 'Terminated' });
      expect(runtime.listEnvironments()).toEqual([]);
      expect(store.get('workload', w1.id).object.phase).toBe('Pending');
    });

    it('should leave a Deleted node alone', async () => {
      const node = await manager.provision({ name: 'alpha', capacity: { cpu: 4 } });
      const first = await manager.terminate(node.id);
      const revision = store.revision;

      const second = await manager.terminate(node.id);

      expect(second).toEqual({ node: first.node, evicted: [] });
      expect(store.revision).toBe(revision);
    });

    it('should check the expected revision', async () => {
      const node = await manager.provision({ name: 'alpha', capacity: { cpu: 4 } });

      await expect(manager.terminate(node.id, node.revision - 1)).rejects.toThrow(ConflictError);
      expect(store.get('node', node.id).object.phase).toBe('Ready');
    });

    it('should mark the node Failed when teardown fails', async () => {
      const node = await manager.provision({ name: 'alpha', capacity: { cpu: 4 } });
      runtime.refuse('removeEnvironment', 'device busy');

      await expect(manager.terminate(node.id)).rejects.toThrow('Runtime removeEnvironment failed: device busy');

      expect(store.get('node', node.id).object).toMatchObject({
        phase: 'Failed',
        runtimeHandle: 'sim-1',
        message: 'Teardown failed: Runtime removeEnvironment failed: device busy',
      });
    });

    it('should terminate a Failed node', async () => {
      const node = await manager.provision({ name: 'alpha', capacity: { cpu: 4 } });
      runtime.refuse('removeEnvironment', 'device busy', 1);
      await manager.terminate(node.id).catch(() => undefined);

      const result = await manager.terminate(node.id);

      expect(result.node.object.phase).toBe('Deleted');
      expect(runtime.listEnvironments()).toEqual([]);
    });
  });

  describe('updateCapacity', () => {
    it('should change capacity', async () => {
      const node = await manager.provision({ name: 'alpha', capacity: { cpu: 2 } });

      const updated = manager.updateCapacity(node.id, { capacity: { cpu: 6 } }, node.revision);

      expect(updated.object.capacity).toEqual({ cpu: 6, memory: 4096 });
      expect(updated.revision).toBe(node.revision + 1);
    });

    it('should not drop below what is allocated', async () => {
      const node = await manager.provision({ name: 'alpha', capacity: { cpu: 2 } });
      place(node.id, 'w1');

      expect(() => manager.updateCapacity(node.id, { capacity: { cpu: 0.5 } })).toThrow(
        `Capacity 0.5 cpu, 4096 MiB is below the 1 cpu, 128 MiB allocated on node '${node.id}'`,
      );
    });

    it('should reject a stale revision', async () => {
      const node = await manager.provision({ name: 'alpha', capacity: { cpu: 2 } });
      manager.updateCapacity(node.id, { capacity: { memory: 2048 } });

      expect(() => manager.updateCapacity(node.id, { capacity: { cpu: 3 } }, node.revision)).toThrow(
        `Node '${node.id}' is at revision ${node.revision + 1}, expected ${node.revision}`,
      );
    });
  });

  describe('health', () => {
    it('should reset misses on a heartbeat', async () => {
      const node = await manager.provision({ name: 'alpha', capacity: { cpu: 2 } });
      runtime.killEnvironment('sim-1');
      await manager.healthCheck(node.id);
      expect(store.get('node', node.id).object.missedHeartbeats).toBe(1);

      expect(manager.recordHeartbeat(node.id).object.missedHeartbeats).toBe(0);
    });

    it('should refuse heartbeats from a Deleted node', async () => {
      const node = await manager.provision({ name: 'alpha', capacity: { cpu: 2 } });
      await manager.terminate(node.id);

      expect(() => manager.recordHeartbeat(node.id)).toThrow(
        `Cannot record a heartbeat for node '${node.id}' in phase Deleted`,
      );
    });

    it('should fail a node after the miss threshold and evict its workloads', async () => {
      const node = await manager.provision({ name: 'alpha', capacity: { cpu: 2 } });
      const w1 = place(node.id, 'w1');
      runtime.killEnvironment('sim-1');

      expect(await manager.healthCheck(node.id)).toBe('Ready');
      expect(await manager.healthCheck(node.id)).toBe('Failed');

      expect(store.get('node', node.id).object).toMatchObject({
        phase: 'Failed',
        missedHeartbeats: 2,
        message: 'Missed 2 consecutive health checks',
      });
      expect(store.get('workload', w1.id).object).toMatchObject({
        phase: 'Pending',
        message: 'Evicted: node failed health checks',
      });
    });

    it('should count a runtime error as a miss', async () => {
      const node = await manager.provision({ name: 'alpha', capacity: { cpu: 2 } });
      runtime.refuse('isAlive', 'socket closed', 1);

      expect(await manager.healthCheck(node.id)).toBe('Ready');
      expect(store.get('node', node.id).object.missedHeartbeats).toBe(1);
    });

    it('should not probe nodes that are not Ready', async () => {
      const node = await manager.provision({ name: 'alpha', capacity: { cpu: 2 } });
      await manager.drain(node.id);
      const calls = runtime.callCount('isAlive');

      expect(await manager.healthCheck(node.id)).toBe('Draining');
      expect(runtime.callCount('isAlive')).toBe(calls);
    });

    it('should summarise a sweep', async () => {
      await manager.provision({ name: 'alpha', capacity: { cpu: 2 } });
      await manager.provision({ name: 'beta', capacity: { cpu: 2 } });
      runtime.killEnvironment('sim-2');

      expect(await manager.healthCheckAll()).toEqual({ checked: 2, healthy: 1, missed: 1, failed: [] });
    });

    it('should sweep on an interval while monitoring', async () => {
      const node = await manager.provision({ name: 'alpha', capacity: { cpu: 2 } });
      const monitored = new NodeLifecycleManager(store, runtime, {
        healthCheckIntervalMs: 10,
        maxMissedHeartbeats: 100,
        enableMonitoring: true,
      });
      runtime.killEnvironment('sim-1');

      expect(monitored.isMonitoring).toBe(true);
      await vi.waitFor(() => {
        expect(store.get('node', node.id).object.missedHeartbeats).toBeGreaterThanOrEqual(2);
      });

      monitored.dispose();
      expect(monitored.isMonitoring).toBe(false);
    });
  });

  describe('workload processes', () => {
    it('should start, probe and stop a process', async () => {
      const node = await manager.provision({ name: 'alpha', capacity: { cpu: 2 } });
      const workload = place(node.id, 'w1');

      await manager.startWorkload(workload);
      expect(await manager.isWorkloadAlive(workload)).toBe(true);

      await manager.stopWorkload(workload);
      expect(await manager.isWorkloadAlive(workload)).toBe(false);
    });

    it('should refuse to start an unbound workload', async () => {
      const [workload] = createWorkloadInstances({ name: 'w1', request: { cpu: 1 } });
      if (!workload) throw new Error('no instance');

      await expect(manager.startWorkload(workload)).rejects.toThrow(
        `Cannot start an unbound workload '${workload.id}' in phase Pending`,
      );
    });

    it('should surface a launch refusal as RuntimeError', async () => {
      const node = await manager.provision({ name: 'alpha', capacity: { cpu: 2 } });
      const workload = place(node.id, 'w1');
      runtime.refuse('launchWorkload', 'exec failed');

      await expect(manager.startWorkload(workload)).rejects.toBeInstanceOf(RuntimeError);
    });

    it('should treat a workload without a node as dead', async () => {
      const [workload] = createWorkloadInstances({ name: 'w1', request: { cpu: 1 } });
      if (!workload) throw new Error('no instance');

      expect(await manager.isWorkloadAlive(workload)).toBe(false);
    });
  });
});
