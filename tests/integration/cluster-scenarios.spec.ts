/**
 * End-to-end cluster scenarios: the HTTP API served on a loopback port,
 * driven through the CLI's API client, on the simulated runtime.
 * @module tests/integration/cluster-scenarios
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as os from 'node:os';
import * as path from 'node:path';
import type { AddressInfo } from 'node:net';
import { SimulatedRuntime } from '@kubesim/node-runtime';
import { createServer, type ServerInstance } from '@kubesim/server';
import {
  ApiRequestError,
  createApiClient,
  createProgram,
  type ApiClient,
  type NodeEvictionResponse,
  type NodeListResponse,
  type NodeResponse,
  type NodeView,
  type ReconcileResponse,
  type WorkloadListResponse,
  type WorkloadResponse,
  type WorkloadSubmitResponse,
  type WorkloadView,
} from '@kubesim/cli';

describe('Cluster scenarios', () => {
  let runtime: SimulatedRuntime;
  let server: ServerInstance;
  let client: ApiClient;
  let baseUrl: string;

  beforeEach(async () => {
    runtime = new SimulatedRuntime();
    server = createServer(runtime, {
      port: 0,
      host: '127.0.0.1',
      enableLogging: false,
      reconcileIntervalMs: 60_000,
      healthCheckIntervalMs: 60_000,
      maxMissedHeartbeats: 3,
      runtimeTimeoutMs: 1_000,
    });
    await server.start();

    const address = server.httpServer?.address();
    if (!address || typeof address === 'string') {
      throw new Error('server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${(address satisfies AddressInfo).port}`;
    client = createApiClient(baseUrl);
  });

  afterEach(async () => {
    await server.stop();
    vi.restoreAllMocks();
  });

  async function addNode(name: string, cpu: number): Promise<NodeView> {
    const { node } = await client.post<NodeResponse>('/api/nodes', { name, capacity: { cpu } });
    return node;
  }

  async function submit(name: string, cpu: number): Promise<WorkloadView> {
    const { workloads } = await client.post<WorkloadSubmitResponse>('/api/workloads', { name, request: { cpu } });
    const [instance] = workloads;
    if (!instance) {
      throw new Error(`no instance created for ${name}`);
    }
    return instance;
  }

  async function workload(id: string): Promise<WorkloadView> {
    const { workload: found } = await client.get<WorkloadResponse>(`/api/workloads/${id}`);
    return found;
  }

  async function reconcile(): Promise<void> {
    await client.post<ReconcileResponse>('/api/reconcile');
  }

  it('should place first-fit and leave what does not fit Pending', async () => {
    const a = await addNode('a', 4);
    const b = await addNode('b', 2);
    expect([a.phase, b.phase]).toEqual(['Ready', 'Ready']);

    const w1 = await submit('w1', 3);
    const w2 = await submit('w2', 3);
    await reconcile();

    expect(await workload(w1.id)).toMatchObject({ phase: 'Running', nodeId: a.id });
    expect(await workload(w2.id)).toMatchObject({
      phase: 'Pending',
      nodeId: null,
      schedulingStatus: { reason: 'CapacityUnavailable', message: 'No Ready node has 3 cpu, 128 MiB free' },
    });

    const { node: hostA } = await client.get<NodeResponse>(`/api/nodes/${a.id}`);
    expect(hostA).toMatchObject({ allocated: { cpu: 3, memory: 128 }, free: { cpu: 1, memory: 3968 }, workloadCount: 1 });
  });

  it('should return evicted workloads to Pending when their node is deleted', async () => {
    const a = await addNode('a', 4);
    await addNode('b', 2);
    const w1 = await submit('w1', 3);
    await reconcile();
    expect(await workload(w1.id)).toMatchObject({ phase: 'Running', nodeId: a.id });

    const { evicted } = await client.delete<NodeEvictionResponse>(`/api/nodes/${a.id}`);
    expect(evicted).toEqual([w1.id]);

    await reconcile();
    expect(await workload(w1.id)).toMatchObject({ phase: 'Pending', nodeId: null });

    const { nodes } = await client.get<NodeListResponse>('/api/nodes');
    expect(nodes.map((node) => node.name)).toEqual(['b']);
    expect(runtime.listEnvironments()).toHaveLength(1);
  });

  it('should fail a node that misses health checks and evict its workloads', async () => {
    const node = await addNode('a', 2);
    const w1 = await submit('w1', 1);
    await reconcile();
    expect(await workload(w1.id)).toMatchObject({ phase: 'Running', nodeId: node.id });

    const handle = server.controlPlane.store.get('node', node.id).object.runtimeHandle;
    if (!handle) {
      throw new Error('Ready node has no runtime handle');
    }
    runtime.killEnvironment(handle);

    for (let i = 0; i < 3; i++) {
      await server.controlPlane.nodes.healthCheckAll();
    }

    const { node: failed } = await client.get<NodeResponse>(`/api/nodes/${node.id}`);
    expect(failed).toMatchObject({ phase: 'Failed', message: 'Missed 3 consecutive health checks' });
    expect(await workload(w1.id)).toMatchObject({ phase: 'Pending', nodeId: null });
  });

  it('should reject a stale revision with 409', async () => {
    const node = await addNode('a', 2);

    const failure = await client
      .patch(`/api/nodes/${node.id}`, { capacity: { cpu: 4 } }, { ifMatch: node.revision + 5 })
      .catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(ApiRequestError);
    expect(failure).toMatchObject({ status: 409, code: 'CONFLICT' });
  });

  it('should terminate and resubmit a workload', async () => {
    await addNode('a', 2);
    const w1 = await submit('w1', 2);
    await reconcile();

    const { workload: terminated } = await client.post<WorkloadResponse>(`/api/workloads/${w1.id}/terminate`);
    expect(terminated).toMatchObject({ phase: 'Terminated', nodeId: null });

    const { workload: clone } = await client.post<WorkloadResponse>(`/api/workloads/${w1.id}/resubmit`);
    await reconcile();

    expect(await workload(clone.id)).toMatchObject({ name: 'w1', phase: 'Running' });
    const { workloads } = await client.get<WorkloadListResponse>('/api/workloads?phase=Terminated');
    expect(workloads.map((entry) => entry.id)).toEqual([w1.id]);
  });

  it('should serve the CLI', async () => {
    await addNode('a', 4);
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const program = createProgram({
      env: {},
      configFile: path.join(os.tmpdir(), 'kubesim-cli-missing', 'config.json'),
    });

    await program.parseAsync(['--api-url', baseUrl, '-o', 'plain', 'node', 'list'], { from: 'user' });

    const [row] = log.mock.calls.map((call) => String(call[0]));
    expect(row?.split('\t').slice(1, 6)).toEqual(['a', 'Ready', '4 cpu, 4096 MiB', '4 cpu, 4096 MiB', '0']);
  });
});
