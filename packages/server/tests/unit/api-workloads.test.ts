/**
 * Unit tests for Workload API endpoints
 * @module @kubesim/server/tests/unit/api-workloads
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Request, Response } from 'express';
import { ControlPlane } from '@kubesim/core';
import { SimulatedRuntime } from '@kubesim/node-runtime';
import { createWorkloadHandlers, type WorkloadHandlers } from '../../src/api/workloads.js';

/**
 * Create a mock Express request
 */
function createMockRequest(overrides: Partial<Request> = {}): Request {
  return {
    body: {},
    params: {},
    query: {},
    headers: {},
    ...overrides,
  } as unknown as Request;
}

/**
 * Create a mock Express response with spy functions
 */
function createMockResponse(): Response & { _json: unknown; _status: number } {
  const res = {
    _json: null as unknown,
    _status: 200,
    status(code: number) {
      this._status = code;
      return this;
    },
    json(data: unknown) {
      this._json = data;
      return this;
    },
    send() {
      return this;
    },
  };
  return res as unknown as Response & { _json: unknown; _status: number };
}

describe('Workload API Handlers', () => {
  let controlPlane: ControlPlane;
  let handlers: WorkloadHandlers;

  beforeEach(() => {
    controlPlane = new ControlPlane({
      runtime: new SimulatedRuntime(),
      nodes: { runtimeTimeoutMs: 100, healthCheckIntervalMs: 60_000 },
      reconciler: { intervalMs: 60_000, wakeDebounceMs: 60_000 },
    });
    handlers = createWorkloadHandlers(controlPlane);
  });

  afterEach(async () => {
    await controlPlane.reconciler.stop();
    controlPlane.nodes.dispose();
  });

  function submit(name: string, cpu = 1): string {
    const [entry] = controlPlane.submitWorkload({ name, request: { cpu } });
    if (!entry) {
      throw new Error('submit returned no instance');
    }
    return entry.id;
  }

  describe('POST /api/workloads - submitWorkload', () => {
    it('should return 400 when the name is missing', async () => {
      const res = createMockResponse();

      await handlers.submitWorkload(createMockRequest({ body: { request: { cpu: 1 } } }), res);

      expect(res._status).toBe(400);
      expect(res._json).toEqual({
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Validation failed',
          details: { name: { code: 'REQUIRED', message: 'Workload name is required' } },
        },
      });
    });

    it('should return 400 for a negative request', async () => {
      const res = createMockResponse();

      await handlers.submitWorkload(createMockRequest({ body: { name: 'web', request: { cpu: -1 } } }), res);

      expect(res._status).toBe(400);
      expect(res._json).toMatchObject({
        error: { details: { 'request.cpu': { code: 'INVALID_VALUE' } } },
      });
    });

    it('should create one Pending instance per replica', async () => {
      const res = createMockResponse();

      await handlers.submitWorkload(
        createMockRequest({ body: { name: 'web', request: { cpu: 1, memory: 256 }, replicas: 2 } }),
        res,
      );

      expect(res._status).toBe(201);
      expect(res._json).toMatchObject({
        success: true,
        data: {
          workloads: [
            { name: 'web-0', group: 'web', phase: 'Pending', revision: 1, request: { cpu: 1, memory: 256 }, nodeId: null },
            { name: 'web-1', group: 'web', phase: 'Pending', revision: 1, request: { cpu: 1, memory: 256 }, nodeId: null },
          ],
        },
      });
      expect(controlPlane.store.count('workload')).toBe(2);
    });

    it('should return 409 for a name an active workload holds', async () => {
      submit('web');
      const res = createMockResponse();

      await handlers.submitWorkload(createMockRequest({ body: { name: 'web', request: { cpu: 1 } } }), res);

      expect(res._status).toBe(409);
      expect(res._json).toMatchObject({
        error: { code: 'ALREADY_EXISTS', message: "Workload 'web' already exists" },
      });
    });
  });

  describe('GET /api/workloads - listWorkloads', () => {
    it('should filter by phase', async () => {
      submit('web');
      const batch = submit('batch');
      await controlPlane.reconciler.terminateWorkload(batch);

      const res = createMockResponse();
      await handlers.listWorkloads(createMockRequest({ query: { phase: 'Terminated' } }), res);

      expect(res._json).toMatchObject({ data: { total: 1, workloads: [{ id: batch, name: 'batch' }] } });
    });

    it('should filter by node', async () => {
      const node = await controlPlane.nodes.provision({ name: 'alpha', capacity: { cpu: 4 } });
      const web = submit('web');
      submit('huge', 16);
      await controlPlane.reconciler.reconcile();

      const res = createMockResponse();
      await handlers.listWorkloads(createMockRequest({ query: { nodeId: node.id } }), res);

      expect(res._json).toMatchObject({
        data: { total: 1, workloads: [{ id: web, phase: 'Running', nodeId: node.id }] },
      });
    });

    it('should return 400 for a malformed nodeId and an unknown phase', async () => {
      const res = createMockResponse();

      await handlers.listWorkloads(createMockRequest({ query: { phase: 'Sleeping', nodeId: 'n1' } }), res);

      expect(res._status).toBe(400);
      expect(res._json).toMatchObject({
        error: {
          details: {
            phase: { code: 'INVALID_VALUE' },
            nodeId: { code: 'INVALID_FORMAT', message: 'nodeId must be a valid UUID' },
          },
        },
      });
    });
  });

  describe('GET /api/workloads/:id - getWorkload', () => {
    it('should include the scheduling status of an unschedulable workload', async () => {
      const id = submit('huge', 16);
      await controlPlane.reconciler.reconcile();
      const res = createMockResponse();

      await handlers.getWorkload(createMockRequest({ params: { id } }), res);

      expect(res._status).toBe(200);
      expect(res._json).toMatchObject({
        data: {
          workload: {
            id,
            phase: 'Pending',
            schedulingStatus: {
              reason: 'CapacityUnavailable',
              message: 'No Ready node has 16 cpu, 128 MiB free',
            },
          },
        },
      });
    });
  });

  describe('PATCH /api/workloads/:id - updateWorkload', () => {
    it('should resize a Pending workload', async () => {
      const id = submit('web');
      const res = createMockResponse();

      await handlers.updateWorkload(createMockRequest({ params: { id }, body: { request: { cpu: 2 } } }), res);

      expect(res._status).toBe(200);
      expect(res._json).toMatchObject({ data: { workload: { request: { cpu: 2, memory: 128 }, revision: 2 } } });
    });

    it('should return 409 for a Running workload', async () => {
      await controlPlane.nodes.provision({ name: 'alpha', capacity: { cpu: 4 } });
      const id = submit('web');
      await controlPlane.reconciler.reconcile();
      const res = createMockResponse();

      await handlers.updateWorkload(createMockRequest({ params: { id }, body: { request: { cpu: 2 } } }), res);

      expect(res._status).toBe(409);
      expect(res._json).toMatchObject({
        error: { code: 'INVALID_STATE', message: `Cannot update workload '${id}' in phase Running` },
      });
    });
  });

  describe('POST /api/workloads/:id/terminate - terminateWorkload', () => {
    it('should terminate and free the node', async () => {
      const node = await controlPlane.nodes.provision({ name: 'alpha', capacity: { cpu: 4 } });
      const id = submit('web', 3);
      await controlPlane.reconciler.reconcile();
      const res = createMockResponse();

      await handlers.terminateWorkload(createMockRequest({ params: { id } }), res);

      expect(res._status).toBe(200);
      expect(res._json).toMatchObject({ data: { workload: { id, phase: 'Terminated', nodeId: null } } });
      expect(controlPlane.store.get('node', node.id).object.allocated.cpu).toBe(0);
    });

    it('should return 409 when If-Match is stale', async () => {
      const id = submit('web');
      const res = createMockResponse();

      await handlers.terminateWorkload(createMockRequest({ params: { id }, headers: { 'if-match': 'W/"7"' } }), res);

      expect(res._status).toBe(409);
      expect(res._json).toMatchObject({
        error: { code: 'CONFLICT', message: `Workload '${id}' is at revision 1, expected 7` },
      });
      expect(controlPlane.store.get('workload', id).object.phase).toBe('Pending');
    });
  });

  describe('POST /api/workloads/:id/resubmit - resubmitWorkload', () => {
    it('should clone a terminated workload', async () => {
      const id = submit('web');
      await controlPlane.reconciler.terminateWorkload(id);
      const res = createMockResponse();

      await handlers.resubmitWorkload(createMockRequest({ params: { id } }), res);

      expect(res._status).toBe(201);
      expect(res._json).toMatchObject({ data: { workload: { name: 'web', phase: 'Pending', revision: 1 } } });
      expect(controlPlane.store.count('workload')).toBe(2);
    });

    it('should return 409 for a workload that is still Pending', async () => {
      const id = submit('web');
      const res = createMockResponse();

      await handlers.resubmitWorkload(createMockRequest({ params: { id } }), res);

      expect(res._status).toBe(409);
      expect(res._json).toMatchObject({
        error: { code: 'INVALID_STATE', message: `Cannot resubmit workload '${id}' in phase Pending` },
      });
    });
  });

  describe('DELETE /api/workloads/:id - deleteWorkload', () => {
    it('should terminate and remove the workload', async () => {
      const id = submit('web');
      const res = createMockResponse();

      await handlers.deleteWorkload(createMockRequest({ params: { id } }), res);

      expect(res._status).toBe(200);
      expect(res._json).toEqual({ success: true, data: { id, deleted: true } });
      expect(controlPlane.store.find('workload', id)).toBeUndefined();
    });

    it('should return 404 for an unknown workload', async () => {
      const id = '00000000-0000-4000-8000-000000000000';
      const res = createMockResponse();

      await handlers.deleteWorkload(createMockRequest({ params: { id } }), res);

      expect(res._status).toBe(404);
      expect(res._json).toMatchObject({ error: { code: 'NOT_FOUND', message: `Workload '${id}' not found` } });
    });
  });
});
