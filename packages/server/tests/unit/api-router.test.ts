/**
 * Unit tests for the router middleware, health endpoints and cluster handlers
 * @module @kubesim/server/tests/unit/api-router
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Request, Response } from 'express';
import { ControlPlane } from '@kubesim/core';
import { SimulatedRuntime } from '@kubesim/node-runtime';
import { NotFoundError } from '@kubesim/shared';
import {
  createHealthCheck,
  createReadinessCheck,
  errorHandlingMiddleware,
  livenessCheck,
  notFoundHandler,
  requestLoggingMiddleware,
} from '../../src/api/router.js';
import { createClusterHandlers } from '../../src/api/cluster.js';
import { readExpectedRevision } from '../../src/api/responses.js';

function createMockRequest(overrides: Partial<Request> = {}): Request {
  return {
    body: {},
    params: {},
    query: {},
    headers: {},
    method: 'GET',
    path: '/',
    socket: {},
    ...overrides,
  } as unknown as Request;
}

function createMockResponse() {
  const res = {
    _json: null as unknown,
    _status: 200,
    _headers: {} as Record<string, string>,
    statusCode: 200,
    status(code: number) {
      this._status = code;
      this.statusCode = code;
      return this;
    },
    json(data: unknown) {
      this._json = data;
      return this;
    },
    setHeader(name: string, value: string) {
      this._headers[name] = value;
      return this;
    },
    on: vi.fn(),
  };
  return res as unknown as Response & {
    _json: unknown;
    _status: number;
    _headers: Record<string, string>;
    on: ReturnType<typeof vi.fn>;
  };
}

describe('API router', () => {
  let controlPlane: ControlPlane;

  beforeEach(() => {
    controlPlane = new ControlPlane({
      runtime: new SimulatedRuntime(),
      nodes: { runtimeTimeoutMs: 100, healthCheckIntervalMs: 60_000 },
      reconciler: { intervalMs: 60_000, wakeDebounceMs: 60_000 },
    });
  });

  afterEach(async () => {
    await controlPlane.stop();
    await controlPlane.reconciler.stop();
  });

  describe('health endpoints', () => {
    it('should report degraded until the control plane starts', async () => {
      const res = createMockResponse();
      await createHealthCheck(controlPlane)(createMockRequest(), res);

      expect(res._status).toBe(200);
      expect(res._json).toMatchObject({
        status: 'degraded',
        checks: { controlPlane: { status: 'down' }, runtime: { name: 'simulated' } },
      });

      controlPlane.start();
      const started = createMockResponse();
      await createHealthCheck(controlPlane)(createMockRequest(), started);
      expect(started._json).toMatchObject({ status: 'healthy', checks: { controlPlane: { status: 'up' } } });
    });

    it('should answer readiness with 503 until started', async () => {
      const res = createMockResponse();
      await createReadinessCheck(controlPlane)(createMockRequest(), res);
      expect(res._status).toBe(503);
      expect(res._json).toMatchObject({ ready: false });

      controlPlane.start();
      const ready = createMockResponse();
      await createReadinessCheck(controlPlane)(createMockRequest(), ready);
      expect(ready._status).toBe(200);
      expect(ready._json).toMatchObject({ ready: true });
    });

    it('should always answer liveness', async () => {
      const res = createMockResponse();
      await livenessCheck(createMockRequest(), res);
      expect(res._status).toBe(200);
      expect(res._json).toMatchObject({ alive: true });
    });
  });

  describe('requestLoggingMiddleware', () => {
    it('should keep the caller correlation id', () => {
      const req = createMockRequest({ headers: { 'x-correlation-id': 'req-123' } });
      const res = createMockResponse();
      const next = vi.fn();

      requestLoggingMiddleware(req, res, next);

      expect(res._headers['X-Correlation-ID']).toBe('req-123');
      expect(req.headers['x-correlation-id']).toBe('req-123');
      expect(next).toHaveBeenCalledOnce();
      expect(res.on).toHaveBeenCalledWith('finish', expect.any(Function));
    });

    it('should generate a correlation id when none is sent', () => {
      const req = createMockRequest();
      const res = createMockResponse();

      requestLoggingMiddleware(req, res, vi.fn());

      const generated = req.headers['x-correlation-id'];
      expect(typeof generated).toBe('string');
      expect(res._headers['X-Correlation-ID']).toBe(generated);
    });
  });

  describe('errorHandlingMiddleware', () => {
    it('should map a KubesimError to its status', () => {
      const res = createMockResponse();

      errorHandlingMiddleware(NotFoundError.object('node', 'n1'), createMockRequest(), res, vi.fn());

      expect(res._status).toBe(404);
      expect(res._json).toEqual({
        success: false,
        error: {
          code: 'NOT_FOUND',
          message: "Node 'n1' not found",
          details: { resourceType: 'node', resourceId: 'n1' },
        },
      });
    });

    it('should answer 400 for a malformed JSON body', () => {
      const res = createMockResponse();
      const parseError = Object.assign(new SyntaxError('Unexpected token'), { type: 'entity.parse.failed' });

      errorHandlingMiddleware(parseError, createMockRequest({ method: 'POST' }), res, vi.fn());

      expect(res._status).toBe(400);
      expect(res._json).toEqual({
        success: false,
        error: { code: 'INVALID_INPUT', message: 'Request body is not valid JSON' },
      });
    });

    it('should answer 500 for anything else', () => {
      const res = createMockResponse();

      errorHandlingMiddleware(new Error('boom'), createMockRequest(), res, vi.fn());

      expect(res._status).toBe(500);
      expect(res._json).toEqual({ success: false, error: { code: 'INTERNAL_ERROR', message: 'boom' } });
    });
  });

  describe('notFoundHandler', () => {
    it('should name the unknown route', () => {
      const res = createMockResponse();

      notFoundHandler(createMockRequest({ method: 'PUT', path: '/api/pods' }), res);

      expect(res._status).toBe(404);
      expect(res._json).toEqual({
        success: false,
        error: { code: 'NOT_FOUND', message: 'Route PUT /api/pods not found' },
      });
    });
  });

  describe('readExpectedRevision', () => {
    it('should read the body first', () => {
      const req = createMockRequest({
        body: { expectedRevision: 4 },
        query: { expectedRevision: '5' },
        headers: { 'if-match': '6' },
      });
      expect(readExpectedRevision(req)).toBe(4);
    });

    it('should read the query, then If-Match', () => {
      expect(readExpectedRevision(createMockRequest({ query: { expectedRevision: '5' } }))).toBe(5);
      expect(readExpectedRevision(createMockRequest({ headers: { 'if-match': '"6"' } }))).toBe(6);
      expect(readExpectedRevision(createMockRequest({ headers: { 'if-match': 'W/"7"' } }))).toBe(7);
    });

    it('should return undefined when no revision is given', () => {
      expect(readExpectedRevision(createMockRequest())).toBeUndefined();
    });

    it('should reject malformed revisions', () => {
      expect(() => readExpectedRevision(createMockRequest({ body: { expectedRevision: 0 } }))).toThrow(
        'Validation failed for field: expectedRevision',
      );
      expect(() => readExpectedRevision(createMockRequest({ headers: { 'if-match': '*' } }))).toThrow(
        'Validation failed for field: If-Match',
      );
    });
  });

  describe('cluster handlers', () => {
    it('should report cluster status', async () => {
      await controlPlane.nodes.provision({ name: 'alpha', capacity: { cpu: 4 } });
      controlPlane.submitWorkload({ name: 'web', request: { cpu: 3 } });
      const res = createMockResponse();

      await createClusterHandlers(controlPlane).getStatus(createMockRequest(), res);

      expect(res._status).toBe(200);
      expect(res._json).toMatchObject({
        success: true,
        data: {
          runtime: 'simulated',
          nodes: [{ name: 'alpha', phase: 'Ready', free: { cpu: 4, memory: 4096 } }],
          workloads: [{ name: 'web', phase: 'Pending', nodeId: null }],
        },
      });
    });

    it('should run one pass and return its summary', async () => {
      const node = await controlPlane.nodes.provision({ name: 'alpha', capacity: { cpu: 4 } });
      const [web] = controlPlane.submitWorkload({ name: 'web', request: { cpu: 3 } });
      const res = createMockResponse();

      await createClusterHandlers(controlPlane).reconcile(createMockRequest({ method: 'POST' }), res);

      expect(res._status).toBe(200);
      expect(res._json).toMatchObject({
        success: true,
        data: { summary: { scheduled: [web?.id], started: [web?.id], unschedulable: [] } },
      });
      expect(controlPlane.store.get('node', node.id).object.allocated.cpu).toBe(3);
    });
  });
});
