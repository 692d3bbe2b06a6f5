/**
 * Node REST API Endpoints
 *
 * Provisioning, listing, capacity updates, heartbeats, draining and
 * termination of nodes.
 * @module @kubesim/server/api/nodes
 */

import { Router, type Request, type Response } from 'express';
import type { ControlPlane } from '@kubesim/core';
import {
  createServiceLogger,
  isNodePhase,
  isRuntimeError,
  validateNodePhase,
  validateProvisionNodeInput,
  validateUpdateNodeInput,
} from '@kubesim/shared';
import {
  getCorrelationId,
  readExpectedRevision,
  readIdParam,
  sendError,
  sendFailure,
  sendSuccess,
  sendValidationError,
} from './responses.js';

/**
 * Logger for node API operations
 */
const logger = createServiceLogger(
  {
    level: 'debug',
    service: 'kubesim',
  },
  { component: 'api-nodes' },
);

/**
 * Node request handlers
 */
export interface NodeHandlers {
  provisionNode(req: Request, res: Response): Promise<void>;
  listNodes(req: Request, res: Response): Promise<void>;
  getNode(req: Request, res: Response): Promise<void>;
  updateNode(req: Request, res: Response): Promise<void>;
  recordHeartbeat(req: Request, res: Response): Promise<void>;
  drainNode(req: Request, res: Response): Promise<void>;
  terminateNode(req: Request, res: Response): Promise<void>;
}

/**
 * Create the node handlers bound to a control plane
 */
export function createNodeHandlers(controlPlane: ControlPlane): NodeHandlers {
  return {
    /**
     * POST /api/nodes - Provision a node
     */
    async provisionNode(req, res) {
      const requestLogger = logger.withCorrelationId(getCorrelationId(req));

      const validation = validateProvisionNodeInput(req.body);
      if (!validation.valid) {
        requestLogger.warn('Node provisioning validation failed', { errors: validation.errors });
        sendValidationError(res, validation.errors);
        return;
      }

      try {
        const entry = await controlPlane.nodes.provision(validation.value);
        requestLogger.info('Node provisioned', { nodeId: entry.id, name: entry.object.name });
        sendSuccess(res, { node: controlPlane.describeNode(entry) }, 201);
      } catch (error) {
        // The node stays in the store as Failed; return it with the error
        if (isRuntimeError(error) && typeof error.meta.nodeId === 'string') {
          const failed = controlPlane.store.find('node', error.meta.nodeId);
          if (failed) {
            requestLogger.warn('Node provisioning failed', { nodeId: failed.id, reason: error.message });
            sendError(res, error.codeName, error.message, error.statusCode, {
              node: controlPlane.describeNode(failed),
            });
            return;
          }
        }
        sendFailure(res, error, requestLogger, { operation: 'provisionNode' });
      }
    },

    /**
     * GET /api/nodes - List nodes (`?phase=`, `?includeDeleted=true`)
     */
    async listNodes(req, res) {
      const requestLogger = logger.withCorrelationId(getCorrelationId(req));

      const phase = req.query.phase;
      if (phase !== undefined) {
        const phaseError = validateNodePhase(phase);
        if (phaseError) {
          sendValidationError(res, [phaseError]);
          return;
        }
      }
      const phaseFilter = typeof phase === 'string' && isNodePhase(phase) ? phase : undefined;
      const includeDeleted = req.query.includeDeleted === 'true' || phaseFilter === 'Deleted';

      try {
        const nodes = controlPlane.store
          .list('node', (node) => (includeDeleted || node.phase !== 'Deleted') && (!phaseFilter || node.phase === phaseFilter))
          .map((entry) => controlPlane.describeNode(entry));

        requestLogger.debug('Nodes listed', { count: nodes.length, phase: phaseFilter });
        sendSuccess(res, { nodes, total: nodes.length });
      } catch (error) {
        sendFailure(res, error, requestLogger, { operation: 'listNodes' });
      }
    },

    /**
     * GET /api/nodes/:id - Get a node with its revision and free capacity
     */
    async getNode(req, res) {
      const requestLogger = logger.withCorrelationId(getCorrelationId(req));
      try {
        const entry = controlPlane.store.get('node', readIdParam(req));
        sendSuccess(res, { node: controlPlane.describeNode(entry) });
      } catch (error) {
        sendFailure(res, error, requestLogger, { operation: 'getNode', nodeId: req.params.id });
      }
    },

    /**
     * PATCH /api/nodes/:id - Update capacity
     */
    async updateNode(req, res) {
      const requestLogger = logger.withCorrelationId(getCorrelationId(req));
      try {
        const nodeId = readIdParam(req);
        const validation = validateUpdateNodeInput(req.body);
        if (!validation.valid) {
          sendValidationError(res, validation.errors);
          return;
        }

        const entry = controlPlane.nodes.updateCapacity(nodeId, validation.value, readExpectedRevision(req));
        requestLogger.info('Node capacity updated', { nodeId, revision: entry.revision });
        sendSuccess(res, { node: controlPlane.describeNode(entry) });
      } catch (error) {
        sendFailure(res, error, requestLogger, { operation: 'updateNode', nodeId: req.params.id });
      }
    },

    /**
     * POST /api/nodes/:id/heartbeat - Record a heartbeat
     */
    async recordHeartbeat(req, res) {
      const requestLogger = logger.withCorrelationId(getCorrelationId(req));
      try {
        const entry = controlPlane.nodes.recordHeartbeat(readIdParam(req));
        sendSuccess(res, { node: controlPlane.describeNode(entry) });
      } catch (error) {
        sendFailure(res, error, requestLogger, { operation: 'recordHeartbeat', nodeId: req.params.id });
      }
    },

    /**
     * POST /api/nodes/:id/drain - Stop placing work on a node and evict its workloads
     */
    async drainNode(req, res) {
      const requestLogger = logger.withCorrelationId(getCorrelationId(req));
      try {
        const result = await controlPlane.nodes.drain(readIdParam(req), readExpectedRevision(req));
        requestLogger.info('Node drained', { nodeId: result.node.id, evicted: result.evicted.length });
        sendSuccess(res, { node: controlPlane.describeNode(result.node), evicted: result.evicted });
      } catch (error) {
        sendFailure(res, error, requestLogger, { operation: 'drainNode', nodeId: req.params.id });
      }
    },

    /**
     * DELETE /api/nodes/:id - Terminate a node
     */
    async terminateNode(req, res) {
      const requestLogger = logger.withCorrelationId(getCorrelationId(req));
      try {
        const result = await controlPlane.nodes.terminate(readIdParam(req), readExpectedRevision(req));
        requestLogger.info('Node terminated', {
          nodeId: result.node.id,
          phase: result.node.object.phase,
          evicted: result.evicted.length,
        });
        sendSuccess(res, { node: controlPlane.describeNode(result.node), evicted: result.evicted });
      } catch (error) {
        sendFailure(res, error, requestLogger, { operation: 'terminateNode', nodeId: req.params.id });
      }
    },
  };
}

/**
 * Create the nodes router
 */
export function createNodesRouter(controlPlane: ControlPlane): Router {
  const router = Router();
  const handlers = createNodeHandlers(controlPlane);

  router.post('/', handlers.provisionNode);
  router.get('/', handlers.listNodes);
  router.get('/:id', handlers.getNode);
  router.patch('/:id', handlers.updateNode);
  router.post('/:id/heartbeat', handlers.recordHeartbeat);
  router.post('/:id/drain', handlers.drainNode);
  router.delete('/:id', handlers.terminateNode);

  return router;
}
