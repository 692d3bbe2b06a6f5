/**
 * Workload REST API Endpoints
 * @module @kubesim/server/api/workloads
 */

import { Router, type Request, type Response } from 'express';
import type { ControlPlane } from '@kubesim/core';
import {
  createServiceLogger,
  isWorkloadPhase,
  validateCreateWorkloadInput,
  validateUUID,
  validateUpdateWorkloadInput,
  validateWorkloadPhase,
  type FieldValidationError,
} from '@kubesim/shared';
import {
  getCorrelationId,
  readExpectedRevision,
  readIdParam,
  sendFailure,
  sendSuccess,
  sendValidationError,
} from './responses.js';

/**
 * Logger for workload API operations
 */
const logger = createServiceLogger(
  {
    level: 'debug',
    service: 'kubesim',
  },
  { component: 'api-workloads' },
);

/**
 * Workload request handlers
 */
export interface WorkloadHandlers {
  submitWorkload(req: Request, res: Response): Promise<void>;
  listWorkloads(req: Request, res: Response): Promise<void>;
  getWorkload(req: Request, res: Response): Promise<void>;
  updateWorkload(req: Request, res: Response): Promise<void>;
  terminateWorkload(req: Request, res: Response): Promise<void>;
  resubmitWorkload(req: Request, res: Response): Promise<void>;
  deleteWorkload(req: Request, res: Response): Promise<void>;
}

/**
 * Create the workload handlers bound to a control plane
 */
export function createWorkloadHandlers(controlPlane: ControlPlane): WorkloadHandlers {
  return {
    /**
     * POST /api/workloads - Submit a workload (one instance per replica)
     */
    async submitWorkload(req, res) {
      const requestLogger = logger.withCorrelationId(getCorrelationId(req));

      const validation = validateCreateWorkloadInput(req.body);
      if (!validation.valid) {
        requestLogger.warn('Workload submission validation failed', { errors: validation.errors });
        sendValidationError(res, validation.errors);
        return;
      }

      try {
        const entries = controlPlane.submitWorkload(validation.value);
        requestLogger.info('Workload submitted', { name: validation.value.name, instances: entries.length });
        sendSuccess(res, { workloads: entries.map((entry) => controlPlane.describeWorkload(entry)) }, 201);
      } catch (error) {
        sendFailure(res, error, requestLogger, { operation: 'submitWorkload' });
      }
    },

    /**
     * GET /api/workloads - List workloads (`?phase=`, `?nodeId=`)
     */
    async listWorkloads(req, res) {
      const requestLogger = logger.withCorrelationId(getCorrelationId(req));

      const { phase, nodeId } = req.query;
      const errors: FieldValidationError[] = [];
      if (phase !== undefined) {
        const phaseError = validateWorkloadPhase(phase);
        if (phaseError) errors.push(phaseError);
      }
      if (nodeId !== undefined) {
        const nodeIdError = validateUUID(nodeId, 'nodeId');
        if (nodeIdError) errors.push(nodeIdError);
      }
      if (errors.length > 0) {
        sendValidationError(res, errors);
        return;
      }

      const phaseFilter = typeof phase === 'string' && isWorkloadPhase(phase) ? phase : undefined;
      const nodeFilter = typeof nodeId === 'string' ? nodeId : undefined;

      try {
        const workloads = controlPlane.store
          .list(
            'workload',
            (workload) =>
              (!phaseFilter || workload.phase === phaseFilter) && (!nodeFilter || workload.nodeId === nodeFilter),
          )
          .map((entry) => controlPlane.describeWorkload(entry));

        requestLogger.debug('Workloads listed', { count: workloads.length, phase: phaseFilter, nodeId: nodeFilter });
        sendSuccess(res, { workloads, total: workloads.length });
      } catch (error) {
        sendFailure(res, error, requestLogger, { operation: 'listWorkloads' });
      }
    },

    /**
     * GET /api/workloads/:id - Get a workload with its scheduling status
     */
    async getWorkload(req, res) {
      const requestLogger = logger.withCorrelationId(getCorrelationId(req));
      try {
        const entry = controlPlane.store.get('workload', readIdParam(req));
        sendSuccess(res, { workload: controlPlane.describeWorkload(entry) });
      } catch (error) {
        sendFailure(res, error, requestLogger, { operation: 'getWorkload', workloadId: req.params.id });
      }
    },

    /**
     * PATCH /api/workloads/:id - Update request or command of a Pending workload
     */
    async updateWorkload(req, res) {
      const requestLogger = logger.withCorrelationId(getCorrelationId(req));
      try {
        const workloadId = readIdParam(req);
        const validation = validateUpdateWorkloadInput(req.body);
        if (!validation.valid) {
          sendValidationError(res, validation.errors);
          return;
        }

        const entry = controlPlane.updateWorkload(workloadId, validation.value, readExpectedRevision(req));
        requestLogger.info('Workload updated', { workloadId, revision: entry.revision });
        sendSuccess(res, { workload: controlPlane.describeWorkload(entry) });
      } catch (error) {
        sendFailure(res, error, requestLogger, { operation: 'updateWorkload', workloadId: req.params.id });
      }
    },

    /**
     * POST /api/workloads/:id/terminate - Terminate a workload
     */
    async terminateWorkload(req, res) {
      const requestLogger = logger.withCorrelationId(getCorrelationId(req));
      try {
        const entry = await controlPlane.reconciler.terminateWorkload(readIdParam(req), readExpectedRevision(req));
        sendSuccess(res, { workload: controlPlane.describeWorkload(entry) });
      } catch (error) {
        sendFailure(res, error, requestLogger, { operation: 'terminateWorkload', workloadId: req.params.id });
      }
    },

    /**
     * POST /api/workloads/:id/resubmit - Clone a terminal workload into a new Pending one
     */
    async resubmitWorkload(req, res) {
      const requestLogger = logger.withCorrelationId(getCorrelationId(req));
      try {
        const entry = controlPlane.reconciler.resubmitWorkload(readIdParam(req));
        requestLogger.info('Workload resubmitted', { workloadId: entry.id, resubmittedFrom: req.params.id });
        sendSuccess(res, { workload: controlPlane.describeWorkload(entry) }, 201);
      } catch (error) {
        sendFailure(res, error, requestLogger, { operation: 'resubmitWorkload', workloadId: req.params.id });
      }
    },

    /**
     * DELETE /api/workloads/:id - Terminate if active, then remove
     */
    async deleteWorkload(req, res) {
      const requestLogger = logger.withCorrelationId(getCorrelationId(req));
      try {
        const workloadId = readIdParam(req);
        await controlPlane.deleteWorkload(workloadId, readExpectedRevision(req));
        sendSuccess(res, { id: workloadId, deleted: true });
      } catch (error) {
        sendFailure(res, error, requestLogger, { operation: 'deleteWorkload', workloadId: req.params.id });
      }
    },
  };
}

/**
 * Create the workloads router
 */
export function createWorkloadsRouter(controlPlane: ControlPlane): Router {
  const router = Router();
  const handlers = createWorkloadHandlers(controlPlane);

  router.post('/', handlers.submitWorkload);
  router.get('/', handlers.listWorkloads);
  router.get('/:id', handlers.getWorkload);
  router.patch('/:id', handlers.updateWorkload);
  router.post('/:id/terminate', handlers.terminateWorkload);
  router.post('/:id/resubmit', handlers.resubmitWorkload);
  router.delete('/:id', handlers.deleteWorkload);

  return router;
}
