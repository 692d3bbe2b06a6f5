/**
 * Cluster status and on-demand reconciliation
 * @module @kubesim/server/api/cluster
 */

import type { Request, Response } from 'express';
import type { ControlPlane } from '@kubesim/core';
import { createServiceLogger } from '@kubesim/shared';
import { getCorrelationId, sendFailure, sendSuccess } from './responses.js';

const logger = createServiceLogger(
  {
    level: 'debug',
    service: 'kubesim',
  },
  { component: 'api-cluster' },
);

/**
 * Cluster request handlers
 */
export interface ClusterHandlers {
  getStatus(req: Request, res: Response): Promise<void>;
  reconcile(req: Request, res: Response): Promise<void>;
}

/**
 * Create the cluster handlers bound to a control plane
 */
export function createClusterHandlers(controlPlane: ControlPlane): ClusterHandlers {
  return {
    /**
     * GET /api/status
     */
    async getStatus(req, res) {
      const requestLogger = logger.withCorrelationId(getCorrelationId(req));
      try {
        sendSuccess(res, controlPlane.getStatus());
      } catch (error) {
        sendFailure(res, error, requestLogger, { operation: 'getStatus' });
      }
    },

    /**
     * POST /api/reconcile - Run one pass and return its summary
     */
    async reconcile(req, res) {
      const requestLogger = logger.withCorrelationId(getCorrelationId(req));
      try {
        const summary = await controlPlane.reconciler.reconcile();
        requestLogger.info('Reconciliation requested', {
          scheduled: summary.scheduled.length,
          started: summary.started.length,
          durationMs: summary.durationMs,
        });
        sendSuccess(res, { summary });
      } catch (error) {
        sendFailure(res, error, requestLogger, { operation: 'reconcile' });
      }
    },
  };
}
