/**
 * Central API Router
 *
 * Combines the health endpoints and the REST API routes into a single router.
 * @module @kubesim/server/api/router
 */

import { Router, type Request, type Response, type NextFunction } from 'express';
import type { ControlPlane } from '@kubesim/core';
import { createServiceLogger, generateCorrelationId, isKubesimError } from '@kubesim/shared';
import { createNodesRouter } from './nodes.js';
import { createWorkloadsRouter } from './workloads.js';
import { createClusterHandlers } from './cluster.js';
import { getCorrelationId, sendError, sendFailure } from './responses.js';

/**
 * Logger for API router operations
 */
const logger = createServiceLogger(
  {
    level: 'debug',
    service: 'kubesim',
  },
  { component: 'api-router' },
);

/**
 * API router configuration options
 */
export interface ApiRouterOptions {
  /** Control plane the routes operate on */
  controlPlane: ControlPlane;
  /** Enable request logging (default: true) */
  enableLogging?: boolean;
}

/**
 * Health check response
 */
export interface HealthCheckResponse {
  status: 'healthy' | 'degraded';
  timestamp: string;
  version: string;
  uptime: number;
  checks: {
    controlPlane: { status: 'up' | 'down' };
    runtime: { name: string };
  };
}

/**
 * Server start time for uptime calculation
 */
const startTime = Date.now();

function uptimeSeconds(): number {
  return Math.floor((Date.now() - startTime) / 1000);
}

/**
 * GET /health - Health check endpoint
 */
export function createHealthCheck(controlPlane: ControlPlane) {
  return async (req: Request, res: Response): Promise<void> => {
    const requestLogger = logger.withCorrelationId(getCorrelationId(req));
    const response: HealthCheckResponse = {
      status: controlPlane.isStarted ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '0.1.0',
      uptime: uptimeSeconds(),
      checks: {
        controlPlane: { status: controlPlane.isStarted ? 'up' : 'down' },
        runtime: { name: controlPlane.runtimeName },
      },
    };

    requestLogger.debug('Health check performed', { status: response.status, uptime: response.uptime });
    res.status(200).json(response);
  };
}

/**
 * GET /ready - Ready once the control plane loops are running
 */
export function createReadinessCheck(controlPlane: ControlPlane) {
  return async (_req: Request, res: Response): Promise<void> => {
    res.status(controlPlane.isStarted ? 200 : 503).json({
      ready: controlPlane.isStarted,
      timestamp: new Date().toISOString(),
    });
  };
}

/**
 * GET /live - Liveness check endpoint
 */
export async function livenessCheck(_req: Request, res: Response): Promise<void> {
  res.status(200).json({
    alive: true,
    timestamp: new Date().toISOString(),
  });
}

/**
 * Request logging middleware
 */
export function requestLoggingMiddleware(req: Request, res: Response, next: NextFunction): void {
  const header = req.headers['x-correlation-id'];
  const correlationId = typeof header === 'string' && header.length > 0 ? header : generateCorrelationId();
  const requestStart = Date.now();

  // Downstream handlers read the id from the request headers
  req.headers['x-correlation-id'] = correlationId;
  res.setHeader('X-Correlation-ID', correlationId);

  const requestLogger = logger.withCorrelationId(correlationId);

  requestLogger.info('Incoming request', {
    method: req.method,
    path: req.path,
    query: req.query,
    userAgent: req.headers['user-agent'],
    ip: req.ip || req.socket.remoteAddress,
  });

  res.on('finish', () => {
    const meta = {
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration: Date.now() - requestStart,
    };
    if (res.statusCode >= 400) {
      requestLogger.warn('Request completed', meta);
    } else {
      requestLogger.info('Request completed', meta);
    }
  });

  next();
}

/**
 * Error handling middleware
 */
export function errorHandlingMiddleware(err: Error, req: Request, res: Response, _next: NextFunction): void {
  const requestLogger = logger.withCorrelationId(getCorrelationId(req));

  // Malformed JSON bodies from express.json()
  if ('type' in err && err.type === 'entity.parse.failed') {
    requestLogger.warn('Malformed request body', { method: req.method, path: req.path });
    sendError(res, 'INVALID_INPUT', 'Request body is not valid JSON', 400);
    return;
  }

  if (isKubesimError(err)) {
    sendFailure(res, err, requestLogger, { method: req.method, path: req.path });
    return;
  }

  requestLogger.error('Unhandled error', err, {
    method: req.method,
    path: req.path,
  });

  // Don't leak error details in production
  const isProduction = process.env.NODE_ENV === 'production';

  sendError(res, 'INTERNAL_ERROR', isProduction ? 'An internal error occurred' : err.message, 500);
}

/**
 * 404 Not Found handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  sendError(res, 'NOT_FOUND', `Route ${req.method} ${req.path} not found`, 404);
}

/**
 * Create the central API router
 */
export function createApiRouter(options: ApiRouterOptions): Router {
  const { controlPlane, enableLogging = true } = options;

  const router = Router();

  if (enableLogging) {
    router.use(requestLoggingMiddleware);
  }

  router.get('/health', createHealthCheck(controlPlane));
  router.get('/ready', createReadinessCheck(controlPlane));
  router.get('/live', livenessCheck);

  const apiRouter = Router();
  const cluster = createClusterHandlers(controlPlane);

  apiRouter.use('/nodes', createNodesRouter(controlPlane));
  apiRouter.use('/workloads', createWorkloadsRouter(controlPlane));
  apiRouter.get('/status', cluster.getStatus);
  apiRouter.post('/reconcile', cluster.reconcile);

  router.use('/api', apiRouter);

  router.use('/api/*', notFoundHandler);

  router.use(errorHandlingMiddleware);

  logger.info('API router initialized', {
    routes: ['/health', '/ready', '/live', '/api/nodes', '/api/workloads', '/api/status', '/api/reconcile'],
  });

  return router;
}

export default createApiRouter;
