/**
 * kubesim Server
 *
 * HTTP REST API in front of one control plane.
 * @module @kubesim/server
 */

import http from 'node:http';
import express, { type Express } from 'express';
import cors, { type CorsOptions } from 'cors';
import { ControlPlane } from '@kubesim/core';
import { createDockerRuntime, createSimulatedRuntime } from '@kubesim/node-runtime';
import { createServiceLogger, errorMessage, type ContainerRuntime, type Logger } from '@kubesim/shared';
import { createApiRouter } from './api/router.js';
import { DEFAULT_SERVER_CONFIG, loadServerConfig, type ServerConfig } from './config.js';

export { DEFAULT_SERVER_CONFIG, loadServerConfig, type ServerConfig, type RuntimeKind } from './config.js';
export {
  createApiRouter,
  errorHandlingMiddleware,
  notFoundHandler,
  requestLoggingMiddleware,
  type ApiRouterOptions,
} from './api/router.js';
export { createNodeHandlers, createNodesRouter, type NodeHandlers } from './api/nodes.js';
export { createWorkloadHandlers, createWorkloadsRouter, type WorkloadHandlers } from './api/workloads.js';
export { createClusterHandlers, type ClusterHandlers } from './api/cluster.js';
export {
  sendSuccess,
  sendError,
  readExpectedRevision,
  type ApiResponse,
  type ApiSuccessResponse,
  type ApiErrorResponse,
} from './api/responses.js';

/**
 * Logger for server operations
 */
const logger = createServiceLogger(
  {
    level: 'debug',
    service: 'kubesim',
  },
  { component: 'server' },
);

// ============================================================================
// CORS Configuration
// ============================================================================

/**
 * Create CORS configuration
 */
export function createCorsConfig(origins: string[]): CorsOptions {
  return {
    origin: (origin, callback) => {
      // Allow requests with no origin (like curl or the CLI)
      if (!origin) {
        callback(null, true);
        return;
      }

      const isAllowed = origins.some((pattern) => {
        if (pattern.includes('*')) {
          const regex = new RegExp('^' + pattern.replace(/[.+?^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*') + '$');
          return regex.test(origin);
        }
        return pattern === origin;
      });

      if (isAllowed) {
        callback(null, true);
      } else {
        callback(new Error(`Origin ${origin} not allowed by CORS`));
      }
    },
    methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'If-Match', 'X-Correlation-ID'],
    exposedHeaders: ['X-Correlation-ID'],
    maxAge: 86400,
  };
}

// ============================================================================
// Runtime selection
// ============================================================================

/**
 * Pick the container runtime. Docker is used when it answers a ping;
 * otherwise the server falls back to the simulated runtime.
 */
export async function selectRuntime(
  config: Pick<ServerConfig, 'runtime' | 'nodeImage'>,
  log: Logger = logger,
): Promise<ContainerRuntime> {
  const runtimeLogger = log.child({ component: 'runtime' });

  if (config.runtime === 'simulated') {
    log.info('Using simulated runtime');
    return createSimulatedRuntime({ logger: runtimeLogger });
  }

  const docker = createDockerRuntime({ image: config.nodeImage, logger: runtimeLogger });
  try {
    await docker.ping();
    log.info('Using Docker runtime', { image: config.nodeImage });
    return docker;
  } catch (error) {
    log.warn('Docker is unreachable, falling back to simulated runtime', { error: errorMessage(error) });
    return createSimulatedRuntime({ logger: runtimeLogger });
  }
}

// ============================================================================
// Server Instance
// ============================================================================

/**
 * Build the control plane from the server configuration
 */
export function createControlPlaneFromConfig(config: ServerConfig, runtime: ContainerRuntime): ControlPlane {
  return new ControlPlane({
    runtime,
    nodes: {
      runtimeTimeoutMs: config.runtimeTimeoutMs,
      maxMissedHeartbeats: config.maxMissedHeartbeats,
      healthCheckIntervalMs: config.healthCheckIntervalMs,
      image: config.nodeImage,
    },
    reconciler: {
      intervalMs: config.reconcileIntervalMs,
    },
    logger: logger.child({ component: 'control-plane' }),
  });
}

/**
 * Create the express application for a control plane
 */
export function createApp(controlPlane: ControlPlane, config: ServerConfig): Express {
  const app = express();

  app.set('trust proxy', true);
  app.use(express.json({ limit: '1mb' }));

  if (config.enableCors) {
    app.use(cors(createCorsConfig(config.corsOrigins)));
    logger.debug('CORS enabled', { origins: config.corsOrigins });
  }

  app.use(createApiRouter({ controlPlane, enableLogging: config.enableLogging }));

  return app;
}

/**
 * Server instance
 */
export interface ServerInstance {
  /** Express application */
  app: Express;
  /** Control plane served by the API */
  controlPlane: ControlPlane;
  /** HTTP server, once started */
  readonly httpServer: http.Server | null;
  /** Server configuration */
  config: ServerConfig;
  /** Start the control plane and listen */
  start: () => Promise<void>;
  /** Stop listening and stop the control plane */
  stop: () => Promise<void>;
}

/**
 * Create and configure the server
 */
export function createServer(runtime: ContainerRuntime, config: Partial<ServerConfig> = {}): ServerInstance {
  const finalConfig: ServerConfig = { ...DEFAULT_SERVER_CONFIG, ...config };

  logger.info('Creating server', {
    port: finalConfig.port,
    host: finalConfig.host,
    nodeEnv: finalConfig.nodeEnv,
    logLevel: finalConfig.logLevel,
    runtime: runtime.name,
    reconcileIntervalMs: finalConfig.reconcileIntervalMs,
    healthCheckIntervalMs: finalConfig.healthCheckIntervalMs,
  });

  const controlPlane = createControlPlaneFromConfig(finalConfig, runtime);
  const app = createApp(controlPlane, finalConfig);
  let httpServer: http.Server | null = null;

  return {
    app,
    controlPlane,
    get httpServer() {
      return httpServer;
    },
    config: finalConfig,

    start: async () => {
      controlPlane.start();

      const server = http.createServer(app);
      httpServer = server;
      await new Promise<void>((resolve, reject) => {
        server.once('error', reject);
        server.listen(finalConfig.port, finalConfig.host, () => {
          server.off('error', reject);
          resolve();
        });
      });

      logger.info('Server started', {
        url: `http://${finalConfig.host}:${finalConfig.port}`,
        runtime: controlPlane.runtimeName,
      });
    },

    stop: async () => {
      const server = httpServer;
      httpServer = null;
      if (server) {
        await new Promise<void>((resolve, reject) => {
          server.close((error) => (error ? reject(error) : resolve()));
        });
      }
      await controlPlane.stop();
      logger.info('Server stopped');
    },
  };
}

/**
 * Load configuration, pick a runtime and create the server
 */
export async function createServerFromEnvironment(env: Record<string, string | undefined> = process.env): Promise<ServerInstance> {
  const config = loadServerConfig(env);
  const runtime = await selectRuntime(config);
  return createServer(runtime, config);
}
