/**
 * Server configuration from the environment
 * @module @kubesim/server/config
 */

import { ValidationError, parseLogLevel, type LogLevel } from '@kubesim/shared';

/**
 * Container runtime selection
 */
export type RuntimeKind = 'docker' | 'simulated';

/**
 * Server configuration options
 */
export interface ServerConfig {
  /** HTTP port (default: 5000) */
  port: number;
  /** Hostname to bind to (default: '0.0.0.0') */
  host: string;
  /** Enable CORS (default: true) */
  enableCors: boolean;
  /** CORS allowed origins; `*` in a pattern matches anything */
  corsOrigins: string[];
  /** Enable request logging (default: true) */
  enableLogging: boolean;
  /** Node environment */
  nodeEnv: 'development' | 'production' | 'test';
  /** Log level */
  logLevel: LogLevel;
  /** Container runtime (default: docker, falling back to simulated) */
  runtime: RuntimeKind;
  /** Image for node containers */
  nodeImage: string;
  /** Reconciliation period in milliseconds */
  reconcileIntervalMs: number;
  /** Health check period in milliseconds */
  healthCheckIntervalMs: number;
  /** Missed health checks before a node fails */
  maxMissedHeartbeats: number;
  /** Upper bound on every runtime call in milliseconds */
  runtimeTimeoutMs: number;
}

/**
 * Defaults applied when a variable is unset
 */
export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  port: 5000,
  host: '0.0.0.0',
  enableCors: true,
  corsOrigins: ['http://localhost', 'http://localhost:*', 'http://127.0.0.1', 'http://127.0.0.1:*'],
  enableLogging: true,
  nodeEnv: 'development',
  logLevel: 'info',
  runtime: 'docker',
  nodeImage: 'python:3.9-slim',
  reconcileIntervalMs: 5000,
  healthCheckIntervalMs: 5000,
  maxMissedHeartbeats: 3,
  runtimeTimeoutMs: 30000,
};

type Environment = Record<string, string | undefined>;

function readInteger(env: Environment, name: string, fallback: number, min: number, max?: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  if (!/^\d+$/.test(raw.trim())) {
    throw ValidationError.invalidFormat(name, 'a non-negative integer', raw);
  }
  const value = Number.parseInt(raw, 10);
  if (value < min || (max !== undefined && value > max)) {
    throw ValidationError.outOfRange(name, min, max, value);
  }
  return value;
}

function readNodeEnv(raw: string | undefined): ServerConfig['nodeEnv'] {
  switch (raw) {
    case 'production':
    case 'test':
      return raw;
    default:
      return 'development';
  }
}

function readRuntime(raw: string | undefined): RuntimeKind {
  if (raw === undefined || raw === '') {
    return DEFAULT_SERVER_CONFIG.runtime;
  }
  if (raw === 'docker' || raw === 'simulated') {
    return raw;
  }
  throw ValidationError.invalidFormat('KUBESIM_RUNTIME', 'docker or simulated', raw);
}

/**
 * Load the server configuration. Invalid numeric values throw a
 * ValidationError so the process fails at startup.
 */
export function loadServerConfig(env: Environment = process.env): ServerConfig {
  return {
    port: readInteger(env, 'PORT', DEFAULT_SERVER_CONFIG.port, 0, 65535),
    host: env.HOST || DEFAULT_SERVER_CONFIG.host,
    enableCors: DEFAULT_SERVER_CONFIG.enableCors,
    corsOrigins: env.CORS_ORIGINS
      ? env.CORS_ORIGINS.split(',').map((origin) => origin.trim()).filter((origin) => origin.length > 0)
      : DEFAULT_SERVER_CONFIG.corsOrigins,
    enableLogging: env.ENABLE_LOGGING !== 'false',
    nodeEnv: readNodeEnv(env.NODE_ENV),
    logLevel: parseLogLevel(env.LOG_LEVEL, DEFAULT_SERVER_CONFIG.logLevel),
    runtime: readRuntime(env.KUBESIM_RUNTIME),
    nodeImage: env.KUBESIM_NODE_IMAGE || DEFAULT_SERVER_CONFIG.nodeImage,
    reconcileIntervalMs: readInteger(env, 'RECONCILE_INTERVAL_MS', DEFAULT_SERVER_CONFIG.reconcileIntervalMs, 1),
    healthCheckIntervalMs: readInteger(env, 'HEALTH_CHECK_INTERVAL_MS', DEFAULT_SERVER_CONFIG.healthCheckIntervalMs, 1),
    maxMissedHeartbeats: readInteger(env, 'MAX_MISSED_HEARTBEATS', DEFAULT_SERVER_CONFIG.maxMissedHeartbeats, 1),
    runtimeTimeoutMs: readInteger(env, 'RUNTIME_TIMEOUT_MS', DEFAULT_SERVER_CONFIG.runtimeTimeoutMs, 1),
  };
}
