/**
 * Structured logging for the control plane.
 *
 * Entries are JSON objects by default. Outside production they are printed
 * as one line per entry, with the node, workload and object kind the entry
 * concerns pulled out in front of the remaining metadata.
 * @module @kubesim/shared/logging/logger
 */

import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
};

const RESET = '\x1b[0m';

/**
 * Metadata attached to an entry. The named fields identify what the entry is
 * about; anything else is free-form context.
 */
export interface LogMeta {
  /** Correlation ID of the API request that caused the entry */
  correlationId?: string;
  /** Object kind (node, workload, placement) */
  kind?: string;
  nodeId?: string | null;
  workloadId?: string;
  service?: string;
  /** Emitting component (reconciler, node-lifecycle-manager, ...) */
  component?: string;
  [key: string]: unknown;
}

/**
 * One structured log entry
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  meta?: LogMeta;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string | number;
  };
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum level written */
  level: LogLevel;
  service?: string;
  component?: string;
  /** One readable line per entry instead of JSON */
  pretty?: boolean;
  /** Receives every entry at or above `level`; replaces console output */
  output?: (entry: LogEntry) => void;
}

/**
 * Logger bound to a set of metadata
 */
export class Logger {
  private readonly config: LoggerConfig;
  private readonly meta: LogMeta;

  constructor(config: Partial<LoggerConfig> = {}, meta: LogMeta = {}) {
    this.config = { level: 'info', pretty: false, ...config };
    this.meta = { ...meta };
    if (config.service) this.meta.service = config.service;
    if (config.component) this.meta.component = config.component;
  }

  /**
   * Logger carrying additional metadata on every entry
   */
  child(meta: LogMeta): Logger {
    return new Logger(this.config, { ...this.meta, ...meta });
  }

  /**
   * Logger tagged with an API request's correlation ID
   */
  withCorrelationId(correlationId: string): Logger {
    return this.child({ correlationId });
  }

  debug(message: string, meta?: LogMeta): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.write('warn', message, meta);
  }

  error(message: string, error?: Error | LogMeta, meta?: LogMeta): void {
    this.writeFailure('error', message, error, meta);
  }

  fatal(message: string, error?: Error | LogMeta, meta?: LogMeta): void {
    this.writeFailure('fatal', message, error, meta);
  }

  private writeFailure(level: LogLevel, message: string, error?: Error | LogMeta, meta?: LogMeta): void {
    if (error instanceof Error) {
      this.write(level, message, meta, error);
    } else {
      this.write(level, message, error);
    }
  }

  private write(level: LogLevel, message: string, meta?: LogMeta, error?: Error): void {
    if (LEVELS.indexOf(level) < LEVELS.indexOf(this.config.level)) {
      return;
    }

    const entry: LogEntry = { timestamp: new Date().toISOString(), level, message };
    const merged = { ...this.meta, ...meta };
    if (Object.keys(merged).length > 0) {
      entry.meta = merged;
    }
    if (error) {
      entry.error = { name: error.name, message: error.message, stack: error.stack };
      const code = errorCodeOf(error);
      if (code !== undefined) {
        entry.error.code = code;
      }
    }

    if (this.config.output) {
      this.config.output(entry);
      return;
    }

    const line = this.config.pretty ? formatLogLine(entry, { color: true }) : JSON.stringify(entry);
    if (level === 'error' || level === 'fatal') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else if (level === 'info') {
      console.info(line);
    } else {
      console.debug(line);
    }
  }
}

/**
 * Render an entry as one readable line:
 * `time LEVEL component message kind=.. node=.. workload=.. key=value [correlation]`.
 * Object ids are shortened to their first eight characters.
 */
export function formatLogLine(entry: LogEntry, options: { color?: boolean } = {}): string {
  const paint = (text: string): string => (options.color ? `${LEVEL_COLORS[entry.level]}${text}${RESET}` : text);
  const { correlationId, kind, nodeId, workloadId, component, service: _service, ...rest } = entry.meta ?? {};

  const parts = [entry.timestamp.slice(11, 23), paint(entry.level.toUpperCase().padEnd(5))];
  if (typeof component === 'string') parts.push(`(${component})`);
  parts.push(entry.message);

  if (typeof kind === 'string') parts.push(`kind=${kind}`);
  if (typeof nodeId === 'string') parts.push(`node=${shortId(nodeId)}`);
  if (typeof workloadId === 'string') parts.push(`workload=${shortId(workloadId)}`);
  for (const [key, value] of Object.entries(rest)) {
    if (value !== undefined) {
      parts.push(`${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`);
    }
  }
  if (typeof correlationId === 'string') parts.push(paint(`[${correlationId}]`));

  let line = parts.join(' ');
  if (entry.error) {
    line += `\n  ${entry.error.name}: ${entry.error.message}`;
    if (entry.error.code !== undefined) line += ` (${entry.error.code})`;
  }
  return line;
}

function shortId(id: string): string {
  return id.length > 8 ? id.slice(0, 8) : id;
}

/**
 * Parse a log level name, falling back when it is not one
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = value?.toLowerCase();
  return LEVELS.find((level) => level === normalized) ?? fallback;
}

// KubesimError exposes `codeName`, Node system errors `code`
function errorCodeOf(error: Error): string | number | undefined {
  if ('codeName' in error && typeof error.codeName === 'string') {
    return error.codeName;
  }
  if ('code' in error && (typeof error.code === 'string' || typeof error.code === 'number')) {
    return error.code;
  }
  return undefined;
}

/**
 * Logger for a service component. Pretty outside production; silent under
 * test unless LOG_LEVEL is set, which also overrides the configured level.
 */
export function createServiceLogger(config?: Partial<LoggerConfig>, meta?: LogMeta): Logger {
  const level = process.env.LOG_LEVEL;
  const underTest = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

  const overrides: Partial<LoggerConfig> = { pretty: process.env.NODE_ENV !== 'production' };
  if (level) {
    overrides.level = parseLogLevel(level);
  } else if (underTest) {
    overrides.level = 'fatal';
    overrides.output = () => undefined;
  }

  return new Logger({ ...config, ...overrides }, meta);
}

/**
 * Correlation ID for a request that arrived without one
 */
export function generateCorrelationId(): string {
  return randomUUID().slice(0, 13);
}
