/**
 * CLI Configuration
 *
 * Handles configuration loading and API client setup.
 * @module @kubesim/cli/config
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { isRecord } from '@kubesim/shared';
import { isOutputFormat, type OutputFormat } from './output.js';

/**
 * Default API URL (local development)
 */
export const DEFAULT_API_URL = 'http://127.0.0.1:5000';

/**
 * Config directory path
 */
export const CONFIG_DIR = path.join(os.homedir(), '.kubesim');

/**
 * Config file path
 */
export const CONFIG_FILE = path.join(CONFIG_DIR, 'config.json');

/**
 * CLI configuration structure
 */
export interface CliConfig {
  apiUrl: string;
  defaultOutputFormat?: OutputFormat;
}

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: CliConfig = {
  apiUrl: DEFAULT_API_URL,
};

/**
 * Loads CLI configuration. An unreadable file is reported on stderr and
 * the defaults are used.
 */
export function loadConfig(file: string = CONFIG_FILE): CliConfig {
  if (!fs.existsSync(file)) {
    return { ...DEFAULT_CONFIG };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    process.stderr.write(`Ignoring unreadable config ${file}: ${reason}\n`);
    return { ...DEFAULT_CONFIG };
  }

  const config: CliConfig = { ...DEFAULT_CONFIG };
  if (isRecord(parsed)) {
    if (typeof parsed.apiUrl === 'string' && parsed.apiUrl.length > 0) {
      config.apiUrl = parsed.apiUrl;
    }
    if (typeof parsed.defaultOutputFormat === 'string' && isOutputFormat(parsed.defaultOutputFormat)) {
      config.defaultOutputFormat = parsed.defaultOutputFormat;
    }
  }
  return config;
}

/**
 * Saves CLI configuration
 */
export function saveConfig(config: Partial<CliConfig>, file: string = CONFIG_FILE): void {
  fs.mkdirSync(path.dirname(file), { recursive: true, mode: 0o700 });
  const updated = { ...loadConfig(file), ...config };
  fs.writeFileSync(file, JSON.stringify(updated, null, 2), { mode: 0o600 });
}

/**
 * API URL precedence: flag, API_SERVER_URL, config file, default
 */
export function resolveApiUrl(
  flag: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
  config: CliConfig = loadConfig(),
): string {
  const url = flag ?? env.API_SERVER_URL ?? config.apiUrl;
  return url.replace(/\/+$/, '');
}

/**
 * Error envelope returned by the API
 */
export interface ApiErrorBody {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * A request the API answered with an error, or could not answer
 */
export class ApiRequestError extends Error {
  readonly status: number;
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(status: number, body: ApiErrorBody) {
    super(body.message);
    this.name = 'ApiRequestError';
    this.status = status;
    this.code = body.code;
    this.details = body.details;
  }
}

/**
 * Per-request options
 */
export interface RequestOptions {
  /** Revision sent as If-Match */
  ifMatch?: number;
}

/**
 * HTTP client for the kubesim API
 */
export interface ApiClient {
  readonly baseUrl: string;
  get<T>(path: string): Promise<T>;
  post<T>(path: string, body?: unknown, options?: RequestOptions): Promise<T>;
  patch<T>(path: string, body: unknown, options?: RequestOptions): Promise<T>;
  delete<T>(path: string, options?: RequestOptions): Promise<T>;
}

function isErrorBody(value: unknown): value is ApiErrorBody {
  return isRecord(value) && typeof value.code === 'string' && typeof value.message === 'string';
}

/**
 * Creates an HTTP client for API calls. Resolves with the envelope's data,
 * rejects with ApiRequestError on an error envelope or unreachable server.
 */
export function createApiClient(baseUrl: string, fetchImpl: typeof fetch = fetch): ApiClient {
  async function request<T>(method: string, path: string, body?: unknown, options: RequestOptions = {}): Promise<T> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };
    if (options.ifMatch !== undefined) {
      headers['If-Match'] = `"${options.ifMatch}"`;
    }

    let response: Response;
    try {
      response = await fetchImpl(`${baseUrl}${path}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ApiRequestError(0, {
        code: 'UNREACHABLE',
        message: `Cannot reach the API at ${baseUrl}: ${reason}`,
      });
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      throw new ApiRequestError(response.status, {
        code: 'INVALID_RESPONSE',
        message: `${method} ${path} answered ${response.status} without a JSON body`,
      });
    }

    if (!isRecord(payload) || payload.success !== true) {
      const errorBody = isRecord(payload) && isErrorBody(payload.error)
        ? payload.error
        : { code: 'INVALID_RESPONSE', message: `${method} ${path} answered ${response.status}` };
      throw new ApiRequestError(response.status, errorBody);
    }

    // Only the envelope is checked; data is typed by the caller
    return payload.data as T;
  }

  return {
    baseUrl,
    get<T>(path: string): Promise<T> {
      return request<T>('GET', path);
    },
    post<T>(path: string, body?: unknown, options?: RequestOptions): Promise<T> {
      return request<T>('POST', path, body, options);
    },
    patch<T>(path: string, body: unknown, options?: RequestOptions): Promise<T> {
      return request<T>('PATCH', path, body, options);
    },
    delete<T>(path: string, options?: RequestOptions): Promise<T> {
      return request<T>('DELETE', path, undefined, options);
    },
  };
}
