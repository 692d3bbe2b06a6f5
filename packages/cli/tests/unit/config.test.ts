/**
 * Unit tests for CLI configuration and the API client
 * @module @kubesim/cli/tests/unit/config
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  ApiRequestError,
  DEFAULT_API_URL,
  createApiClient,
  loadConfig,
  resolveApiUrl,
  saveConfig,
} from '../../src/config.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('CLI config', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'kubesim-cli-'));
    file = path.join(dir, 'config.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe('loadConfig', () => {
    it('should return defaults when the file is missing', () => {
      expect(loadConfig(file)).toEqual({ apiUrl: DEFAULT_API_URL });
    });

    it('should read known keys and drop unknown output formats', () => {
      fs.writeFileSync(file, JSON.stringify({ apiUrl: 'http://file.test:5000', defaultOutputFormat: 'yaml' }));

      expect(loadConfig(file)).toEqual({ apiUrl: 'http://file.test:5000' });
    });

    it('should report an unreadable file and fall back to defaults', () => {
      const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      fs.writeFileSync(file, '{ not json');

      expect(loadConfig(file)).toEqual({ apiUrl: DEFAULT_API_URL });
      expect(write).toHaveBeenCalledOnce();
      expect(String(write.mock.calls[0]?.[0])).toContain(`Ignoring unreadable config ${file}`);
    });
  });

  describe('saveConfig', () => {
    it('should merge into the existing file', () => {
      saveConfig({ apiUrl: 'http://saved.test' }, file);
      saveConfig({ defaultOutputFormat: 'json' }, file);

      expect(loadConfig(file)).toEqual({ apiUrl: 'http://saved.test', defaultOutputFormat: 'json' });
    });
  });

  describe('resolveApiUrl', () => {
    const config = { apiUrl: 'http://file.test' };

    it('should prefer the flag, then the environment, then the file', () => {
      expect(resolveApiUrl('http://flag.test', { API_SERVER_URL: 'http://env.test' }, config)).toBe('http://flag.test');
      expect(resolveApiUrl(undefined, { API_SERVER_URL: 'http://env.test' }, config)).toBe('http://env.test');
      expect(resolveApiUrl(undefined, {}, config)).toBe('http://file.test');
    });

    it('should drop trailing slashes', () => {
      expect(resolveApiUrl('http://flag.test//', {}, config)).toBe('http://flag.test');
    });
  });
});

describe('createApiClient', () => {
  it('should unwrap the data of a success envelope', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ success: true, data: { total: 0 } }));
    const client = createApiClient('http://api.test', fetchMock);

    await expect(client.get<{ total: number }>('/api/nodes')).resolves.toEqual({ total: 0 });
    expect(fetchMock).toHaveBeenCalledWith('http://api.test/api/nodes', {
      method: 'GET',
      headers: { 'Content-Type': 'application/json' },
      body: undefined,
    });
  });

  it('should send the body and the expected revision', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ success: true, data: {} }));
    const client = createApiClient('http://api.test', fetchMock);

    await client.patch('/api/nodes/n1', { capacity: { cpu: 2 } }, { ifMatch: 3 });

    expect(fetchMock).toHaveBeenCalledWith('http://api.test/api/nodes/n1', {
      method: 'PATCH',
      headers: { 'Content-Type': 'application/json', 'If-Match': '"3"' },
      body: '{"capacity":{"cpu":2}}',
    });
  });

  it('should reject with the error envelope', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse(
        {
          success: false,
          error: { code: 'CONFLICT', message: "Node 'n1' is at revision 4, expected 3", details: { actualRevision: 4 } },
        },
        409,
      ),
    );
    const client = createApiClient('http://api.test', fetchMock);

    const failure = await client.delete('/api/nodes/n1').catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(ApiRequestError);
    expect(failure).toMatchObject({
      status: 409,
      code: 'CONFLICT',
      message: "Node 'n1' is at revision 4, expected 3",
      details: { actualRevision: 4 },
    });
  });

  it('should reject when the server cannot be reached', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(new Error('connect ECONNREFUSED'));
    const client = createApiClient('http://api.test', fetchMock);

    await expect(client.get('/api/status')).rejects.toMatchObject({
      status: 0,
      code: 'UNREACHABLE',
      message: 'Cannot reach the API at http://api.test: connect ECONNREFUSED',
    });
  });

  it('should reject a body that is not JSON', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response('Bad Gateway', { status: 502 }));
    const client = createApiClient('http://api.test', fetchMock);

    await expect(client.post('/api/reconcile')).rejects.toMatchObject({
      status: 502,
      code: 'INVALID_RESPONSE',
      message: 'POST /api/reconcile answered 502 without a JSON body',
    });
  });
});
