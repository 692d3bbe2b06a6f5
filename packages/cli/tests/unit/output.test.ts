/**
 * Unit tests for CLI output helpers
 * @module @kubesim/cli/tests/unit/output
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import {
  error,
  isOutputFormat,
  phaseBadge,
  relativeTime,
  resources,
  setOutputFormat,
  success,
  truncate,
  visibleLength,
} from '../../src/output.js';

describe('output', () => {
  beforeEach(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    setOutputFormat('table');
    vi.restoreAllMocks();
  });

  it('should recognise output formats', () => {
    expect(isOutputFormat('plain')).toBe(true);
    expect(isOutputFormat('yaml')).toBe(false);
  });

  it('should measure colored strings by their visible width', () => {
    expect(visibleLength('\u001b[32mReady\u001b[39m')).toBe(5);
  });

  it('should print messages per format', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const errorLog = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    success('done');
    setOutputFormat('json');
    success('done');
    error('failed', { code: 'CONFLICT' });

    expect(log.mock.calls).toEqual([['✓ done'], ['{"success":true,"message":"done"}']]);
    expect(errorLog).toHaveBeenCalledWith('{"success":false,"error":"failed","details":{"code":"CONFLICT"}}');
  });

  it('should badge phases except in plain output', () => {
    expect(phaseBadge('Failed')).toBe('● Failed');
    expect(phaseBadge('Deleted')).toBe('○ Deleted');
    setOutputFormat('plain');
    expect(phaseBadge('Failed')).toBe('Failed');
  });

  it('should format resources', () => {
    expect(resources({ cpu: 0.5, memory: 256 })).toBe('0.5 cpu, 256 MiB');
    expect(resources(undefined)).toBe('-');
  });

  it('should describe times relative to now', () => {
    const now = new Date('2026-03-10T12:00:00.000Z');
    expect(relativeTime('2026-03-10T11:59:30.000Z', now)).toBe('just now');
    expect(relativeTime('2026-03-10T11:15:00.000Z', now)).toBe('45m ago');
    expect(relativeTime('2026-03-10T07:00:00.000Z', now)).toBe('5h ago');
    expect(relativeTime('2026-03-08T12:00:00.000Z', now)).toBe('2d ago');
    expect(relativeTime('2026-02-01T12:00:00.000Z', now)).toBe('2026-02-01');
  });

  it('should truncate long strings', () => {
    expect(truncate('kubesim', 10)).toBe('kubesim');
    expect(truncate('a-very-long-node-name', 10)).toBe('a-very-...');
  });
});
