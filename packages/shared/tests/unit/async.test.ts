/**
 * Unit tests for async utilities
 */

import { describe, it, expect, vi, afterEach } from 'vitest';

import { withTimeout, retry, sleep, errorMessage } from '../../src/utils/async';
import { RuntimeError, ConflictError } from '../../src/errors';

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve when the promise settles first', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 1000, 'op')).resolves.toBe('ok');
  });

  it('should propagate rejections', async () => {
    await expect(withTimeout(Promise.reject(new Error('nope')), 1000, 'op')).rejects.toThrow('nope');
  });

  it('should reject with a runtime timeout', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<string>(() => undefined), 100, 'startEnvironment');
    const assertion = expect(pending).rejects.toBeInstanceOf(RuntimeError);
    await vi.advanceTimersByTimeAsync(100);
    await assertion;
  });
});

describe('retry', () => {
  it('should retry retryable errors', async () => {
    let calls = 0;
    const result = await retry(
      () => {
        calls++;
        if (calls < 3) throw ConflictError.revisionMismatch('node', 'n1', 1, 2);
        return 'done';
      },
      { attempts: 5, shouldRetry: (e) => e instanceof ConflictError },
    );
    expect(result).toBe('done');
    expect(calls).toBe(3);
  });

  it('should stop on non-retryable errors', async () => {
    let calls = 0;
    await expect(
      retry(
        () => {
          calls++;
          throw new Error('fatal');
        },
        { attempts: 5, shouldRetry: () => false },
      ),
    ).rejects.toThrow('fatal');
    expect(calls).toBe(1);
  });

  it('should give up after the last attempt', async () => {
    let calls = 0;
    await expect(
      retry(
        () => {
          calls++;
          throw new Error('again');
        },
        { attempts: 2, shouldRetry: () => true },
      ),
    ).rejects.toThrow('again');
    expect(calls).toBe(2);
  });
});

describe('helpers', () => {
  it('should sleep', async () => {
    const start = Date.now();
    await sleep(5);
    expect(Date.now() - start).toBeGreaterThanOrEqual(4);
  });

  it('should extract error messages', () => {
    expect(errorMessage(new Error('a'))).toBe('a');
    expect(errorMessage(7)).toBe('7');
  });
});
