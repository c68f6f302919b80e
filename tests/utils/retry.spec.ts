import { describe, expect, it, vi } from 'vitest';
import { withRetry } from '../../src/utils/retry.js';

describe('withRetry', () => {
  it('returns success immediately when the operation succeeds on first attempt', async () => {
    const fn = vi.fn(async () => 'ok');

    const result = await withRetry(fn, { maxAttempts: 3, baseDelayMs: 0 });

    expect(result.ok).toBe(true);
    expect(result.value).toBe('ok');
    expect(result.attempts).toBe(1);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retries failed operations and eventually succeeds', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('transient-failure'))
      .mockResolvedValueOnce('recovered');

    const result = await withRetry(fn, {
      maxAttempts: 3,
      baseDelayMs: 0,
      backoffFactor: 2,
      label: 'retry-recovery',
    });

    expect(result.ok).toBe(true);
    expect(result.value).toBe('recovered');
    expect(result.attempts).toBe(2);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('returns a failed result after exhausting all attempts', async () => {
    const fn = vi.fn(async () => {
      throw new Error('permanent-failure');
    });

    const result = await withRetry(fn, {
      maxAttempts: 2,
      baseDelayMs: 0,
      label: 'retry-exhausted',
    });

    expect(result.ok).toBe(false);
    expect(result.error).toContain('permanent-failure');
    expect(result.attempts).toBe(2);
    expect(fn).toHaveBeenCalledTimes(2);
  });
});

describe('withRetry backoff and filtering', () => {
  it('waits with exponential backoff capped at maxDelayMs', async () => {
    const delays: number[] = [];
    const fn = vi.fn(async () => {
      throw new Error('still-down');
    });

    await withRetry(fn, {
      maxAttempts: 4,
      baseDelayMs: 100,
      backoffFactor: 3,
      maxDelayMs: 500,
      sleep: async (ms) => {
        delays.push(ms);
      },
    });

    expect(delays).toEqual([100, 300, 500]);
  });

  it('stops at the first error rejected by shouldRetry', async () => {
    const permanent = new Error('bad-request');
    const fn = vi.fn(async () => {
      throw permanent;
    });

    const result = await withRetry(fn, { maxAttempts: 5, baseDelayMs: 0, shouldRetry: () => false });

    expect(result.ok).toBe(false);
    expect(result.attempts).toBe(1);
    expect(result.cause).toBe(permanent);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('treats a non-positive attempt count as a single attempt', async () => {
    const fn = vi.fn(async () => 'once');
    const result = await withRetry(fn, { maxAttempts: 0 });
    expect(result.attempts).toBe(1);
  });
});
