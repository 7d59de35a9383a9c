import { describe, it, expect, vi } from 'vitest';
import { ok, err } from '../../src/domain/result.js';
import { createAppError, ErrorCode } from '../../src/domain/errors.js';
import { loadConfig } from '../../src/infrastructure/config.js';
import {
  createExtractionRetryPolicy,
  retryDelay,
  withRetry,
  type RetryPolicy,
} from '../../src/services/extraction/retry.js';

const policy: RetryPolicy = {
  maxAttempts: 5,
  baseDelayMs: 4000,
  multiplier: 2,
  jitter: 0.5,
  maxDelayMs: 120_000,
  isRetryable: (error) => error.retryable,
};

describe('retryDelay', () => {
  it('grows exponentially from the base delay', () => {
    expect([0, 1, 2, 3].map((attempt) => retryDelay(policy, attempt, () => 0))).toEqual([4000, 8000, 16000, 32000]);
  });

  it('adds up to half the base as jitter', () => {
    expect(retryDelay(policy, 1, () => 1)).toBe(12000);
  });

  it('never exceeds the maximum delay', () => {
    expect(retryDelay(policy, 10, () => 1)).toBe(120_000);
  });
});

describe('withRetry', () => {
  it('returns the first success without sleeping', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const fn = vi.fn().mockResolvedValue(ok('done'));

    const result = await withRetry(policy, fn, { sleep });

    expect(result).toEqual({ ok: true, value: 'done' });
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('passes the attempt number to the operation', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const fn = vi
      .fn()
      .mockResolvedValueOnce(err(createAppError(ErrorCode.EXTRACTION_RATE_LIMITED, 'slow down', true)))
      .mockResolvedValueOnce(ok(1));

    await withRetry(policy, fn, { sleep, random: () => 0 });

    expect(fn.mock.calls.map((call) => call[0])).toEqual([0, 1]);
    expect(sleep).toHaveBeenCalledWith(4000, undefined);
  });

  it('stops at a non-retryable error', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const fn = vi.fn().mockResolvedValue(err(createAppError(ErrorCode.EXTRACTION_AUTH_ERROR, 'denied', false)));

    const result = await withRetry(policy, fn, { sleep });

    expect(result.ok).toBe(false);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('stops retrying once the signal is aborted', async () => {
    const controller = new AbortController();
    const fn = vi.fn().mockImplementation(async () => {
      controller.abort();
      return err(createAppError(ErrorCode.EXTRACTION_RATE_LIMITED, 'slow down', true));
    });

    const result = await withRetry(policy, fn, { signal: controller.signal, sleep: vi.fn() });

    expect(result.ok).toBe(false);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('createExtractionRetryPolicy', () => {
  it('retries only rate limits, with the configured schedule', () => {
    const config = loadConfig({ EXTRACTION_MAX_ATTEMPTS: '3' });
    expect(config.ok).toBe(true);
    if (!config.ok) return;

    const p = createExtractionRetryPolicy(config.value);

    expect(p.maxAttempts).toBe(3);
    expect(p.baseDelayMs).toBe(4000);
    expect(p.isRetryable(createAppError(ErrorCode.EXTRACTION_RATE_LIMITED, 'x', true))).toBe(true);
    expect(p.isRetryable(createAppError(ErrorCode.EXTRACTION_MALFORMED_RESPONSE, 'x', true))).toBe(false);
    expect(p.isRetryable(createAppError(ErrorCode.EXTRACTION_UNAVAILABLE, 'x', false))).toBe(false);
  });
});
