import type { Result } from '../../domain/result.js';
import { ErrorCode, type AppError } from '../../domain/errors.js';
import type { AppConfig } from '../../infrastructure/config.js';
import { logger } from '../../infrastructure/logger.js';
import { delayWithJitter, sleep } from '../../infrastructure/wait.js';

const log = logger.child({ module: 'retry' });

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  multiplier: number;
  /** Fraction of the exponential delay added at random, 0..1. */
  jitter: number;
  maxDelayMs: number;
  isRetryable(error: AppError): boolean;
}

export interface RetryHooks {
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  signal?: AbortSignal;
  /** Log context for retry messages. */
  context?: Record<string, unknown>;
}

/** Rate limits back off exponentially; every other extraction failure is final for this call. */
export function createExtractionRetryPolicy(config: Readonly<AppConfig>): RetryPolicy {
  const { maxAttempts, baseDelayMs, multiplier, jitter, maxDelayMs } = config.extraction;
  return {
    maxAttempts,
    baseDelayMs,
    multiplier,
    jitter,
    maxDelayMs,
    isRetryable: (error) => error.code === ErrorCode.EXTRACTION_RATE_LIMITED,
  };
}

export function retryDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  return delayWithJitter(attempt, policy.baseDelayMs, policy.multiplier, policy.jitter, policy.maxDelayMs, random);
}

export async function withRetry<T>(
  policy: RetryPolicy,
  fn: (attempt: number) => Promise<Result<T, AppError>>,
  hooks: RetryHooks = {},
): Promise<Result<T, AppError>> {
  const wait = hooks.sleep ?? sleep;
  let attempt = 0;

  for (;;) {
    const result = await fn(attempt);
    if (result.ok) return result;

    const isLast = attempt + 1 >= policy.maxAttempts;
    if (isLast || !policy.isRetryable(result.error) || hooks.signal?.aborted) {
      if (attempt > 0) {
        log.warn(
          { ...hooks.context, attempts: attempt + 1, errorCode: result.error.code },
          'Giving up after retries',
        );
      }
      return result;
    }

    const delayMs = retryDelay(policy, attempt, hooks.random);
    log.info(
      { ...hooks.context, attempt: attempt + 1, maxAttempts: policy.maxAttempts, delayMs, errorCode: result.error.code },
      'Retrying after retryable error',
    );
    await wait(delayMs, hooks.signal);
    attempt++;
  }
}
