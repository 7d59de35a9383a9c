import { ok, err, type Result } from '../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../domain/errors.js';

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface WaitOptions {
  timeoutMs: number;
  intervalMs: number;
  /** Time the portal needs to repaint before any check is meaningful. */
  minSettleMs?: number;
  signal?: AbortSignal;
  /** Label used in the timeout error. */
  description?: string;
}

/**
 * Polls `predicate` until it holds or `timeoutMs` elapses. The first check happens only after
 * `minSettleMs`, and the settle time counts towards the timeout.
 */
export async function waitUntil(
  predicate: () => Promise<boolean> | boolean,
  options: WaitOptions,
): Promise<Result<void, AppError>> {
  const { timeoutMs, intervalMs, minSettleMs = 0, signal, description = 'condition' } = options;
  const deadline = Date.now() + timeoutMs;

  if (minSettleMs > 0) await sleep(minSettleMs, signal);

  for (;;) {
    if (signal?.aborted) {
      return err(createAppError(ErrorCode.CANCELLED, `Cancelled while waiting for ${description}`, false));
    }
    if (await predicate()) return ok(undefined);
    if (Date.now() >= deadline) {
      return err(
        createAppError(ErrorCode.NAVIGATION_TIMEOUT, `Timed out after ${timeoutMs}ms waiting for ${description}`, true),
      );
    }
    await sleep(Math.min(intervalMs, Math.max(0, deadline - Date.now())), signal);
  }
}

/** Exponential delay with up to `jitter` x base added at random. */
export function delayWithJitter(
  attempt: number,
  baseDelayMs: number,
  multiplier = 2,
  jitter = 0.5,
  maxDelayMs = Number.POSITIVE_INFINITY,
  random: () => number = Math.random,
): number {
  const base = Math.min(baseDelayMs * Math.pow(multiplier, attempt), maxDelayMs);
  return Math.min(base + random() * base * jitter, maxDelayMs);
}
