import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import { logger, type Logger } from '../../infrastructure/logger.js';
import { sleep } from '../../infrastructure/wait.js';
import type { CaptchaChallenge } from './types.js';

export interface ManualWait {
  processo: string;
  since: string;
  deadline: string;
}

/**
 * Rendezvous between a run blocked on a CAPTCHA and the person solving it. The control API
 * calls `signalSolved`; the gate re-checks the page immediately instead of waiting for its
 * next poll.
 */
export class ManualSolveSignal {
  private current: ManualWait | null = null;
  private readonly wakers = new Set<() => void>();

  get waiting(): ManualWait | null {
    return this.current;
  }

  begin(processo: string, timeoutMs: number, now: Date = new Date()): void {
    this.current = {
      processo,
      since: now.toISOString(),
      deadline: new Date(now.getTime() + timeoutMs).toISOString(),
    };
  }

  end(): void {
    this.current = null;
  }

  /** Returns false when nothing is waiting. */
  signalSolved(): boolean {
    if (this.current === null) return false;
    for (const wake of this.wakers) wake();
    return true;
  }

  /** Sleeps up to `ms`, returning early on `signalSolved` or abort. */
  async pause(ms: number, signal?: AbortSignal): Promise<void> {
    const local = new AbortController();
    const wake = () => local.abort();
    this.wakers.add(wake);
    signal?.addEventListener('abort', wake, { once: true });
    try {
      await sleep(ms, local.signal);
    } finally {
      this.wakers.delete(wake);
      signal?.removeEventListener('abort', wake);
    }
  }
}

export interface CaptchaGateOptions {
  autoAttempts: number;
  manualTimeoutMs: number;
  pollIntervalMs: number;
  log?: Logger;
}

/**
 * Clears a CAPTCHA: a bounded number of automated attempts, then a bounded wait for a person.
 * Fails with CAPTCHA_UNRESOLVED when the manual wait runs out and with CANCELLED when the run
 * is cancelled while waiting.
 */
export class CaptchaGate {
  private readonly log: Logger;

  constructor(
    private readonly options: CaptchaGateOptions,
    readonly manual: ManualSolveSignal = new ManualSolveSignal(),
  ) {
    this.log = (options.log ?? logger).child({ module: 'captcha-gate' });
  }

  async clear(portal: CaptchaChallenge, processo: string, signal?: AbortSignal): Promise<Result<void, AppError>> {
    for (let attempt = 1; attempt <= this.options.autoAttempts; attempt++) {
      const solved = await portal.solveCaptchaAutomatically();
      if (!solved.ok) {
        this.log.warn({ processo, attempt, errorCode: solved.error.code }, 'Automated CAPTCHA attempt failed');
        continue;
      }
      if (solved.value && (await this.isClear(portal))) {
        this.log.info({ processo, attempt }, 'CAPTCHA cleared automatically');
        return ok(undefined);
      }
    }

    return this.waitForPerson(portal, processo, signal);
  }

  private async waitForPerson(
    portal: CaptchaChallenge,
    processo: string,
    signal?: AbortSignal,
  ): Promise<Result<void, AppError>> {
    const { manualTimeoutMs, pollIntervalMs } = this.options;
    const deadline = Date.now() + manualTimeoutMs;
    this.manual.begin(processo, manualTimeoutMs);
    this.log.warn({ processo, timeoutMs: manualTimeoutMs }, 'CAPTCHA needs a manual solve');

    try {
      for (;;) {
        if (signal?.aborted) {
          return err(createAppError(ErrorCode.CANCELLED, 'Cancelled while waiting for CAPTCHA', false, undefined, 'CAPTCHA_BLOCKED'));
        }
        if (await this.isClear(portal)) {
          this.log.info({ processo }, 'CAPTCHA solved manually');
          return ok(undefined);
        }
        const remaining = deadline - Date.now();
        if (remaining <= 0) {
          this.log.warn({ processo, errorCode: ErrorCode.CAPTCHA_UNRESOLVED }, 'CAPTCHA wait timed out');
          return err(
            createAppError(
              ErrorCode.CAPTCHA_UNRESOLVED,
              `CAPTCHA not solved within ${Math.round(manualTimeoutMs / 1000)}s`,
              false,
              undefined,
              'CAPTCHA_BLOCKED',
            ),
          );
        }
        await this.manual.pause(Math.min(pollIntervalMs, remaining), signal);
      }
    } finally {
      this.manual.end();
    }
  }

  private async isClear(portal: CaptchaChallenge): Promise<boolean> {
    const status = await portal.captchaStatus();
    if (!status.ok) {
      this.log.debug({ errorCode: status.error.code }, 'CAPTCHA status check failed');
      return false;
    }
    return status.value === 'clear';
  }
}
