import type { ManualSolveSignal, ManualWait } from '../publication/index.js';
import type { RunSummary } from './summary.js';

export interface RunStatusView {
  run: RunSummary | null;
  current: { companyId: string; processo: string | null } | null;
  captcha: ManualWait | null;
  cancelRequested: boolean;
}

/**
 * Shared view of the active run for the control API: the live summary, the unit in progress,
 * the CAPTCHA wait and the cancellation switch.
 */
export class RunMonitor {
  private readonly controller = new AbortController();
  private summary: RunSummary | null = null;
  private current: RunStatusView['current'] = null;

  constructor(readonly captcha: ManualSolveSignal) {}

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** Pass as `onStart` to `runBatch`. */
  readonly attach = (summary: RunSummary): void => {
    this.summary = summary;
  };

  /** Pass as `onUnit` to `runBatch`. */
  readonly track = (unit: { companyId: string; processo: string | null }): void => {
    this.current = unit;
  };

  /** Returns false when cancellation was already requested. */
  cancel(): boolean {
    if (this.controller.signal.aborted) return false;
    this.controller.abort();
    return true;
  }

  status(): RunStatusView {
    const finished = this.summary !== null && this.summary.status !== 'running';
    return {
      run: this.summary,
      current: finished ? null : this.current,
      captcha: this.captcha.waiting,
      cancelRequested: this.controller.signal.aborted,
    };
  }
}
