import { ErrorCode, type AppError } from '../../domain/errors.js';
import type { ConformityResult, SkipReason } from '../../domain/types.js';

export type RunStatus = 'running' | 'completed' | 'cancelled' | 'failed';

export interface UnitFailure {
  company_id: string;
  processo: string | null;
  reason: SkipReason;
  code: string;
  message: string;
  state?: string;
}

export interface RunSummary {
  run_id: string;
  status: RunStatus;
  started_at: string;
  finished_at: string | null;
  companies: {
    total: number;
    completed: number;
    failed: number;
    /** Already finished in an earlier run of the same id. */
    resumed: number;
  };
  processed: {
    total: number;
    conforme: number;
    parcial: number;
    nao_conforme: number;
    not_located: number;
  };
  skipped: Record<SkipReason, number> & { total: number };
  /** Processos finished in an earlier run of the same id. */
  resumed_processos: number;
  failures: UnitFailure[];
  error: AppError | null;
}

const SKIP_REASON_BY_CODE: Partial<Record<ErrorCode, SkipReason>> = {
  [ErrorCode.CAPTCHA_UNRESOLVED]: 'captcha',
  [ErrorCode.NAVIGATION_TIMEOUT]: 'timeout',
  [ErrorCode.PORTAL_UNREACHABLE]: 'timeout',
  [ErrorCode.PARSING_ERROR]: 'parse_error',
  [ErrorCode.EXTRACTION_RATE_LIMITED]: 'extraction',
  [ErrorCode.EXTRACTION_MALFORMED_RESPONSE]: 'extraction',
  [ErrorCode.EXTRACTION_UNAVAILABLE]: 'extraction',
  [ErrorCode.EXTRACTION_AUTH_ERROR]: 'extraction',
};

export function skipReasonFor(error: AppError): SkipReason {
  return SKIP_REASON_BY_CODE[error.code] ?? 'other';
}

export function emptySummary(runId: string, now: Date = new Date()): RunSummary {
  return {
    run_id: runId,
    status: 'running',
    started_at: now.toISOString(),
    finished_at: null,
    companies: { total: 0, completed: 0, failed: 0, resumed: 0 },
    processed: { total: 0, conforme: 0, parcial: 0, nao_conforme: 0, not_located: 0 },
    skipped: { captcha: 0, timeout: 0, parse_error: 0, extraction: 0, other: 0, total: 0 },
    resumed_processos: 0,
    failures: [],
    error: null,
  };
}

/** Counts a processed unit. Not located is counted apart from non-compliance. */
export function countProcessed(summary: RunSummary, result: ConformityResult): void {
  summary.processed.total++;
  if (result.publication_status === 'NOT_LOCATED') {
    summary.processed.not_located++;
    return;
  }
  switch (result.overall_status) {
    case 'CONFORME':
      summary.processed.conforme++;
      break;
    case 'PARCIAL':
      summary.processed.parcial++;
      break;
    case 'NAO_CONFORME':
      summary.processed.nao_conforme++;
      break;
  }
}

export function countSkipped(
  summary: RunSummary,
  error: AppError,
  companyId: string,
  processo: string | null,
): UnitFailure {
  const reason = skipReasonFor(error);
  summary.skipped[reason]++;
  summary.skipped.total++;
  const failure: UnitFailure = {
    company_id: companyId,
    processo,
    reason,
    code: error.code,
    message: error.message,
    ...(error.state !== undefined && { state: error.state }),
  };
  summary.failures.push(failure);
  return failure;
}
