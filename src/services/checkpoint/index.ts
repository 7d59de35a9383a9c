import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import { matchesProcesso } from '../../domain/processo.js';
import type { Checkpoint } from '../../domain/types.js';

export { FileCheckpointStore } from './file-store.js';

export interface CheckpointStore {
  /** Null when the run has no checkpoint yet. */
  load(runId: string): Promise<Result<Checkpoint | null, AppError>>;
  save(checkpoint: Checkpoint): Promise<Result<void, AppError>>;
}

export function emptyCheckpoint(runId: string, now: Date = new Date()): Checkpoint {
  return {
    run_id: runId,
    last_processed_company_id: null,
    processed_processo_ids: [],
    completed_company_ids: [],
    updated_at: now.toISOString(),
  };
}

export function isProcessoDone(checkpoint: Checkpoint, processo: string): boolean {
  return checkpoint.processed_processo_ids.some((id) => matchesProcesso(id, processo));
}

export function isCompanyDone(checkpoint: Checkpoint, companyId: string): boolean {
  return checkpoint.completed_company_ids.includes(companyId);
}

/** Records a processo whose unit finished, successfully or with a terminal failure. */
export function withProcesso(
  checkpoint: Checkpoint,
  processo: string,
  companyId: string,
  now: Date = new Date(),
): Checkpoint {
  return {
    ...checkpoint,
    last_processed_company_id: companyId,
    processed_processo_ids: isProcessoDone(checkpoint, processo)
      ? checkpoint.processed_processo_ids
      : [...checkpoint.processed_processo_ids, processo],
    updated_at: now.toISOString(),
  };
}

export function withCompany(checkpoint: Checkpoint, companyId: string, now: Date = new Date()): Checkpoint {
  return {
    ...checkpoint,
    last_processed_company_id: companyId,
    completed_company_ids: isCompanyDone(checkpoint, companyId)
      ? checkpoint.completed_company_ids
      : [...checkpoint.completed_company_ids, companyId],
    updated_at: now.toISOString(),
  };
}
