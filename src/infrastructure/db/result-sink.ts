import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../../domain/errors.js';
import type { AuditRecord } from '../../domain/types.js';
import { logger } from '../logger.js';
import type { ResultSink } from '../storage/json-result-store.js';
import type { Database } from './client.js';
import { conformityResults } from './schema.js';

const log = logger.child({ module: 'result-sink' });

export function toConformityRow(runId: string, record: AuditRecord): typeof conformityResults.$inferInsert {
  const { conformity, publication } = record;
  return {
    runId,
    processo: record.processo,
    companyId: record.company_id,
    companyName: record.company_name,
    overallStatus: conformity.overall_status,
    conformityScore: conformity.conformity_score,
    publicationStatus: conformity.publication_status,
    timely: conformity.timely,
    daysDifference: conformity.days_difference,
    publicationDate: publication.publication_date,
    publicationUrl: publication.publication_url,
    fieldChecks: conformity.field_checks,
    reasons: conformity.reasons,
    contract: record.contract,
    publication,
    recordedAt: new Date(record.recorded_at),
  };
}

/** Mirrors results into Postgres for the reporting side; one row per run and processo. */
export class PostgresResultSink implements ResultSink {
  constructor(
    private readonly db: Database,
    private readonly runId: string,
  ) {}

  async write(record: AuditRecord): Promise<Result<void, AppError>> {
    const row = toConformityRow(this.runId, record);
    try {
      await this.db
        .insert(conformityResults)
        .values(row)
        .onConflictDoUpdate({
          target: [conformityResults.runId, conformityResults.processo],
          set: { ...row, updatedAt: new Date() },
        });
    } catch (cause) {
      const details = describeCause(cause);
      log.error({ processo: record.processo, errorCode: ErrorCode.PERSISTENCE_ERROR, details }, 'Failed to upsert conformity result');
      return err(createAppError(ErrorCode.PERSISTENCE_ERROR, 'Failed to store conformity result', false, details));
    }
    return ok(undefined);
  }
}
