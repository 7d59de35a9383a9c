import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../../domain/errors.js';
import { processoFileKey } from '../../domain/processo.js';
import { auditRecordSchema } from '../../domain/schemas.js';
import type { AuditRecord } from '../../domain/types.js';
import { logger } from '../logger.js';
import { writeFileAtomic } from './atomic-write.js';

const log = logger.child({ module: 'result-store' });

/** Destination for finished processo records. */
export interface ResultSink {
  write(record: AuditRecord): Promise<Result<void, AppError>>;
}

const CSV_COLUMNS = [
  'processo',
  'company_id',
  'company_name',
  'overall_status',
  'conformity_score',
  'publication_status',
  'timely',
  'days_difference',
  'publication_date',
  'publication_url',
  'reasons',
] as const;

function escapeCsvField(value: string | number | boolean | null): string {
  if (value === null) return '';
  const str = String(value);
  if (str.includes(',') || str.includes('"') || str.includes('\n')) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

export function toCsvRow(record: AuditRecord): string {
  const { conformity, publication } = record;
  const reasons = conformity.reasons.map((r) => (r.field ? `${r.code}:${r.field}` : r.code)).join(';');
  const values: Record<(typeof CSV_COLUMNS)[number], string | number | boolean | null> = {
    processo: record.processo,
    company_id: record.company_id,
    company_name: record.company_name,
    overall_status: conformity.overall_status,
    conformity_score: conformity.conformity_score,
    publication_status: conformity.publication_status,
    timely: conformity.timely,
    days_difference: conformity.days_difference,
    publication_date: publication.publication_date,
    publication_url: publication.publication_url,
    reasons,
  };
  return CSV_COLUMNS.map((column) => escapeCsvField(values[column])).join(',');
}

function persistenceError(message: string, cause: unknown): AppError {
  return createAppError(ErrorCode.PERSISTENCE_ERROR, message, false, describeCause(cause));
}

/**
 * One JSON document per processo under `<outputDir>/<runId>/results`, plus a CSV export of
 * every stored record. Writing the same processo again replaces its document.
 */
export class JsonResultStore implements ResultSink {
  readonly runDir: string;
  readonly resultsDir: string;

  constructor(outputDir: string, runId: string) {
    this.runDir = join(outputDir, runId);
    this.resultsDir = join(this.runDir, 'results');
  }

  pathFor(processo: string): string {
    return join(this.resultsDir, `${processoFileKey(processo)}.json`);
  }

  async write(record: AuditRecord): Promise<Result<void, AppError>> {
    const path = this.pathFor(record.processo);
    try {
      await writeFileAtomic(path, `${JSON.stringify(record, null, 2)}\n`);
    } catch (cause) {
      log.error({ processo: record.processo, path, errorCode: ErrorCode.PERSISTENCE_ERROR }, 'Failed to write result');
      return err(persistenceError('Failed to write result document', cause));
    }
    log.debug({ processo: record.processo, path }, 'Result written');
    return ok(undefined);
  }

  /** Every stored record, ordered by processo. */
  async list(): Promise<Result<AuditRecord[], AppError>> {
    let names: string[];
    try {
      names = await readdir(this.resultsDir);
    } catch (cause) {
      if (cause instanceof Error && 'code' in cause && cause.code === 'ENOENT') return ok([]);
      return err(persistenceError('Failed to list result documents', cause));
    }

    const records: AuditRecord[] = [];
    for (const name of names.filter((n) => n.endsWith('.json')).sort()) {
      const path = join(this.resultsDir, name);
      let json: unknown;
      try {
        json = JSON.parse(await readFile(path, 'utf8'));
      } catch (cause) {
        return err(persistenceError(`Failed to read result document ${name}`, cause));
      }
      const parsed = auditRecordSchema.safeParse(json);
      if (!parsed.success) {
        return err(createAppError(ErrorCode.PERSISTENCE_ERROR, `Result document ${name} does not match schema`, false, parsed.error.message));
      }
      records.push(parsed.data);
    }
    return ok(records);
  }

  async exportCsv(): Promise<Result<{ path: string; rows: number }, AppError>> {
    const records = await this.list();
    if (!records.ok) return records;

    const path = join(this.runDir, 'conformity.csv');
    const lines = [CSV_COLUMNS.join(','), ...records.value.map(toCsvRow)];
    try {
      await writeFileAtomic(path, `${lines.join('\n')}\n`);
    } catch (cause) {
      return err(persistenceError('Failed to write CSV export', cause));
    }
    log.info({ path, rows: records.value.length }, 'CSV export written');
    return ok({ path, rows: records.value.length });
  }
}
