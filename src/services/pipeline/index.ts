import { ok, err, type Result } from '../../domain/result.js';
import { ErrorCode, isFatal, isRevisitedOnResume, type AppError } from '../../domain/errors.js';
import type {
  AuditRecord,
  Checkpoint,
  CompanyRecord,
  ConformityResult,
  ContractPublicationPair,
  ProcessoLink,
  PublicationResult,
} from '../../domain/types.js';
import type { AppConfig } from '../../infrastructure/config.js';
import { logger, createRunLogger, type Logger } from '../../infrastructure/logger.js';
import type { ResultSink } from '../../infrastructure/storage/json-result-store.js';
import {
  emptyCheckpoint,
  isCompanyDone,
  isProcessoDone,
  withCompany,
  withProcesso,
  type CheckpointStore,
} from '../checkpoint/index.js';
import { evaluateConformity } from '../conformity/index.js';
import { extractContractRecord, type ExtractionAdapter, type RetryHooks, type RetryPolicy } from '../extraction/index.js';
import { collectCompaniesWithReset, discoverProcessoLinks, type PortalAdapter } from '../navigation/index.js';
import type { ContractDocumentSource } from './contract-source.js';
import { countProcessed, countSkipped, emptySummary, type RunSummary } from './summary.js';

export { PdfDirectoryContractSource, ProcessoDocumentSource } from './contract-source.js';
export type {
  ContractDocumentSource,
  DocumentLink,
  ProcessoDocumentPortal,
  ProcessoDocumentSourceOptions,
} from './contract-source.js';
export { loadCompanySeed, parseCompanySeed } from './company-seed.js';
export { emptySummary, skipReasonFor } from './summary.js';
export type { RunStatus, RunSummary, UnitFailure } from './summary.js';
export { RunMonitor } from './run-monitor.js';
export type { RunStatusView } from './run-monitor.js';

/** Anything that can look up the publication of a processo. */
export interface PublicationSearch {
  search(processo: string, signal?: AbortSignal): Promise<Result<PublicationResult, AppError>>;
}

export interface PipelineDeps {
  portal: PortalAdapter;
  publications: PublicationSearch;
  extractor: ExtractionAdapter;
  contracts: ContractDocumentSource;
  checkpoints: CheckpointStore;
  sinks: ResultSink[];
  policy: RetryPolicy;
  retryHooks?: RetryHooks;
  log?: Logger;
  now?: () => Date;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Continue from the run's checkpoint instead of starting over. */
  resume?: boolean;
  /** Company list to use instead of reading the portal's table. */
  companies?: CompanyRecord[];
  /** Receives the live summary; the same object is updated as the run goes. */
  onStart?: (summary: RunSummary) => void;
  onUnit?: (unit: { companyId: string; processo: string | null }) => void;
}

/** Result of a run that reached its end, was cancelled or stopped on a fatal error. */
export type RunOutcome = Result<RunSummary, { error: AppError; summary: RunSummary }>;

/**
 * Runs the batch: companies, then each company's processos, one unit at a time over the one
 * browser session. A unit that fails is recorded and skipped; configuration and persistence
 * failures stop the run. Cancellation is honoured between units, and the checkpoint is
 * written after every finished unit so that a resumed run continues where this one stopped.
 * Units that failed for want of a document stay out of the checkpoint, as does their company.
 */
export async function runBatch(
  deps: PipelineDeps,
  config: Readonly<AppConfig>,
  options: RunOptions = {},
): Promise<RunOutcome> {
  const now = deps.now ?? (() => new Date());
  const log = (deps.log ?? createRunLogger(config.runId)).child({ module: 'pipeline' });
  const summary = emptySummary(config.runId, now());
  options.onStart?.(summary);

  const finish = (status: RunSummary['status']): RunOutcome => {
    summary.status = status;
    summary.finished_at = now().toISOString();
    log.info(
      { status, processed: summary.processed, skipped: summary.skipped, companies: summary.companies },
      'Run finished',
    );
    return ok(summary);
  };
  const abort = (error: AppError): RunOutcome => {
    summary.status = 'failed';
    summary.finished_at = now().toISOString();
    summary.error = error;
    log.error({ errorCode: error.code, details: error.details }, 'Run stopped');
    return err({ error, summary });
  };

  let checkpoint: Checkpoint = emptyCheckpoint(config.runId, now());
  if (options.resume) {
    const loaded = await deps.checkpoints.load(config.runId);
    if (!loaded.ok) return abort(loaded.error);
    if (loaded.value) checkpoint = loaded.value;
    log.info({ resumed: loaded.value !== null }, 'Resuming run');
  }
  const flush = async (next: Checkpoint): Promise<AppError | null> => {
    const saved = await deps.checkpoints.save(next);
    if (!saved.ok) return saved.error;
    checkpoint = next;
    return null;
  };

  const opened = await deps.portal.open();
  if (!opened.ok) return abort(opened.error);
  const filtered = await deps.portal.applyFilter(config.filterYear);
  if (!filtered.ok) return abort(filtered.error);

  let companies = options.companies;
  if (!companies) {
    const collected = await collectCompaniesWithReset(deps.portal, config.filterYear, {
      maxPasses: config.portal.maxRowPasses,
      log,
    });
    if (!collected.ok) return abort(collected.error);
    companies = collected.value;
  }

  const pending = companies.filter((company) => !isCompanyDone(checkpoint, company.company_id));
  summary.companies.resumed = companies.length - pending.length;
  const selected = config.maxCompanies === null ? pending : pending.slice(0, config.maxCompanies);
  summary.companies.total = selected.length;
  log.info({ companies: companies.length, pending: pending.length, selected: selected.length }, 'Companies ready');

  for (const company of selected) {
    if (options.signal?.aborted) return cancel();
    options.onUnit?.({ companyId: company.company_id, processo: null });

    const companyLog = createRunLogger(config.runId, company.company_id);
    const discovery = await discoverProcessoLinks(deps.portal, company, { filterYear: config.filterYear, log: companyLog });
    if (!discovery.ok) {
      const failure = countSkipped(summary, discovery.error, company.company_id, null);
      summary.companies.failed++;
      companyLog.warn({ ...failure, errorCode: failure.code }, 'Company skipped');
      const saved = await flush(withCompany(checkpoint, company.company_id, now()));
      if (saved) return abort(saved);
      continue;
    }

    for (const branch of discovery.value.skippedBranches) {
      countSkipped(summary, branch.error, company.company_id, null);
    }

    let interrupted = false;
    let deferred = 0;
    for (const link of discovery.value.links) {
      if (options.signal?.aborted) {
        interrupted = true;
        break;
      }
      if (isProcessoDone(checkpoint, link.processo)) {
        summary.resumed_processos++;
        continue;
      }
      options.onUnit?.({ companyId: company.company_id, processo: link.processo });

      const unitLog = createRunLogger(config.runId, company.company_id, link.processo);
      const unit = await processUnit(deps, config, link, unitLog, now, options.signal);

      if (!unit.ok) {
        if (isFatal(unit.error)) return abort(unit.error);
        if (unit.error.code === ErrorCode.CANCELLED) {
          interrupted = true;
          break;
        }
        const failure = countSkipped(summary, unit.error, company.company_id, link.processo);
        unitLog.warn(
          { state: failure.state, errorCode: failure.code, retryable: unit.error.retryable, reason: failure.reason },
          'Processo skipped',
        );
        if (isRevisitedOnResume(unit.error)) {
          deferred++;
          continue;
        }
      } else {
        for (const sink of deps.sinks) {
          const written = await sink.write(unit.value);
          if (!written.ok) return abort(written.error);
        }
        countProcessed(summary, unit.value.conformity);
        unitLog.info(
          { status: unit.value.conformity.overall_status, score: unit.value.conformity.conformity_score },
          'Processo evaluated',
        );
      }

      const saved = await flush(withProcesso(checkpoint, link.processo, company.company_id, now()));
      if (saved) return abort(saved);
    }

    if (interrupted) return cancel();
    summary.companies.completed++;
    if (deferred > 0) {
      // Left open in the checkpoint so that --resume comes back for the deferred processos.
      companyLog.info({ deferred }, 'Company has processos to revisit on resume');
      continue;
    }
    const saved = await flush(withCompany(checkpoint, company.company_id, now()));
    if (saved) return abort(saved);
  }

  return finish('completed');

  async function cancel(): Promise<RunOutcome> {
    log.warn({ processed: checkpoint.processed_processo_ids.length }, 'Run cancelled, checkpoint flushed');
    const saved = await deps.checkpoints.save({ ...checkpoint, updated_at: now().toISOString() });
    if (!saved.ok) return abort(saved.error);
    return finish('cancelled');
  }
}

async function processUnit(
  deps: PipelineDeps,
  config: Readonly<AppConfig>,
  link: ProcessoLink,
  log: Logger,
  now: () => Date,
  signal?: AbortSignal,
): Promise<Result<AuditRecord, AppError>> {
  const text = await deps.contracts.textFor(link, signal);
  if (!text.ok) return text;

  const contract = await extractContractRecord(deps.extractor, text.value, link.processo, deps.policy, {
    ...deps.retryHooks,
    signal,
    context: { processo: link.processo },
  });
  if (!contract.ok) return contract;

  const publication = await deps.publications.search(link.processo, signal);
  if (!publication.ok) return publication;

  const conformity = evaluateConformity(contract.value, publication.value, {
    deadlineDays: config.conformity.deadlineDays,
  });
  log.debug({ found: publication.value.publication_found, status: conformity.overall_status }, 'Unit complete');

  return ok({
    processo: link.processo,
    company_id: link.company_id,
    company_name: link.company_name,
    contract: contract.value,
    publication: publication.value,
    conformity,
    recorded_at: now().toISOString(),
  });
}

export interface ConformityOnlyOutcome {
  results: ConformityResult[];
  summary: RunSummary['processed'];
}

/** Evaluates pairs that were extracted elsewhere; no browser and no extraction service. */
export function runConformityOnly(
  pairs: readonly ContractPublicationPair[],
  config: Pick<AppConfig, 'conformity' | 'runId'>,
): ConformityOnlyOutcome {
  const summary = emptySummary(config.runId);
  const results = pairs.map(({ contract, publication }) => {
    const result = evaluateConformity(contract, publication, { deadlineDays: config.conformity.deadlineDays });
    countProcessed(summary, result);
    return result;
  });
  logger.child({ module: 'pipeline' }).info({ pairs: pairs.length, ...summary.processed }, 'Conformity evaluated');
  return { results, summary: summary.processed };
}
