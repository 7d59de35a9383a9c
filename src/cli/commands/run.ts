import type { Server } from 'node:http';
import { join } from 'node:path';
import { describeCause, type AppError } from '../../domain/errors.js';
import type { CompanyRecord } from '../../domain/types.js';
import { startControlServer, stopControlServer } from '../../api/server.js';
import { BrowserSession, ContasRioPortal, DowebGazette, ProcessoRioDocuments } from '../../infrastructure/browser/index.js';
import { loadConfig } from '../../infrastructure/config.js';
import { createDatabaseWithRetry } from '../../infrastructure/db/client.js';
import { PostgresResultSink } from '../../infrastructure/db/result-sink.js';
import { createLangfuseClient, LangfuseService } from '../../infrastructure/langfuse.js';
import { createLLMProviderFromConfig } from '../../infrastructure/llm/index.js';
import { createRunLogger, logger, type Logger } from '../../infrastructure/logger.js';
import { writeFileAtomic } from '../../infrastructure/storage/atomic-write.js';
import { JsonResultStore, type ResultSink } from '../../infrastructure/storage/json-result-store.js';
import { FileCheckpointStore } from '../../services/checkpoint/index.js';
import {
  createExtractionRetryPolicy,
  EXTRACTION_PROMPTS,
  LlmExtractionAdapter,
} from '../../services/extraction/index.js';
import {
  loadCompanySeed,
  PdfDirectoryContractSource,
  ProcessoDocumentSource,
  RunMonitor,
  runBatch,
  type RunSummary,
} from '../../services/pipeline/index.js';
import { CaptchaGate, ManualSolveSignal, PublicationSearchEngine } from '../../services/publication/index.js';
import { ExitCode, exitCodeFor } from '../exit-codes.js';
import { toOverrides, type RunFlags } from '../options.js';

function reject(error: AppError, log: Logger = logger.child({ module: 'cli' })): ExitCode {
  log.error({ errorCode: error.code, details: error.details }, error.message);
  return exitCodeFor(error);
}

async function release(log: Logger, what: string, fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (cause) {
    log.warn({ details: describeCause(cause) }, `Failed to close ${what}`);
  }
}

function printSummary(summary: RunSummary): void {
  const { processed, skipped, companies } = summary;
  console.log(`Run ${summary.run_id}: ${summary.status}`);
  console.log(`  companies  ${companies.completed}/${companies.total} done, ${companies.failed} failed, ${companies.resumed} from an earlier run`);
  console.log(
    `  processed  ${processed.total} (conforme ${processed.conforme}, parcial ${processed.parcial}, ` +
      `nao conforme ${processed.nao_conforme}; publication not located ${processed.not_located})`,
  );
  console.log(
    `  skipped    ${skipped.total} (captcha ${skipped.captcha}, timeout ${skipped.timeout}, ` +
      `parse error ${skipped.parse_error}, extraction ${skipped.extraction}, other ${skipped.other})`,
  );
}

/**
 * Full pipeline: portal discovery, gazette search, extraction and conformity for every selected
 * company, writing one result per processo and the CSV export at the end.
 */
export async function runCommand(flags: RunFlags): Promise<ExitCode> {
  const loaded = loadConfig(process.env, toOverrides(flags));
  if (!loaded.ok) return reject(loaded.error);
  const config = loaded.value;
  const runLog = createRunLogger(config.runId);
  const log = runLog.child({ module: 'cli' });

  const llm = createLLMProviderFromConfig(config);
  if (!llm.ok) return reject(llm.error, log);

  let companies: CompanyRecord[] | undefined;
  if (config.companiesCsv !== null) {
    const seed = await loadCompanySeed(config.companiesCsv);
    if (!seed.ok) return reject(seed.error, log);
    companies = seed.value;
    log.info({ path: config.companiesCsv, companies: companies.length }, 'Company list loaded');
  }

  const store = new JsonResultStore(config.paths.outputDir, config.runId);
  const sinks: ResultSink[] = [store];
  if (config.databaseUrl !== null) {
    const db = await createDatabaseWithRetry(config.databaseUrl);
    if (!db.ok) return reject(db.error, log);
    sinks.push(new PostgresResultSink(db.value, config.runId));
  }

  const session = await BrowserSession.launch(config);
  if (!session.ok) return reject(session.error, log);
  const browser = session.value;

  const langfuseClient = createLangfuseClient(config);
  const langfuse = langfuseClient ? new LangfuseService(langfuseClient, { sessionId: config.runId }) : null;
  const manual = new ManualSolveSignal();
  const monitor = new RunMonitor(manual);
  const onInterrupt = () => {
    if (monitor.cancel()) log.warn('Cancellation requested, stopping after the current unit');
  };
  process.on('SIGINT', onInterrupt);

  let server: Server | null = null;
  try {
    if (config.controlPort !== null) {
      try {
        server = await startControlServer(monitor, config.controlPort);
      } catch (cause) {
        log.error({ port: config.controlPort, details: describeCause(cause) }, 'Control API could not start');
        return ExitCode.SETUP_FAILED;
      }
    }

    if (langfuse) await langfuse.warmCache(EXTRACTION_PROMPTS, config.extraction.promptLabel);

    const policy = createExtractionRetryPolicy(config);
    const extractor = new LlmExtractionAdapter({
      llm: llm.value,
      langfuse,
      promptLabel: config.extraction.promptLabel,
    });
    const gate = new CaptchaGate(
      {
        autoAttempts: config.captcha.autoAttempts,
        manualTimeoutMs: config.captcha.manualTimeoutMs,
        pollIntervalMs: config.portal.pollIntervalMs,
        log: runLog,
      },
      manual,
    );
    const publications = new PublicationSearchEngine({
      portal: new DowebGazette(browser, config),
      gate,
      extractor,
      policy,
      downloadDir: config.paths.downloadDir,
      log: runLog,
    });

    const outcome = await runBatch(
      {
        portal: new ContasRioPortal(browser, config),
        publications,
        extractor,
        contracts: new ProcessoDocumentSource(new ProcessoRioDocuments(browser, config), gate, {
          downloadDir: config.paths.downloadDir,
          local: new PdfDirectoryContractSource(config.paths.contractsDir),
          log: runLog,
        }),
        checkpoints: new FileCheckpointStore(config.paths.checkpointDir),
        sinks,
        policy,
        log: runLog,
      },
      config,
      {
        signal: monitor.signal,
        resume: flags.resume ?? false,
        ...(companies !== undefined && { companies }),
        onStart: monitor.attach,
        onUnit: monitor.track,
      },
    );
    const summary = outcome.ok ? outcome.value : outcome.error.summary;

    const exported = await store.exportCsv();
    if (!exported.ok) return reject(exported.error, log);
    try {
      await writeFileAtomic(join(store.runDir, 'summary.json'), `${JSON.stringify(summary, null, 2)}\n`);
    } catch (cause) {
      log.warn({ details: describeCause(cause) }, 'Failed to write run summary');
    }

    printSummary(summary);
    return exitCodeFor(outcome.ok ? null : outcome.error.error);
  } finally {
    process.off('SIGINT', onInterrupt);
    const open = server;
    if (open !== null) await release(log, 'control API', () => stopControlServer(open));
    await release(log, 'browser', () => browser.close());
    if (langfuse) await langfuse.shutdown();
  }
}
