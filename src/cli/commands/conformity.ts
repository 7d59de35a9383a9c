import { readFile } from 'node:fs/promises';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../../domain/errors.js';
import { contractPublicationPairsInput } from '../../domain/schemas.js';
import type { ContractPublicationPair } from '../../domain/types.js';
import { loadConfig } from '../../infrastructure/config.js';
import { logger } from '../../infrastructure/logger.js';
import { writeFileAtomic } from '../../infrastructure/storage/atomic-write.js';
import { runConformityOnly } from '../../services/pipeline/index.js';
import { ExitCode, exitCodeFor } from '../exit-codes.js';

const log = logger.child({ module: 'cli' });

export interface ConformityFlags {
  out?: string;
  runId?: string;
}

export async function loadPairs(path: string): Promise<Result<ContractPublicationPair[], AppError>> {
  let json: unknown;
  try {
    json = JSON.parse(await readFile(path, 'utf8'));
  } catch (cause) {
    return err(createAppError(ErrorCode.CONFIG_INVALID, `Cannot read pairs file ${path}`, false, describeCause(cause)));
  }

  const parsed = contractPublicationPairsInput.safeParse(json);
  if (!parsed.success) {
    return err(createAppError(ErrorCode.CONFIG_INVALID, `Pairs file ${path} does not match the expected shape`, false, parsed.error.message));
  }
  return ok(parsed.data);
}

/** Evaluates pre-extracted contract/publication pairs; prints the results or writes them to `--out`. */
export async function conformityCommand(pairsPath: string, flags: ConformityFlags): Promise<ExitCode> {
  const config = loadConfig(process.env, flags.runId !== undefined ? { runId: flags.runId } : {});
  if (!config.ok) {
    log.error({ errorCode: config.error.code, details: config.error.details }, config.error.message);
    return exitCodeFor(config.error);
  }

  const pairs = await loadPairs(pairsPath);
  if (!pairs.ok) {
    log.error({ errorCode: pairs.error.code, details: pairs.error.details }, pairs.error.message);
    return exitCodeFor(pairs.error);
  }

  const { results, summary } = runConformityOnly(pairs.value, config.value);
  const document = `${JSON.stringify({ run_id: config.value.runId, summary, results }, null, 2)}\n`;

  if (flags.out === undefined) {
    process.stdout.write(document);
    return ExitCode.OK;
  }
  try {
    await writeFileAtomic(flags.out, document);
  } catch (cause) {
    log.error({ path: flags.out, details: describeCause(cause) }, 'Failed to write conformity results');
    return ExitCode.SETUP_FAILED;
  }
  log.info({ path: flags.out, results: results.length }, 'Conformity results written');
  return ExitCode.OK;
}
