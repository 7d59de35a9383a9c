import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../../domain/errors.js';
import { checkpointSchema } from '../../domain/schemas.js';
import type { Checkpoint } from '../../domain/types.js';
import { logger } from '../../infrastructure/logger.js';
import { writeFileAtomic } from '../../infrastructure/storage/atomic-write.js';
import type { CheckpointStore } from './index.js';

const log = logger.child({ module: 'checkpoint' });

function isMissingFile(cause: unknown): boolean {
  return cause instanceof Error && 'code' in cause && cause.code === 'ENOENT';
}

/** One JSON document per run under `dir`, replaced atomically on every save. */
export class FileCheckpointStore implements CheckpointStore {
  constructor(private readonly dir: string) {}

  pathFor(runId: string): string {
    return join(this.dir, `${runId.replace(/[^a-zA-Z0-9._-]/g, '_')}.json`);
  }

  async load(runId: string): Promise<Result<Checkpoint | null, AppError>> {
    const path = this.pathFor(runId);

    let raw: string;
    try {
      raw = await readFile(path, 'utf8');
    } catch (cause) {
      if (isMissingFile(cause)) return ok(null);
      const details = describeCause(cause);
      log.error({ runId, path, errorCode: ErrorCode.PERSISTENCE_ERROR, details }, 'Failed to read checkpoint');
      return err(createAppError(ErrorCode.PERSISTENCE_ERROR, 'Failed to read checkpoint', false, details));
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (cause) {
      return err(createAppError(ErrorCode.PERSISTENCE_ERROR, 'Checkpoint is not valid JSON', false, describeCause(cause)));
    }

    const parsed = checkpointSchema.safeParse(json);
    if (!parsed.success) {
      return err(createAppError(ErrorCode.PERSISTENCE_ERROR, 'Checkpoint does not match schema', false, parsed.error.message));
    }
    if (parsed.data.run_id !== runId) {
      return err(
        createAppError(ErrorCode.PERSISTENCE_ERROR, 'Checkpoint belongs to another run', false, `found ${parsed.data.run_id}`),
      );
    }

    log.info(
      { runId, processed: parsed.data.processed_processo_ids.length, companies: parsed.data.completed_company_ids.length },
      'Checkpoint loaded',
    );
    return ok(parsed.data);
  }

  async save(checkpoint: Checkpoint): Promise<Result<void, AppError>> {
    const path = this.pathFor(checkpoint.run_id);
    try {
      await writeFileAtomic(path, `${JSON.stringify(checkpoint, null, 2)}\n`);
    } catch (cause) {
      const details = describeCause(cause);
      log.error({ runId: checkpoint.run_id, path, errorCode: ErrorCode.PERSISTENCE_ERROR, details }, 'Failed to write checkpoint');
      return err(createAppError(ErrorCode.PERSISTENCE_ERROR, 'Failed to write checkpoint', false, details));
    }
    log.debug({ runId: checkpoint.run_id, processed: checkpoint.processed_processo_ids.length }, 'Checkpoint saved');
    return ok(undefined);
  }
}
