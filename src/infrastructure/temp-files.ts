import { mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { describeCause } from '../domain/errors.js';
import { logger } from './logger.js';

const log = logger.child({ module: 'temp-files' });

/**
 * Reserves a unique path under `dir`, runs `fn` with it and deletes whatever was written there
 * once `fn` settles, whether it resolved, returned an error result or threw.
 */
export async function withTempFile<T>(
  dir: string,
  suffix: string,
  fn: (path: string) => Promise<T>,
): Promise<T> {
  await mkdir(dir, { recursive: true });
  const path = join(dir, `${randomUUID()}${suffix}`);
  try {
    return await fn(path);
  } finally {
    try {
      await rm(path, { force: true });
      log.debug({ path }, 'Temporary file removed');
    } catch (cause) {
      log.warn({ path, details: describeCause(cause) }, 'Failed to remove temporary file');
    }
  }
}
