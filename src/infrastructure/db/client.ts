import { neon } from '@neondatabase/serverless';
import { drizzle, type NeonHttpDatabase } from 'drizzle-orm/neon-http';
import { sql } from 'drizzle-orm';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../logger.js';
import { delayWithJitter, sleep } from '../wait.js';
import * as schema from './schema.js';

export type Database = NeonHttpDatabase<typeof schema>;

export interface ConnectOptions {
  attempts?: number;
  baseDelayMs?: number;
  /** Overridable for tests; defaults to a `SELECT 1` over Neon HTTP. */
  ping?: (db: Database) => Promise<unknown>;
}

const log = logger.child({ module: 'db' });

/** Strips credentials so the connection target can be logged. */
export function redactUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.protocol}//${parsed.host}${parsed.pathname}`;
  } catch {
    return '<unparseable>';
  }
}

export function createDatabase(url: string): Database {
  return drizzle(neon(url), { schema });
}

/** Connects and pings the database, backing off between attempts. Exhaustion is DB_CONNECTION_ERROR. */
export async function createDatabaseWithRetry(url: string, options: ConnectOptions = {}): Promise<Result<Database, AppError>> {
  const { attempts = 3, baseDelayMs = 1000, ping = (db: Database) => db.execute(sql`SELECT 1`) } = options;
  const target = redactUrl(url);
  let lastError = '';

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const db = createDatabase(url);
      await ping(db);
      log.info({ target, attempt }, 'Database connection established');
      return ok(db);
    } catch (cause) {
      lastError = describeCause(cause);
      log.warn({ target, attempt, attempts, details: lastError }, 'Database connection attempt failed');
      if (attempt < attempts) await sleep(delayWithJitter(attempt - 1, baseDelayMs));
    }
  }

  log.error({ errorCode: ErrorCode.DB_CONNECTION_ERROR, target, attempts, details: lastError }, 'Database unreachable');
  return err(createAppError(ErrorCode.DB_CONNECTION_ERROR, `Failed to connect after ${attempts} attempts`, true, lastError));
}
