import 'dotenv/config';
import { migrate } from 'drizzle-orm/neon-http/migrator';
import { describeCause } from '../src/domain/errors.js';
import { loadConfig } from '../src/infrastructure/config.js';
import { createDatabaseWithRetry } from '../src/infrastructure/db/client.js';
import { logger } from '../src/infrastructure/logger.js';

const log = logger.child({ module: 'migrate' });

async function main(): Promise<number> {
  const config = loadConfig();
  if (!config.ok) {
    log.error({ details: config.error.details }, config.error.message);
    return 2;
  }
  if (config.value.databaseUrl === null) {
    log.error('DATABASE_URL must be set to migrate the results table');
    return 2;
  }

  const db = await createDatabaseWithRetry(config.value.databaseUrl);
  if (!db.ok) return 1;

  log.info('Starting database migration');
  try {
    await migrate(db.value, { migrationsFolder: './db/migrations' });
  } catch (error) {
    log.error({ error: describeCause(error), step: 'migration' }, 'Migration failed');
    return 1;
  }
  log.info('Migrations applied successfully');
  return 0;
}

process.exitCode = await main();
