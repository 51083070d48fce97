// ──────────────────────────────────────────
// Script: Reset — roll back and re-run migrations
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import { getDb, closeDb } from '../src/db/connection';
import { migrationConfig } from '../src/db/knexfile';
import { createLogger } from '../src/shared/logger';

const logger = createLogger('Reset');

async function reset() {
  const db = getDb();

  logger.info('Rolling back all migrations...');
  await db.migrate.rollback(migrationConfig, true);

  logger.info('Running migrations...');
  await db.migrate.latest(migrationConfig);

  logger.info('✅ Done — all tables recreated');
  await closeDb();
  process.exit(0);
}

reset().catch(async (err) => {
  logger.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  await closeDb();
  process.exit(1);
});
