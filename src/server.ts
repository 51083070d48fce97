// ──────────────────────────────────────────
// Server entry point — bootstrap + listen
// ──────────────────────────────────────────
// 1. Connect and migrate
// 2. Bootstrap tenancy (fails fast on incompatible models)
// 3. Define domain models
// 4. Mount routes and listen

import dotenv from 'dotenv';
dotenv.config();

import { getDb, closeDb } from './db/connection';
import { migrationConfig } from './db/knexfile';
import { loadTenancyConfig } from './config';
import { bootstrapTenancy } from './platform/tenancy';
import { defineProjectModel } from './domains/projects';
import { createApp } from './app';
import { createLogger } from './shared/logger';

const logger = createLogger('App');

async function main() {
  const db = getDb();
  const config = loadTenancyConfig();
  const port = process.env.PORT || 3000;

  await db.migrate.latest(migrationConfig);

  const tenancy = await bootstrapTenancy(db, config);
  const projects = await defineProjectModel(db, tenancy.runtime);
  tenancy.registry.printSummary();

  const app = createApp({ tenancy, projects });
  const server = app.listen(port, () => {
    logger.info(`tenancy-kit listening on port ${port} (${config.environment})`);
  });

  // Graceful shutdown
  const shutdown = async () => {
    logger.info('Shutting down...');
    server.close();
    await closeDb();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((err) => logger.error(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`));
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch(async (err) => {
  logger.error(`Fatal error: ${err instanceof Error ? err.message : String(err)}`);
  await closeDb();
  process.exit(1);
});
