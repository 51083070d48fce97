// ──────────────────────────────────────────
// Knex configuration
// ──────────────────────────────────────────

import dotenv from 'dotenv';
import path from 'path';
import { Knex } from 'knex';
import { databaseConfig } from './connection';

dotenv.config({ path: path.resolve(__dirname, '../../.env') });

export const migrationConfig: Knex.MigratorConfig = {
  directory: path.resolve(__dirname, 'migrations'),
  extension: 'ts',
  loadExtensions: ['.ts'],
};

const config: Knex.Config = {
  ...databaseConfig(),
  migrations: migrationConfig,
};

export default config;
