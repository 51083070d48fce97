// ──────────────────────────────────────────
// Test support — in-memory database, recording logger, fixtures
// ──────────────────────────────────────────

import knex, { Knex } from 'knex';
import { v4 as uuidv4 } from 'uuid';
import { TenancyConfig } from '../config';
import { createTenancyTables } from '../db/migrations/001_create_tenancy_tables';
import { LogContext, Logger, LogLevel } from '../shared/logger';
import { SaveResult, User } from '../shared/types';

export async function createTestDb(tenantColumn = 'organization_id'): Promise<Knex> {
  const db = knex({
    client: 'better-sqlite3',
    connection: { filename: ':memory:' },
    useNullAsDefault: true,
    pool: { min: 1, max: 1 },
  });
  await createTenancyTables(db, tenantColumn);
  return db;
}

export function testConfig(overrides: Partial<TenancyConfig> = {}): TenancyConfig {
  return {
    environment: 'test',
    tenantColumn: 'organization_id',
    bypassesDisabled: false,
    deployedEnvironments: ['production', 'staging'],
    excludedModels: [],
    systemScopedModels: [],
    ...overrides,
  };
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: LogContext;
}

export interface RecordingLogger extends Logger {
  entries: LogEntry[];
  clear(): void;
  at(level: LogLevel): LogEntry[];
}

export function createRecordingLogger(): RecordingLogger {
  const entries: LogEntry[] = [];
  const record = (level: LogLevel) => (message: string, context?: LogContext) => {
    entries.push({ level, message, context });
  };
  return {
    entries,
    clear: () => {
      entries.length = 0;
    },
    at: (level) => entries.filter((entry) => entry.level === level),
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
  };
}

export async function insertUser(db: Knex, name: string): Promise<string> {
  const user: User = { id: uuidv4(), name, email: `${name.toLowerCase().replace(/\s+/g, '.')}@example.test` };
  await db('users').insert(user);
  return user.id;
}

export function unwrap<T>(result: SaveResult<T>): T {
  if (!result.ok) {
    throw new Error(`save rejected: ${result.errors.map((e) => `${e.field} ${e.message}`).join(', ')}`);
  }
  return result.record;
}
