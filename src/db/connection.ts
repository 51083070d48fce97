// ──────────────────────────────────────────
// Database connection — Knex instance
// ──────────────────────────────────────────

import knex, { Knex } from 'knex';

let db: Knex | undefined;

export function databaseConfig(env: NodeJS.ProcessEnv = process.env): Knex.Config {
  const client = env.DB_CLIENT || 'pg';
  if (client === 'better-sqlite3') {
    return {
      client,
      connection: { filename: env.DATABASE_URL || ':memory:' },
      useNullAsDefault: true,
    };
  }
  return {
    client,
    connection: env.DATABASE_URL,
    pool: { min: 2, max: 10 },
  };
}

export function getDb(): Knex {
  if (!db) {
    db = knex(databaseConfig());
  }
  return db;
}

export async function closeDb(): Promise<void> {
  if (db) {
    await db.destroy();
    db = undefined;
  }
}
