// ──────────────────────────────────────────
// Migration: organizations, roles, memberships + the projects domain
// ──────────────────────────────────────────

import { Knex } from 'knex';
import { loadTenancyConfig } from '../../config';

export async function up(knex: Knex): Promise<void> {
  await createTenancyTables(knex, loadTenancyConfig().tenantColumn);
}

export async function createTenancyTables(knex: Knex, tenantColumn: string): Promise<void> {

  // Host applications bring their own users table
  if (!(await knex.schema.hasTable('users'))) {
    await knex.schema.createTable('users', (t) => {
      t.uuid('id').primary();
      t.string('name', 255).notNullable();
      t.string('email', 255).unique().notNullable();
      t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    });
  }

  await knex.schema.createTable('organizations', (t) => {
    t.uuid('id').primary();
    t.string('name', 100).notNullable();
    t.boolean('archived').notNullable().defaultTo(false);
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.index(['archived']);
  });

  await knex.schema.createTable('roles', (t) => {
    t.uuid('id').primary();
    t.string('name', 50).unique().notNullable();
    t.string('role_type', 20).notNullable().defaultTo('member');
    t.string('description', 255);
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.index(['role_type']);
  });

  await knex.schema.createTable('memberships', (t) => {
    t.uuid('id').primary();
    t.uuid('user_id').notNullable().references('id').inTable('users').onDelete('CASCADE');
    t.uuid(tenantColumn).notNullable().references('id').inTable('organizations').onDelete('CASCADE');
    t.uuid('role_id').notNullable().references('id').inTable('roles').onDelete('RESTRICT');
    t.string('status', 20).notNullable().defaultTo('active');
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.unique(['user_id', tenantColumn]);
    t.index([tenantColumn, 'status']);
  });

  await knex.schema.createTable('projects', (t) => {
    t.uuid('id').primary();
    t.uuid(tenantColumn).notNullable().references('id').inTable('organizations').onDelete('CASCADE');
    t.string('name', 255).notNullable();
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.index([tenantColumn]);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('projects');
  await knex.schema.dropTableIfExists('memberships');
  await knex.schema.dropTableIfExists('roles');
  await knex.schema.dropTableIfExists('organizations');
}
