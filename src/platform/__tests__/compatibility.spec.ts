import { Knex } from 'knex';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { IncompatibilityError, MissingColumnError } from '../../shared/errors';
import { createRecordingLogger, createTestDb, RecordingLogger, testConfig } from '../../test-support';
import { isModelCompatible, validateCompatibility } from '../compatibility';

describe('validateCompatibility', () => {
  let db: Knex;
  let logger: RecordingLogger;

  beforeEach(async () => {
    db = await createTestDb();
    logger = createRecordingLogger();
    await db.schema.createTable('invoices', (t) => {
      t.uuid('id').primary();
      t.integer('amount_cents').notNullable();
    });
    await db.schema.createTable('workspace_notes', (t) => {
      t.uuid('id').primary();
      t.uuid('workspace_id').notNullable();
      t.text('body');
    });
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('accepts a table with the tenant column as tenant-scoped', async () => {
    const descriptor = await validateCompatibility(db, { name: 'Project', table: 'projects' }, testConfig(), logger);

    expect(descriptor).toEqual({
      name: 'Project',
      table: 'projects',
      tenantColumn: 'organization_id',
      hasTenantColumn: true,
      scopingType: 'tenant',
    });
  });

  it('rejects a table without the tenant column and explains the fixes', async () => {
    const err = await validateCompatibility(db, { name: 'Invoice', table: 'invoices' }, testConfig(), logger).catch(
      (e: unknown) => e
    );

    expect(err).toBeInstanceOf(MissingColumnError);
    const message = err instanceof Error ? err.message : '';
    expect(message.split('\n')[0]).toBe('Invoice cannot be tenant-scoped: table "invoices" has no "organization_id" column.');
    expect(message).toContain('To fix this issue, you have several options:');
    expect(message).toContain('TENANT_EXCLUDED_MODELS');

    const [entry] = logger.at('error');
    expect(entry.message).toBe('[TENANT_ERROR] Invoice failed scoping compatibility validation');
    expect(entry.context?.error).toBe('MissingColumnError');
  });

  it('honours a per-model tenant column', async () => {
    const descriptor = await validateCompatibility(
      db,
      { name: 'WorkspaceNote', table: 'workspace_notes', tenantColumn: 'workspace_id' },
      testConfig(),
      logger
    );

    expect(descriptor.scopingType).toBe('tenant');
    expect(descriptor.tenantColumn).toBe('workspace_id');
  });

  it('marks declared and configured system models as system-scoped', async () => {
    const declared = await validateCompatibility(db, { name: 'Invoice', table: 'invoices', scope: 'system' }, testConfig(), logger);
    const configured = await validateCompatibility(
      db,
      { name: 'Invoice', table: 'invoices' },
      testConfig({ systemScopedModels: ['Invoice'] }),
      logger
    );

    expect(declared.scopingType).toBe('system');
    expect(declared.hasTenantColumn).toBe(false);
    expect(configured.scopingType).toBe('system');
  });

  it('skips excluded models without touching the schema', async () => {
    const descriptor = await validateCompatibility(
      db,
      { name: 'Ghost', table: 'no_such_table' },
      testConfig({ excludedModels: ['Ghost'] }),
      logger
    );

    expect(descriptor.scopingType).toBe('excluded');
    expect(logger.entries).toEqual([]);
  });

  it('rejects conflicting declarations', async () => {
    await expect(
      validateCompatibility(
        db,
        { name: 'Project', table: 'projects', scope: 'tenant' },
        testConfig({ systemScopedModels: ['Project'] }),
        logger
      )
    ).rejects.toThrow('Project is not compatible with tenant scoping: declared tenant-scoped but listed in TENANT_SYSTEM_MODELS');

    await expect(
      validateCompatibility(
        db,
        { name: 'Role', table: 'roles', scope: 'system' },
        testConfig({ excludedModels: ['Role'] }),
        logger
      )
    ).rejects.toThrow(IncompatibilityError);
  });

  it('rejects a missing table', async () => {
    await expect(
      validateCompatibility(db, { name: 'Ghost', table: 'no_such_table' }, testConfig(), logger)
    ).rejects.toThrow('Ghost is not compatible with tenant scoping: table "no_such_table" does not exist');
  });
});

describe('isModelCompatible', () => {
  let db: Knex;

  beforeEach(async () => {
    db = await createTestDb();
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('answers without throwing', async () => {
    expect(await isModelCompatible(db, { name: 'Project', table: 'projects' }, testConfig())).toBe(true);
    expect(await isModelCompatible(db, { name: 'User', table: 'users' }, testConfig())).toBe(false);
    expect(await isModelCompatible(db, { name: 'User', table: 'users', scope: 'system' }, testConfig())).toBe(true);
  });
});
