// ──────────────────────────────────────────
// Platform: Tenant-scoped model — default filter, write guards, audited bypasses
// ──────────────────────────────────────────

import { Knex } from 'knex';
import { v4 as uuidv4 } from 'uuid';
import { TenancyConfig } from '../config';
import { TenantDirectory } from '../shared/contracts';
import {
  AdminAuthorizationError,
  CrossTenantAccessError,
  ReadOnlyRecordError,
  RecordNotFoundError,
} from '../shared/errors';
import { callerLocation, createLogger, LogContext, Logger } from '../shared/logger';
import {
  FieldError,
  Organization,
  readColumn,
  RecordId,
  sameTenantId,
  SaveResult,
  ScopedEntityDescriptor,
  ScopedRecord,
  ScopingType,
  TenantId,
  TenantResult,
  toTenantId,
} from '../shared/types';
import { BypassAttempt, BypassGuard, BypassOperation } from './bypass';
import { ModelDefinition, validateCompatibility } from './compatibility';
import {
  getCurrentTenantId,
  isReadOnlyBypass,
  isScopingSuspended,
  withScopingSuspended,
  withTenantScope,
} from './context';
import { ModelRegistry } from './registry';

export interface TenantScopedModelOptions extends ModelDefinition {
  generateId?: () => RecordId;
}

export interface ScopingRuntime {
  config: TenancyConfig;
  registry: ModelRegistry;
  tenants: TenantDirectory;
  logger?: Logger;
}

export type RecordChanges<TRecord> = Partial<TRecord> | Record<string, unknown>;

const TENANT_CHANGED = 'tenant cannot be changed after creation';

function freezeResult<T>(value: T): T {
  if (Array.isArray(value)) {
    value.forEach((item) => {
      if (item !== null && typeof item === 'object') Object.freeze(item);
    });
    Object.freeze(value);
  } else if (value !== null && typeof value === 'object') {
    Object.freeze(value);
  }
  return value;
}

export class TenantScopedModel<TRecord extends ScopedRecord> {
  readonly name: string;
  readonly table: string;
  readonly tenantColumn: string;
  readonly scopingType: ScopingType;

  private bypass: BypassGuard;

  private constructor(
    private db: Knex,
    private descriptor: ScopedEntityDescriptor,
    private tenants: TenantDirectory,
    private logger: Logger,
    config: TenancyConfig,
    private generateId: () => RecordId
  ) {
    this.name = descriptor.name;
    this.table = descriptor.table;
    this.tenantColumn = descriptor.tenantColumn;
    this.scopingType = descriptor.scopingType;
    this.bypass = new BypassGuard(config, logger);
  }

  /**
   * Validates the table, registers the model and returns it. Rejects with
   * MissingColumnError / IncompatibilityError so a bad model stops boot.
   */
  static async define<TRecord extends ScopedRecord>(
    db: Knex,
    options: TenantScopedModelOptions,
    runtime: ScopingRuntime
  ): Promise<TenantScopedModel<TRecord>> {
    const logger = runtime.logger ?? createLogger('TenantScoped');
    const descriptor = await validateCompatibility(db, options, runtime.config, logger);
    runtime.registry.register(descriptor);
    logger.info(`[MULTI_TENANT] ${descriptor.name} defined as ${descriptor.scopingType}-scoped`, {
      table: descriptor.table,
    });
    return new TenantScopedModel<TRecord>(
      db,
      descriptor,
      runtime.tenants,
      logger,
      runtime.config,
      options.generateId ?? (() => uuidv4())
    );
  }

  describe(): ScopedEntityDescriptor {
    return { ...this.descriptor };
  }

  isTenantScoped(): boolean {
    return this.scopingType === 'tenant';
  }

  isSystemScoped(): boolean {
    return this.scopingType === 'system';
  }

  // ── Reads ──

  /** Query with the default tenant filter applied. */
  query(): Knex.QueryBuilder {
    const builder = this.db(this.table);
    if (!this.isTenantScoped() || isScopingSuspended()) return builder;

    const tenantId = getCurrentTenantId();
    if (tenantId === null) {
      return builder.whereRaw('1 = 0');
    }
    return builder.where(`${this.table}.${this.tenantColumn}`, tenantId);
  }

  async all(): Promise<TRecord[]> {
    return this.query().select(`${this.table}.*`);
  }

  async findById(id: RecordId): Promise<TRecord | null> {
    const row = await this.query().where(`${this.table}.id`, id).first();
    return row ?? null;
  }

  async count(): Promise<number> {
    const row = await this.query().count({ count: '*' }).first();
    return Number(row?.count ?? 0);
  }

  // ── Writes ──

  async create(attrs: Partial<TRecord>): Promise<SaveResult<TRecord>> {
    this.assertWritable('create');
    const row: Record<string, unknown> = Object.fromEntries(Object.entries(attrs));
    const id = typeof row.id === 'string' || typeof row.id === 'number' ? row.id : this.generateId();
    row.id = id;

    if (this.isTenantScoped()) {
      const errors = this.assignTenant(row);
      if (errors.length > 0) return this.rejected('create', errors);
    }

    await this.db(this.table).insert(row);
    const record = await this.db(this.table).where('id', id).first();
    return { ok: true, record };
  }

  /** Changes may name the tenant column under whatever name the model was configured with. */
  async update(id: RecordId, changes: RecordChanges<TRecord>): Promise<SaveResult<TRecord>> {
    this.assertWritable('update');
    const existing = await this.findById(id);
    if (!existing) {
      throw new RecordNotFoundError(this.name, id);
    }

    // undefined entries leave the column untouched
    const patch: Record<string, unknown> = Object.fromEntries(
      Object.entries(changes).filter(([key, value]) => key !== 'id' && value !== undefined)
    );

    if (this.isTenantScoped() && this.tenantColumn in patch) {
      const before = toTenantId(readColumn(existing, this.tenantColumn));
      const after = toTenantId(patch[this.tenantColumn]);
      if (!sameTenantId(before, after)) {
        return this.rejected('update', [{ field: this.tenantColumn, message: TENANT_CHANGED }], { id });
      }
    }

    if (Object.keys(patch).length > 0) {
      await this.query().where(`${this.table}.id`, id).update(patch);
    }
    const record = await this.db(this.table).where('id', id).first();
    return { ok: true, record };
  }

  async destroy(id: RecordId): Promise<number> {
    this.assertWritable('destroy');
    return this.query().where(`${this.table}.id`, id).del();
  }

  // ── Tenant predicates ──

  belongsToCurrentTenant(record: TRecord): boolean {
    return sameTenantId(this.tenantOf(record), getCurrentTenantId());
  }

  canBeAccessedBy(record: TRecord, tenant: Organization | TenantId): boolean {
    const tenantId = typeof tenant === 'object' ? tenant.id : tenant;
    return sameTenantId(this.tenantOf(record), tenantId);
  }

  assertAccessible(record: TRecord): void {
    if (!this.isTenantScoped() || isScopingSuspended()) return;
    if (!this.belongsToCurrentTenant(record)) {
      this.logger.warn(`[TENANT_WARNING] Cross-tenant access to ${this.name} ${record.id} refused`, {
        model: this.name,
        recordId: record.id,
        currentTenantId: getCurrentTenantId(),
        caller: callerLocation(),
      });
      throw new CrossTenantAccessError(this.name, record.id);
    }
  }

  // ── Bypasses ──

  async withoutScoping<T>(fn: () => T | Promise<T>): Promise<T> {
    const attempt = this.attempt('without_scoping');
    return this.bypass.run(attempt, async () => withScopingSuspended(fn));
  }

  async withAdminBypass<T>(adminCheck: () => boolean | Promise<boolean>, fn: () => T | Promise<T>): Promise<T> {
    const attempt = this.attempt('with_admin_bypass');
    this.bypass.authorize(attempt);

    let authorized: boolean;
    try {
      authorized = (await adminCheck()) === true;
    } catch (err) {
      this.bypass.recordAdminCheck(attempt, false);
      throw new AdminAuthorizationError(this.name, { cause: err });
    }

    this.bypass.recordAdminCheck(attempt, authorized);
    if (!authorized) {
      throw new AdminAuthorizationError(this.name);
    }
    return this.bypass.execute(attempt, async () => withScopingSuspended(fn));
  }

  async withTenantBypass<T>(tenantId: TenantId, fn: () => T | Promise<T>): Promise<T> {
    const attempt = this.attempt('with_tenant_bypass', {
      tenantId,
      previousTenantId: getCurrentTenantId(),
    });
    return this.bypass.run(attempt, async () => withTenantScope(tenantId, fn));
  }

  async forEachTenant<T>(fn: (tenant: Organization) => T | Promise<T>): Promise<TenantResult<T>[]> {
    const attempt = this.attempt('for_each_tenant');
    return this.bypass.run(attempt, async () => {
      const tenants = await this.tenants.findAll();
      const results: TenantResult<T>[] = [];
      for (const tenant of tenants) {
        const result = await withTenantScope(tenant, () => fn(tenant));
        results.push({ tenant, result });
      }
      return results;
    });
  }

  async withoutScopingReadonly<T>(fn: () => T | Promise<T>): Promise<T> {
    const attempt = this.attempt('without_scoping_readonly');
    const result = await this.bypass.run(attempt, async () => withScopingSuspended(fn, { readonly: true }));
    return freezeResult(result);
  }

  async allTenantsUnscoped(): Promise<TRecord[]> {
    return this.withoutScoping(() => this.all());
  }

  async totalCountAllTenants(): Promise<number> {
    return this.withoutScoping(() => this.count());
  }

  // ── Internals ──

  private tenantOf(record: TRecord): TenantId | null {
    return toTenantId(readColumn(record, this.tenantColumn));
  }

  private assignTenant(row: Record<string, unknown>): FieldError[] {
    const current = getCurrentTenantId();
    const given = toTenantId(row[this.tenantColumn]);

    if (given === null) {
      if (current === null) {
        return [{ field: this.tenantColumn, message: "can't be blank" }];
      }
      row[this.tenantColumn] = current;
      return [];
    }

    // An explicit tenant must match the ambient one unless scoping is suspended
    if (current !== null && !isScopingSuspended() && !sameTenantId(given, current)) {
      return [{ field: this.tenantColumn, message: 'must match the current tenant' }];
    }
    return [];
  }

  private assertWritable(operation: string): void {
    if (isReadOnlyBypass()) {
      throw new ReadOnlyRecordError(this.name, operation);
    }
  }

  private rejected(operation: string, errors: FieldError[], context: LogContext = {}): SaveResult<TRecord> {
    this.logger.warn(`[TENANT_WARNING] ${operation} ${this.name} rejected`, {
      ...context,
      model: this.name,
      errors: errors.map((e) => `${e.field} ${e.message}`),
    });
    return { ok: false, errors };
  }

  private attempt(operation: BypassOperation, details?: LogContext): BypassAttempt {
    return { operation, model: this.name, caller: callerLocation(), details };
  }
}
