// ──────────────────────────────────────────
// Platform: Schema compatibility checks for tenant scoping
// ──────────────────────────────────────────

import { Knex } from 'knex';
import { TenancyConfig } from '../config';
import { IncompatibilityError, MissingColumnError, TenantScopingError } from '../shared/errors';
import { createLogger, Logger } from '../shared/logger';
import { ScopedEntityDescriptor } from '../shared/types';

export interface ModelDefinition {
  name: string;
  table: string;
  /** Declared scoping; omitted means tenant-scoped unless config says otherwise. */
  scope?: 'tenant' | 'system';
  tenantColumn?: string;
}

/**
 * Decides how an entity type is scoped and checks its table can support it.
 * Throws instead of returning a partial descriptor so boot halts on a bad model.
 */
export async function validateCompatibility(
  db: Knex,
  definition: ModelDefinition,
  config: TenancyConfig,
  logger: Logger = createLogger('TenantScoped')
): Promise<ScopedEntityDescriptor> {
  const { name, table } = definition;
  const tenantColumn = definition.tenantColumn ?? config.tenantColumn;

  try {
    const excluded = config.excludedModels.includes(name);
    if (excluded && definition.scope) {
      throw new IncompatibilityError(
        name,
        `declared ${definition.scope}-scoped but listed in TENANT_EXCLUDED_MODELS`
      );
    }
    if (excluded) {
      return { name, table, tenantColumn, hasTenantColumn: false, scopingType: 'excluded' };
    }

    const columns = await db(table).columnInfo();
    if (Object.keys(columns).length === 0) {
      throw new IncompatibilityError(name, `table "${table}" does not exist`);
    }
    const hasTenantColumn = tenantColumn in columns;

    const systemScoped = definition.scope === 'system' || config.systemScopedModels.includes(name);
    if (definition.scope === 'tenant' && systemScoped) {
      throw new IncompatibilityError(name, 'declared tenant-scoped but listed in TENANT_SYSTEM_MODELS');
    }
    if (systemScoped) {
      return { name, table, tenantColumn, hasTenantColumn, scopingType: 'system' };
    }

    if (!hasTenantColumn) {
      throw new MissingColumnError(name, table, tenantColumn);
    }
    return { name, table, tenantColumn, hasTenantColumn, scopingType: 'tenant' };
  } catch (err) {
    if (err instanceof TenantScopingError) {
      logger.error(`[TENANT_ERROR] ${name} failed scoping compatibility validation`, {
        model: name,
        table,
        error: err.name,
      });
    }
    throw err;
  }
}

export async function isModelCompatible(
  db: Knex,
  definition: ModelDefinition,
  config: TenancyConfig
): Promise<boolean> {
  try {
    await validateCompatibility(db, definition, config, createLogger('TenantScoped', 'error'));
    return true;
  } catch (err) {
    if (err instanceof TenantScopingError) return false;
    throw err;
  }
}
