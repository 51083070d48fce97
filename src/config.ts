// ──────────────────────────────────────────
// Tenancy configuration — read from the environment
// ──────────────────────────────────────────

import { ValidationError } from './shared/errors';

export interface TenancyConfig {
  environment: string;
  tenantColumn: string;
  bypassesDisabled: boolean;
  deployedEnvironments: string[];
  excludedModels: string[];
  systemScopedModels: string[];
}

const COLUMN_NAME = /^[a-z_][a-z0-9_]*$/;
const MAX_COLUMN_LENGTH = 63; // Postgres identifier limit

function readBooleanFromEnv(env: NodeJS.ProcessEnv, name: string, defaultValue: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw === '') return defaultValue;
  return ['1', 'true', 'yes', 'on'].includes(raw.toLowerCase());
}

function readListFromEnv(env: NodeJS.ProcessEnv, name: string, defaultValue: string[]): string[] {
  const raw = env[name];
  if (raw === undefined) return defaultValue;
  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export function assertValidColumnName(column: string): void {
  if (!COLUMN_NAME.test(column) || column.length > MAX_COLUMN_LENGTH) {
    throw new ValidationError(`Invalid tenant column name: ${column}`, [
      { field: 'tenantColumn', message: 'must be a valid database column name' },
    ]);
  }
}

export function loadTenancyConfig(env: NodeJS.ProcessEnv = process.env): TenancyConfig {
  const tenantColumn = env.TENANT_COLUMN || 'organization_id';
  assertValidColumnName(tenantColumn);

  return {
    environment: env.NODE_ENV || 'development',
    tenantColumn,
    bypassesDisabled: readBooleanFromEnv(env, 'TENANT_BYPASSES_DISABLED', false),
    deployedEnvironments: readListFromEnv(env, 'TENANT_DEPLOYED_ENVIRONMENTS', ['production', 'staging']),
    excludedModels: readListFromEnv(env, 'TENANT_EXCLUDED_MODELS', []),
    systemScopedModels: readListFromEnv(env, 'TENANT_SYSTEM_MODELS', []),
  };
}

export function isDeployedEnvironment(config: TenancyConfig): boolean {
  return config.deployedEnvironments.includes(config.environment);
}
