// ──────────────────────────────────────────
// tenancy-kit — public API
// ──────────────────────────────────────────

export * from './platform/context';
export { TenantScopedModel } from './platform/scoped';
export type { RecordChanges, ScopingRuntime, TenantScopedModelOptions } from './platform/scoped';
export { validateCompatibility, isModelCompatible } from './platform/compatibility';
export type { ModelDefinition } from './platform/compatibility';
export { BypassGuard } from './platform/bypass';
export type { BypassAttempt, BypassOperation } from './platform/bypass';
export { ModelRegistry } from './platform/registry';
export { OrganizationRepo, displayName, normalizeOrganizationName } from './platform/organization';
export { RoleRepo, isAdminRole, canManageUsers, canManageOrganization } from './platform/role';
export { MembershipService } from './platform/membership';
export { bootstrapTenancy } from './platform/tenancy';
export type { Tenancy } from './platform/tenancy';
export { tenantContext, respondWithError, errorHandler, ORGANIZATION_HEADER } from './platform/middleware';
export { loadTenancyConfig, isDeployedEnvironment, assertValidColumnName } from './config';
export type { TenancyConfig } from './config';
export { createLogger, callerLocation } from './shared/logger';
export type { Logger, LogContext, LogLevel } from './shared/logger';
export * from './shared/errors';
export * from './shared/types';
export type { TenantDirectory, TenantLookup } from './shared/contracts';
