// ──────────────────────────────────────────
// Platform: AsyncLocalStorage-based tenant context
// ──────────────────────────────────────────

import { AsyncLocalStorage } from 'async_hooks';
import { TenantLookup } from '../shared/contracts';
import { MissingTenantContextError } from '../shared/errors';
import { callerLocation, createLogger, Logger } from '../shared/logger';
import { Organization, TenantId, toTenantId } from '../shared/types';

interface TenantContext {
  tenantId: TenantId | null;
  // undefined means "not resolved yet"; null means "resolved, no such tenant"
  tenant: Organization | null | undefined;
  scopingSuspended: boolean;
  readonly: boolean;
}

export const tenantStore = new AsyncLocalStorage<TenantContext>();

let tenantLookup: TenantLookup | null = null;
let logger: Logger = createLogger('TenantContext');

export function configureTenantContext(options: { lookup?: TenantLookup | null; logger?: Logger }): void {
  if (options.lookup !== undefined) tenantLookup = options.lookup;
  if (options.logger) logger = options.logger;
}

// A failing log sink must not turn a context operation into an error
function logSafely(write: (log: Logger) => void): void {
  try {
    write(logger);
  } catch (err) {
    console.error(`[TenantContext] Logger failed: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function emptyContext(): TenantContext {
  return { tenantId: null, tenant: undefined, scopingSuspended: false, readonly: false };
}

function currentContext(): TenantContext {
  const existing = tenantStore.getStore();
  if (existing) return existing;
  const created = emptyContext();
  tenantStore.enterWith(created);
  return created;
}

function resolveTenantArg(tenant: Organization | TenantId | null): Pick<TenantContext, 'tenantId' | 'tenant'> {
  if (tenant === null) return { tenantId: null, tenant: undefined };
  if (typeof tenant === 'object') return { tenantId: tenant.id, tenant };
  return { tenantId: tenant, tenant: undefined };
}

/** Starts a fresh execution unit: nothing from the caller's context leaks in. */
export function withIsolatedContext<T>(fn: () => T): T {
  return tenantStore.run(emptyContext(), fn);
}

export function getCurrentTenantId(): TenantId | null {
  return tenantStore.getStore()?.tenantId ?? null;
}

export function setCurrentTenantId(id: TenantId | null): void {
  const ctx = currentContext();
  ctx.tenantId = id === null ? null : toTenantId(id);
  ctx.tenant = undefined;
}

export function setCurrentTenant(tenant: Organization | null): void {
  const ctx = currentContext();
  Object.assign(ctx, resolveTenantArg(tenant));
}

/** Like getCurrentTenantId(), but throws when the caller is outside any tenant. */
export function getTenantId(): TenantId {
  const tenantId = getCurrentTenantId();
  if (tenantId === null) {
    throw new MissingTenantContextError();
  }
  return tenantId;
}

/**
 * Resolves the current tenant through the configured lookup and caches it
 * until the id changes. Lookup failures are logged and reported as `null`.
 */
export async function getCurrentTenant(): Promise<Organization | null> {
  const ctx = tenantStore.getStore();
  if (!ctx || ctx.tenantId === null) return null;
  if (ctx.tenant !== undefined) return ctx.tenant;
  if (!tenantLookup) {
    logSafely((log) => log.debug('[MULTI_TENANT] No tenant lookup configured; current tenant cannot be resolved'));
    return null;
  }

  const requestedId = ctx.tenantId;
  try {
    const tenant = await tenantLookup.findById(requestedId);
    // The id may have moved on while the lookup was in flight
    if (ctx.tenantId === requestedId) ctx.tenant = tenant;
    return tenant;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logSafely((log) =>
      log.error(`[TENANT_ERROR] Failed to resolve tenant ${requestedId}: ${message}`, { tenantId: requestedId })
    );
    return null;
  }
}

export function withTenantScope<T>(tenant: Organization | TenantId, fn: () => T): T {
  const parent = tenantStore.getStore() ?? emptyContext();
  // Entering a tenant re-enables filtering, even inside an unscoped bypass
  return tenantStore.run({ ...parent, ...resolveTenantArg(tenant), scopingSuspended: false }, fn);
}

export function withoutTenantScope<T>(fn: () => T): T {
  const parent = tenantStore.getStore() ?? emptyContext();
  return tenantStore.run({ ...parent, tenantId: null, tenant: undefined }, fn);
}

export function clearTenantContext(): void {
  const ctx = tenantStore.getStore();
  const previous = ctx?.tenantId ?? null;
  if (ctx) {
    ctx.tenantId = null;
    ctx.tenant = undefined;
  }
  const caller = callerLocation();
  logSafely((log) => log.warn('[TENANT_WARNING] Tenant context cleared', { previousTenantId: previous, caller }));
}

export function isScopingSuspended(): boolean {
  return tenantStore.getStore()?.scopingSuspended ?? false;
}

export function isReadOnlyBypass(): boolean {
  return tenantStore.getStore()?.readonly ?? false;
}

export function isTenantScopingActive(): boolean {
  return getCurrentTenantId() !== null && !isScopingSuspended();
}

export function withScopingSuspended<T>(fn: () => T, options: { readonly?: boolean } = {}): T {
  const parent = tenantStore.getStore() ?? emptyContext();
  return tenantStore.run(
    { ...parent, scopingSuspended: true, readonly: parent.readonly || options.readonly === true },
    fn
  );
}
