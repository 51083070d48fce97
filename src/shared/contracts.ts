// ──────────────────────────────────────────
// Contracts — typed interfaces between the scoping core and persistence
// ──────────────────────────────────────────

import { Organization, TenantId } from './types';

/**
 * Resolves a tenant by id for `getCurrentTenant()`.
 * Implemented by OrganizationRepo.
 */
export interface TenantLookup {
  findById(id: TenantId): Promise<Organization | null>;
}

/**
 * Enumerates every known tenant for `forEachTenant()`.
 */
export interface TenantDirectory {
  findAll(): Promise<Organization[]>;
}
