// ──────────────────────────────────────────
// Shared type definitions for tenancy-kit
// ──────────────────────────────────────────

export type TenantId = string | number;
export type RecordId = string | number;

export type ScopingType = 'tenant' | 'system' | 'excluded';
export type RoleType = 'member' | 'admin' | 'owner';
export type MembershipStatus = 'active' | 'inactive';

export const ROLE_TYPES: readonly RoleType[] = ['member', 'admin', 'owner'];

// ── Tenancy domain ──

export interface Organization {
  id: string;
  name: string;
  archived: boolean;
  created_at: Date | string;
}

export interface Role {
  id: string;
  name: string;
  role_type: RoleType;
  description: string | null;
  created_at: Date | string;
}

export interface Membership {
  id: string;
  user_id: string;
  /** Stored under TENANT_COLUMN; read it through the model's tenantColumn. */
  organization_id: string;
  role_id: string;
  status: MembershipStatus;
  created_at: Date | string;
}

export interface User {
  id: string;
  name: string;
  email: string;
}

// ── Scoping ──

export interface ScopedRecord {
  id: RecordId;
}

export interface ScopedEntityDescriptor {
  name: string;
  table: string;
  tenantColumn: string;
  hasTenantColumn: boolean;
  scopingType: ScopingType;
}

export interface ScopingSummary {
  tenantScoped: string[];
  systemScoped: string[];
  excluded: string[];
  total: number;
}

export interface FieldError {
  field: string;
  message: string;
}

export type SaveResult<T> = { ok: true; record: T } | { ok: false; errors: FieldError[] };

export interface TenantResult<T> {
  tenant: Organization;
  result: T;
}

export function toTenantId(value: unknown): TenantId | null {
  if (typeof value === 'string' && value.length > 0) return value;
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  return null;
}

export function sameTenantId(a: TenantId | null, b: TenantId | null): boolean {
  if (a === null || b === null) return false;
  return String(a) === String(b);
}

export function readColumn(record: object, column: string): unknown {
  const entry = Object.entries(record).find(([key]) => key === column);
  return entry?.[1];
}
