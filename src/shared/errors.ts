// ──────────────────────────────────────────
// Shared error types
// ──────────────────────────────────────────

import { FieldError, RecordId } from './types';

export class ValidationError extends Error {
  constructor(message: string, public readonly errors: FieldError[] = []) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class RecordNotFoundError extends Error {
  constructor(public readonly model: string, public readonly id: RecordId) {
    super(`${model} ${id} not found`);
    this.name = 'RecordNotFoundError';
  }
}

/** Base class for every tenant isolation failure. */
export class TenantScopingError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TenantScopingError';
  }
}

export class MissingColumnError extends TenantScopingError {
  constructor(
    public readonly model: string,
    public readonly table: string,
    public readonly column: string
  ) {
    super(
      `${model} cannot be tenant-scoped: table "${table}" has no "${column}" column.\n` +
        'To fix this issue, you have several options:\n' +
        `  1. Add the column with a migration: table.uuid('${column}').references('id').inTable('organizations')\n` +
        `  2. Mark ${model} as system-scoped: define it with { scope: 'system' } or add it to TENANT_SYSTEM_MODELS\n` +
        `  3. Add ${model} to TENANT_EXCLUDED_MODELS to skip tenant scoping entirely`
    );
    this.name = 'MissingColumnError';
  }
}

export class IncompatibilityError extends TenantScopingError {
  constructor(public readonly model: string, reason: string) {
    super(`${model} is not compatible with tenant scoping: ${reason}`);
    this.name = 'IncompatibilityError';
  }
}

export class ScopingDisabledError extends TenantScopingError {
  constructor(public readonly operation: string, public readonly model: string) {
    super(
      `${operation} on ${model} refused: tenant scoping bypasses are disabled. ` +
        'Unset TENANT_BYPASSES_DISABLED to allow audited bypasses.'
    );
    this.name = 'ScopingDisabledError';
  }
}

export class AdminAuthorizationError extends TenantScopingError {
  constructor(public readonly model: string, options?: ErrorOptions) {
    super(`Admin bypass on ${model} refused: admin check did not pass`, options);
    this.name = 'AdminAuthorizationError';
  }
}

export class CrossTenantAccessError extends TenantScopingError {
  constructor(public readonly model: string, public readonly recordId: RecordId) {
    super(
      `${model} ${recordId} does not belong to the current tenant. ` +
        'Use an audited bypass (withTenantBypass, withAdminBypass) for cross-tenant access.'
    );
    this.name = 'CrossTenantAccessError';
  }
}

export class ReadOnlyRecordError extends TenantScopingError {
  constructor(public readonly model: string, operation: string) {
    super(`Cannot ${operation} ${model} inside a read-only scoping bypass`);
    this.name = 'ReadOnlyRecordError';
  }
}

export class MissingTenantContextError extends TenantScopingError {
  constructor() {
    super('No tenant context — request is not scoped to a tenant');
    this.name = 'MissingTenantContextError';
  }
}
