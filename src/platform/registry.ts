// ──────────────────────────────────────────
// Platform: Model registry — which entity types are scoped, and how
// ──────────────────────────────────────────

import { IncompatibilityError } from '../shared/errors';
import { createLogger, Logger } from '../shared/logger';
import { ScopedEntityDescriptor, ScopingSummary, ScopingType } from '../shared/types';

type EntityRef = string | { name: string };

function entityName(entity: EntityRef): string {
  return typeof entity === 'string' ? entity : entity.name;
}

export class ModelRegistry {
  private descriptors = new Map<string, ScopedEntityDescriptor>();

  constructor(private logger: Logger = createLogger('ModelRegistry')) {}

  /**
   * Adds a descriptor. Registering the same entity again is a no-op;
   * registering it under a different scoping type is a conflict.
   */
  register(descriptor: ScopedEntityDescriptor): boolean {
    const existing = this.descriptors.get(descriptor.name);
    if (existing) {
      if (existing.scopingType !== descriptor.scopingType) {
        throw new IncompatibilityError(
          descriptor.name,
          `already registered as ${existing.scopingType}-scoped, cannot also be ${descriptor.scopingType}`
        );
      }
      return false;
    }

    this.descriptors.set(descriptor.name, { ...descriptor });
    this.logger.debug(`[MULTI_TENANT] Registered ${descriptor.name} as ${descriptor.scopingType}`, {
      table: descriptor.table,
    });
    return true;
  }

  isRegistered(entity: EntityRef): boolean {
    return this.descriptors.has(entityName(entity));
  }

  isTenantScoped(entity: EntityRef): boolean {
    return this.descriptors.get(entityName(entity))?.scopingType === 'tenant';
  }

  get(entity: EntityRef): ScopedEntityDescriptor | undefined {
    const descriptor = this.descriptors.get(entityName(entity));
    return descriptor ? { ...descriptor } : undefined;
  }

  tenantScopedModels(): string[] {
    return this.namesOf('tenant');
  }

  scopingSummary(): ScopingSummary {
    return {
      tenantScoped: this.namesOf('tenant'),
      systemScoped: this.namesOf('system'),
      excluded: this.namesOf('excluded'),
      total: this.descriptors.size,
    };
  }

  printSummary(): void {
    const summary = this.scopingSummary();
    const list = (names: string[]) => (names.length > 0 ? names.join(', ') : '(none)');
    this.logger.info('[TENANT_REPORTING] Tenant scoping summary');
    this.logger.info(`[TENANT_REPORTING]   Tenant-scoped (${summary.tenantScoped.length}): ${list(summary.tenantScoped)}`);
    this.logger.info(`[TENANT_REPORTING]   System-scoped (${summary.systemScoped.length}): ${list(summary.systemScoped)}`);
    this.logger.info(`[TENANT_REPORTING]   Excluded (${summary.excluded.length}): ${list(summary.excluded)}`);
    this.logger.info(`[TENANT_REPORTING]   Total: ${summary.total}`);
  }

  private namesOf(type: ScopingType): string[] {
    return [...this.descriptors.values()].filter((d) => d.scopingType === type).map((d) => d.name);
  }
}
