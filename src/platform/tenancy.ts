// ──────────────────────────────────────────
// Platform: Tenancy bootstrap — registry, repos and built-in models
// ──────────────────────────────────────────

import { Knex } from 'knex';
import { TenancyConfig } from '../config';
import { createLogger, Logger } from '../shared/logger';
import { Membership, Role } from '../shared/types';
import { validateCompatibility } from './compatibility';
import { configureTenantContext } from './context';
import { MembershipService } from './membership';
import { OrganizationRepo } from './organization';
import { ModelRegistry } from './registry';
import { RoleRepo } from './role';
import { ScopingRuntime, TenantScopedModel } from './scoped';

export interface Tenancy {
  runtime: ScopingRuntime;
  registry: ModelRegistry;
  organizations: OrganizationRepo;
  roles: RoleRepo;
  memberships: MembershipService;
  membershipModel: TenantScopedModel<Membership>;
}

/**
 * Wires the tenancy core against a database. Rejects when any built-in
 * model fails compatibility validation.
 */
export async function bootstrapTenancy(
  db: Knex,
  config: TenancyConfig,
  logger: Logger = createLogger('Tenancy')
): Promise<Tenancy> {
  const registry = new ModelRegistry(logger);
  const organizations = new OrganizationRepo(db, config.tenantColumn);
  configureTenantContext({ lookup: organizations, logger });

  const runtime: ScopingRuntime = { config, registry, tenants: organizations, logger };

  registry.register(
    await validateCompatibility(db, { name: 'Organization', table: 'organizations', scope: 'system' }, config, logger)
  );
  const roleModel = await TenantScopedModel.define<Role>(db, { name: 'Role', table: 'roles', scope: 'system' }, runtime);
  const membershipModel = await TenantScopedModel.define<Membership>(
    db,
    { name: 'Membership', table: 'memberships', scope: 'tenant' },
    runtime
  );

  const roles = new RoleRepo(roleModel);
  const memberships = new MembershipService(membershipModel, roles);

  return { runtime, registry, organizations, roles, memberships, membershipModel };
}
