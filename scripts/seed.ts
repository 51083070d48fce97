// ──────────────────────────────────────────
// Script: Seed — demo organizations, users, memberships and projects
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import { faker } from '@faker-js/faker';
import { v4 as uuidv4 } from 'uuid';
import { getDb, closeDb } from '../src/db/connection';
import { migrationConfig } from '../src/db/knexfile';
import { loadTenancyConfig } from '../src/config';
import { bootstrapTenancy } from '../src/platform/tenancy';
import { withIsolatedContext, withTenantScope } from '../src/platform/context';
import { defineProjectModel } from '../src/domains/projects';
import { createLogger } from '../src/shared/logger';
import { User } from '../src/shared/types';

const logger = createLogger('Seed');
const ORGANIZATIONS = 3;
const USERS_PER_ORGANIZATION = 4;
const PROJECTS_PER_ORGANIZATION = 5;

async function seed() {
  const db = getDb();
  logger.info('Starting...');

  logger.info('Running migrations...');
  await db.migrate.latest(migrationConfig);

  logger.info('Clearing existing data...');
  await db('projects').del();
  await db('memberships').del();
  await db('roles').del();
  await db('organizations').del();

  const tenancy = await bootstrapTenancy(db, loadTenancyConfig());
  const projects = await defineProjectModel(db, tenancy.runtime);
  const roles = await tenancy.roles.ensureDefaults();

  for (let i = 0; i < ORGANIZATIONS; i++) {
    const organization = await tenancy.organizations.create({ name: faker.company.name() });
    logger.info(`Created organization: ${organization.name} (${organization.id})`);

    await withIsolatedContext(() =>
      withTenantScope(organization, async () => {
        for (let u = 0; u < USERS_PER_ORGANIZATION; u++) {
          const firstName = faker.person.firstName();
          const lastName = faker.person.lastName();
          const user: User = {
            id: uuidv4(),
            name: `${firstName} ${lastName}`,
            email: faker.internet.email({ firstName, lastName, provider: `${uuidv4().slice(0, 8)}.example` }).toLowerCase(),
          };
          await db('users').insert(user);
          const role = u === 0 ? roles.owner : u === 1 ? roles.admin : roles.member;
          await tenancy.memberships.addMember(user.id, role.id);
        }

        for (let p = 0; p < PROJECTS_PER_ORGANIZATION; p++) {
          const result = await projects.create({ name: faker.commerce.productName() });
          if (!result.ok) {
            throw new Error(`Project seed failed: ${result.errors.map((e) => `${e.field} ${e.message}`).join(', ')}`);
          }
        }
      })
    );
  }

  const totals = await projects.forEachTenant(() => projects.count());
  for (const { tenant, result } of totals) {
    logger.info(`${tenant.name}: ${result} projects`);
  }

  tenancy.registry.printSummary();
  logger.info('✅ Done');
  await closeDb();
  process.exit(0);
}

seed().catch(async (err) => {
  logger.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  await closeDb();
  process.exit(1);
});
