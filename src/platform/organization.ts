// ──────────────────────────────────────────
// Platform: Organization repository — the tenant itself
// ──────────────────────────────────────────

import { Knex } from 'knex';
import { v4 as uuidv4 } from 'uuid';
import { TenantDirectory, TenantLookup } from '../shared/contracts';
import { RecordNotFoundError, ValidationError } from '../shared/errors';
import { FieldError, Organization, TenantId } from '../shared/types';

const MIN_NAME_LENGTH = 2;
const MAX_NAME_LENGTH = 100;

export function normalizeOrganizationName(name: string): string {
  return name.trim().replace(/\s+/g, ' ');
}

export function displayName(organization: Pick<Organization, 'name'>): string {
  const name = normalizeOrganizationName(organization.name);
  return name.length > 0 ? name : 'Unnamed Organization';
}

function toOrganization(row: Organization): Organization {
  // sqlite hands booleans back as 0/1
  return { ...row, archived: Boolean(row.archived) };
}

export class OrganizationRepo implements TenantLookup, TenantDirectory {
  constructor(private db: Knex, private tenantColumn = 'organization_id') {}

  async findById(id: TenantId): Promise<Organization | null> {
    const row = await this.db('organizations').where('id', id).first();
    return row ? toOrganization(row) : null;
  }

  async findAll(): Promise<Organization[]> {
    const rows: Organization[] = await this.db('organizations').select('*').orderBy('name');
    return rows.map(toOrganization);
  }

  async findActive(): Promise<Organization[]> {
    const rows: Organization[] = await this.db('organizations').where('archived', false).select('*').orderBy('name');
    return rows.map(toOrganization);
  }

  async create(input: { name: string }): Promise<Organization> {
    const name = normalizeOrganizationName(input.name);
    const errors: FieldError[] = [];

    if (name.length === 0) {
      errors.push({ field: 'name', message: "can't be blank" });
    } else if (name.length < MIN_NAME_LENGTH || name.length > MAX_NAME_LENGTH) {
      errors.push({ field: 'name', message: `must be between ${MIN_NAME_LENGTH} and ${MAX_NAME_LENGTH} characters` });
    } else {
      const duplicate = await this.db('organizations').whereRaw('lower(name) = ?', [name.toLowerCase()]).first();
      if (duplicate) errors.push({ field: 'name', message: 'has already been taken' });
    }

    if (errors.length > 0) {
      throw new ValidationError(`Organization is invalid: ${errors.map((e) => `${e.field} ${e.message}`).join(', ')}`, errors);
    }

    const id = uuidv4();
    await this.db('organizations').insert({ id, name, archived: false });
    const created = await this.findById(id);
    if (!created) throw new RecordNotFoundError('Organization', id);
    return created;
  }

  async archive(id: TenantId): Promise<Organization> {
    const updated = await this.db('organizations').where('id', id).update({ archived: true });
    const organization = updated > 0 ? await this.findById(id) : null;
    if (!organization) throw new RecordNotFoundError('Organization', id);
    return organization;
  }

  async userCount(id: TenantId): Promise<number> {
    const row = await this.db('memberships')
      .where({ [this.tenantColumn]: id, status: 'active' })
      .countDistinct({ count: 'user_id' })
      .first();
    return Number(row?.count ?? 0);
  }
}
