// ──────────────────────────────────────────
// Platform: Roles — global, system-scoped
// ──────────────────────────────────────────

import { RecordNotFoundError, ValidationError } from '../shared/errors';
import { FieldError, Role, ROLE_TYPES, RoleType } from '../shared/types';
import { TenantScopedModel } from './scoped';

export function isAdminRole(role: Pick<Role, 'role_type'>): boolean {
  return role.role_type === 'admin' || role.role_type === 'owner';
}

export function canManageUsers(role: Pick<Role, 'role_type'>): boolean {
  return isAdminRole(role);
}

export function canManageOrganization(role: Pick<Role, 'role_type'>): boolean {
  return role.role_type === 'owner';
}

function isRoleType(value: string): value is RoleType {
  return ROLE_TYPES.some((type) => type === value);
}

const DEFAULT_ROLE_NAMES: Record<RoleType, string> = {
  member: 'Member',
  admin: 'Admin',
  owner: 'Owner',
};

export class RoleRepo {
  constructor(private roles: TenantScopedModel<Role>) {}

  async findById(id: string): Promise<Role | null> {
    return this.roles.findById(id);
  }

  async findAll(): Promise<Role[]> {
    return this.roles.query().select('*').orderBy('name');
  }

  async findByType(roleType: RoleType): Promise<Role[]> {
    return this.roles.query().where('role_type', roleType).select('*').orderBy('name');
  }

  async create(input: { name: string; role_type: string; description?: string | null }): Promise<Role> {
    const name = input.name.trim();
    const errors: FieldError[] = [];
    if (name.length === 0) errors.push({ field: 'name', message: "can't be blank" });
    if (!isRoleType(input.role_type)) {
      errors.push({ field: 'role_type', message: `must be one of ${ROLE_TYPES.join(', ')}` });
    }
    if (name.length > 0) {
      const duplicate = await this.roles.query().whereRaw('lower(name) = ?', [name.toLowerCase()]).first();
      if (duplicate) errors.push({ field: 'name', message: 'has already been taken' });
    }
    if (errors.length > 0 || !isRoleType(input.role_type)) {
      throw new ValidationError(`Role is invalid: ${errors.map((e) => `${e.field} ${e.message}`).join(', ')}`, errors);
    }

    const result = await this.roles.create({ name, role_type: input.role_type, description: input.description ?? null });
    if (!result.ok) throw new ValidationError('Role is invalid', result.errors);
    return result.record;
  }

  /** One role per type; existing roles are left alone. */
  async ensureDefaults(): Promise<Record<RoleType, Role>> {
    const ensured: Partial<Record<RoleType, Role>> = {};
    for (const roleType of ROLE_TYPES) {
      const [existing] = await this.findByType(roleType);
      ensured[roleType] = existing ?? (await this.create({ name: DEFAULT_ROLE_NAMES[roleType], role_type: roleType }));
    }
    const { member, admin, owner } = ensured;
    if (!member || !admin || !owner) {
      throw new ValidationError('Default roles could not be created');
    }
    return { member, admin, owner };
  }

  async delete(id: string): Promise<void> {
    const role = await this.findById(id);
    if (!role) throw new RecordNotFoundError('Role', id);
    if (role.role_type === 'owner') {
      const owners = await this.findByType('owner');
      if (owners.length <= 1) {
        throw new ValidationError('Cannot delete the last owner role', [
          { field: 'role_type', message: 'last owner role cannot be removed' },
        ]);
      }
    }
    await this.roles.destroy(id);
  }
}
