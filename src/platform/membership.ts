// ──────────────────────────────────────────
// Platform: Memberships — users within the current organization
// ──────────────────────────────────────────

import { RecordNotFoundError, ValidationError } from '../shared/errors';
import { Membership, readColumn, Role, toTenantId } from '../shared/types';
import { isAdminRole, RoleRepo } from './role';
import { TenantScopedModel } from './scoped';

export class MembershipService {
  constructor(private memberships: TenantScopedModel<Membership>, private roles: RoleRepo) {}

  async listMembers(): Promise<Membership[]> {
    return this.memberships.query().where('status', 'active').select('*').orderBy('created_at');
  }

  async find(id: string): Promise<Membership> {
    const membership = await this.memberships.findById(id);
    if (!membership) throw new RecordNotFoundError(this.memberships.name, id);
    return membership;
  }

  async addMember(userId: string, roleId: string): Promise<Membership> {
    await this.requireRole(roleId);

    const existing = await this.memberships.query().where('user_id', userId).first();
    if (existing) {
      throw new ValidationError('User already has a membership in this organization', [
        { field: 'user_id', message: 'already has a membership in this organization' },
      ]);
    }

    const result = await this.memberships.create({ user_id: userId, role_id: roleId, status: 'active' });
    if (!result.ok) {
      throw new ValidationError('Membership is invalid', result.errors);
    }
    return result.record;
  }

  async changeRole(membershipId: string, roleId: string): Promise<Membership> {
    const membership = await this.find(membershipId);
    const role = await this.requireRole(roleId);
    if (role.role_type !== 'owner' && (await this.isLastOwner(membership))) {
      throw new ValidationError('Cannot remove the last owner of an organization', [
        { field: 'role_id', message: 'last owner must keep the owner role' },
      ]);
    }

    const result = await this.memberships.update(membershipId, { role_id: roleId });
    if (!result.ok) {
      throw new ValidationError('Membership is invalid', result.errors);
    }
    return result.record;
  }

  async removeMember(membershipId: string): Promise<void> {
    const membership = await this.find(membershipId);
    if (await this.isLastOwner(membership)) {
      throw new ValidationError('Cannot remove the last owner of an organization');
    }
    await this.memberships.destroy(membershipId);
  }

  async roleOf(membership: Membership): Promise<Role> {
    return this.requireRole(membership.role_id);
  }

  async isAdmin(membership: Membership): Promise<boolean> {
    return isAdminRole(await this.roleOf(membership));
  }

  /** Owners manage everyone, admins manage non-owners, nobody manages themselves. */
  async canManageMembership(actor: Membership, target: Membership): Promise<boolean> {
    if (actor.id === target.id) return false;
    const actorTenant = toTenantId(readColumn(actor, this.memberships.tenantColumn));
    if (actorTenant === null || !this.memberships.canBeAccessedBy(target, actorTenant)) return false;

    const [actorRole, targetRole] = await Promise.all([this.roleOf(actor), this.roleOf(target)]);
    if (actorRole.role_type === 'owner') return true;
    if (actorRole.role_type === 'admin') return targetRole.role_type !== 'owner';
    return false;
  }

  private async requireRole(roleId: string): Promise<Role> {
    const role = await this.roles.findById(roleId);
    if (!role) throw new RecordNotFoundError('Role', roleId);
    return role;
  }

  private async isLastOwner(membership: Membership): Promise<boolean> {
    const role = await this.roleOf(membership);
    if (role.role_type !== 'owner' || membership.status !== 'active') return false;

    const ownerRoleIds = (await this.roles.findByType('owner')).map((r) => r.id);
    const row = await this.memberships
      .query()
      .whereIn('role_id', ownerRoleIds)
      .where('status', 'active')
      .count({ count: '*' })
      .first();
    return Number(row?.count ?? 0) <= 1;
  }
}
