// ──────────────────────────────────────────
// Projects: tenant-scoped model
// ──────────────────────────────────────────

import { Knex } from 'knex';
import { ScopingRuntime, TenantScopedModel } from '../../platform/scoped';

export interface Project {
  id: string;
  /** Stored under TENANT_COLUMN; read it through the model's tenantColumn. */
  organization_id: string;
  name: string;
  created_at: Date | string;
}

export type ProjectModel = TenantScopedModel<Project>;

export function defineProjectModel(db: Knex, runtime: ScopingRuntime): Promise<ProjectModel> {
  return TenantScopedModel.define<Project>(db, { name: 'Project', table: 'projects' }, runtime);
}
