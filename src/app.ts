// ──────────────────────────────────────────
// Express app — routes mounted behind the tenant context middleware
// ──────────────────────────────────────────

import express, { Express } from 'express';
import { errorHandler, tenantContext } from './platform/middleware';
import { createTenancyRoutes } from './platform/routes';
import { Tenancy } from './platform/tenancy';
import { createProjectRoutes, ProjectModel } from './domains/projects';

export interface AppDependencies {
  tenancy: Tenancy;
  projects: ProjectModel;
}

export function createApp({ tenancy, projects }: AppDependencies): Express {
  const app = express();
  app.use(express.json());

  app.use('/api/v1/tenancy', createTenancyRoutes(tenancy));
  app.use('/api/v1/projects', tenantContext(tenancy.organizations), createProjectRoutes(projects));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use(errorHandler);

  return app;
}
