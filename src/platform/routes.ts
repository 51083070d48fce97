// ──────────────────────────────────────────
// Platform: Tenancy API routes
// ──────────────────────────────────────────

import { Router, Request, Response } from 'express';
import { getCurrentTenant } from './context';
import { respondWithError, tenantContext } from './middleware';
import { displayName } from './organization';
import { Tenancy } from './tenancy';

export function createTenancyRoutes(tenancy: Tenancy): Router {
  const router = Router();

  // GET /summary — which models are scoped, and how
  router.get('/summary', (_req: Request, res: Response) => {
    res.json(tenancy.registry.scopingSummary());
  });

  // GET /organization — the organization this request is scoped to
  router.get('/organization', tenantContext(tenancy.organizations), async (_req: Request, res: Response) => {
    try {
      const organization = await getCurrentTenant();
      if (!organization) {
        res.status(404).json({ error: 'Organization not found' });
        return;
      }
      const userCount = await tenancy.organizations.userCount(organization.id);
      res.json({ ...organization, display_name: displayName(organization), user_count: userCount });
    } catch (err) {
      respondWithError(res, err);
    }
  });

  // GET /members — active memberships of the current organization
  router.get('/members', tenantContext(tenancy.organizations), async (_req: Request, res: Response) => {
    try {
      res.json({ data: await tenancy.memberships.listMembers() });
    } catch (err) {
      respondWithError(res, err);
    }
  });

  return router;
}
