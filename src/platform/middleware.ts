// ──────────────────────────────────────────
// Platform: Tenant context middleware + error responses
// ──────────────────────────────────────────

import { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { validate as isUuid } from 'uuid';
import {
  AdminAuthorizationError,
  CrossTenantAccessError,
  MissingTenantContextError,
  RecordNotFoundError,
  ScopingDisabledError,
  ValidationError,
} from '../shared/errors';
import { createLogger } from '../shared/logger';
import { withIsolatedContext, withTenantScope } from './context';
import { OrganizationRepo } from './organization';

const logger = createLogger('Http');

export const ORGANIZATION_HEADER = 'x-organization-id';

export function tenantContext(organizations: OrganizationRepo) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const organizationId = req.header(ORGANIZATION_HEADER);
    if (!organizationId) {
      res.status(401).json({ error: `Missing ${ORGANIZATION_HEADER} header` });
      return;
    }

    // Organization ids are uuids; anything else cannot name one
    if (!isUuid(organizationId)) {
      res.status(404).json({ error: `Organization not found: ${organizationId}` });
      return;
    }

    try {
      const organization = await organizations.findById(organizationId);
      if (!organization || organization.archived) {
        res.status(404).json({ error: `Organization not found: ${organizationId}` });
        return;
      }

      // Run the rest of the request in its own context, scoped to the organization
      withIsolatedContext(() => withTenantScope(organization, () => next()));
    } catch (err) {
      respondWithError(res, err);
    }
  };
}

export function respondWithError(res: Response, err: unknown): void {
  if (err instanceof ValidationError) {
    res.status(422).json({ error: err.message, errors: err.errors });
  } else if (err instanceof RecordNotFoundError) {
    res.status(404).json({ error: err.message });
  } else if (err instanceof MissingTenantContextError) {
    res.status(401).json({ error: err.message });
  } else if (
    err instanceof CrossTenantAccessError ||
    err instanceof ScopingDisabledError ||
    err instanceof AdminAuthorizationError
  ) {
    res.status(403).json({ error: err.message });
  } else {
    const message = err instanceof Error ? err.message : 'Internal error';
    logger.error(`Unhandled error: ${message}`);
    res.status(500).json({ error: message });
  }
}

export const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  respondWithError(res, err);
};
