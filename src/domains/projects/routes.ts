// ──────────────────────────────────────────
// Projects: API routes
// ──────────────────────────────────────────

import { Router, Request, Response } from 'express';
import { respondWithError } from '../../platform/middleware';
import { ProjectModel } from './project.model';

const MAX_NAME_LENGTH = 255;

function readName(body: unknown): string | null {
  if (typeof body !== 'object' || body === null || !('name' in body)) return null;
  const { name } = body;
  if (typeof name !== 'string') return null;
  const trimmed = name.trim();
  return trimmed.length > 0 && trimmed.length <= MAX_NAME_LENGTH ? trimmed : null;
}

export function createProjectRoutes(projects: ProjectModel): Router {
  const router = Router();

  // GET / — projects of the current organization
  router.get('/', async (_req: Request, res: Response) => {
    try {
      res.json({ data: await projects.all() });
    } catch (err) {
      respondWithError(res, err);
    }
  });

  // GET /:id
  router.get('/:id', async (req: Request, res: Response) => {
    try {
      const project = await projects.findById(req.params.id);
      if (!project) {
        res.status(404).json({ error: `Project not found: ${req.params.id}` });
        return;
      }
      res.json(project);
    } catch (err) {
      respondWithError(res, err);
    }
  });

  // POST / — { name }; organization comes from the request's tenant context
  router.post('/', async (req: Request, res: Response) => {
    try {
      const name = readName(req.body);
      if (!name) {
        res.status(422).json({ error: 'name is required', errors: [{ field: 'name', message: "can't be blank" }] });
        return;
      }

      const result = await projects.create({ name });
      if (!result.ok) {
        res.status(422).json({ error: 'Project is invalid', errors: result.errors });
        return;
      }
      res.status(201).json(result.record);
    } catch (err) {
      respondWithError(res, err);
    }
  });

  // PATCH /:id — { name?, <tenant column>? }
  router.patch('/:id', async (req: Request, res: Response) => {
    try {
      const changes: Record<string, unknown> = {};
      if (req.body?.name !== undefined) {
        const name = readName(req.body);
        if (!name) {
          res.status(422).json({ error: 'name is invalid', errors: [{ field: 'name', message: "can't be blank" }] });
          return;
        }
        changes.name = name;
      }
      const tenantId = req.body?.[projects.tenantColumn];
      if (typeof tenantId === 'string') {
        changes[projects.tenantColumn] = tenantId;
      }

      const result = await projects.update(req.params.id, changes);
      if (!result.ok) {
        res.status(422).json({ error: 'Project is invalid', errors: result.errors });
        return;
      }
      res.json(result.record);
    } catch (err) {
      respondWithError(res, err);
    }
  });

  // DELETE /:id
  router.delete('/:id', async (req: Request, res: Response) => {
    try {
      const deleted = await projects.destroy(req.params.id);
      if (deleted === 0) {
        res.status(404).json({ error: `Project not found: ${req.params.id}` });
        return;
      }
      res.status(204).end();
    } catch (err) {
      respondWithError(res, err);
    }
  });

  return router;
}
