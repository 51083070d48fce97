// ──────────────────────────────────────────
// Projects domain — barrel export
// ──────────────────────────────────────────

export { defineProjectModel } from './project.model';
export type { Project, ProjectModel } from './project.model';
export { createProjectRoutes } from './routes';
