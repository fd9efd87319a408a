/**
 * Main router index - aggregates the v1 route modules.
 */

import { Router } from 'express';
import type { AppServices } from '../services';
import { createJobsRouter } from './jobs';
import { createResumesRouter } from './resumes';

export function createApiRouter(services: AppServices): Router {
  const router = Router();

  router.use('/resumes', createResumesRouter(services));
  router.use('/jobs', createJobsRouter(services));

  return router;
}

export { createJobsRouter, createResumesRouter };
