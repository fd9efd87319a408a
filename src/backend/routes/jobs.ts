/**
 * Job routes - upload job descriptions against a resume and read them back
 * with their processed data.
 */

import { Router, Request, Response } from 'express';
import { loggers } from '../../shared/logging/logger';
import { ApiError, asyncHandler } from '../middleware/errorHandler';
import type { AppServices } from '../services';
import { JobQuerySchema, JobUploadSchema, parseRequest } from './validation';

const jobLogger = loggers.http.child({ route: 'jobs' });

export function createJobsRouter(services: AppServices): Router {
  const router = Router();

  /**
   * POST /api/v1/jobs/upload
   */
  router.post('/upload', asyncHandler(async (req: Request, res: Response) => {
    const body = parseRequest(JobUploadSchema, req.body);
    const jobIds = await services.extraction.createAndStoreJobs(body.resume_id, body.job_descriptions);

    jobLogger.info({ resumeId: body.resume_id, jobIds }, 'Job descriptions uploaded');
    res.status(201).json({ job_id: jobIds });
  }));

  /**
   * GET /api/v1/jobs?job_id=
   */
  router.get('/', asyncHandler(async (req: Request, res: Response) => {
    const { job_id: jobId } = parseRequest(JobQuerySchema, req.query);
    const job = await services.extraction.getJobWithProcessedData(jobId);
    if (!job) {
      throw new ApiError(404, `Job with id ${jobId} not found or not processed`, 'JOB_NOT_FOUND');
    }
    res.json({ data: job });
  }));

  return router;
}
