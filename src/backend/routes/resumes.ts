/**
 * Resume routes - upload, readiness and score improvement.
 * Improvement runs either return the result as JSON or, with ?stream=true,
 * report progress as server-sent events.
 */

import { randomUUID } from 'crypto';
import { Router, Request, Response } from 'express';
import { loggers } from '../../shared/logging/logger';
import { asyncHandler } from '../middleware/errorHandler';
import type { AppServices } from '../services';
import {
  ImproveQuerySchema,
  ImproveRequestSchema,
  ReadinessQuerySchema,
  ResumeUploadSchema,
  parseRequest,
  requestIdOf,
} from './validation';

const resumeLogger = loggers.http.child({ route: 'resumes' });

export function createResumesRouter(services: AppServices): Router {
  const router = Router();

  /**
   * POST /api/v1/resumes/upload
   * Store a resume and extract its structured data
   */
  router.post('/upload', asyncHandler(async (req: Request, res: Response) => {
    const { content } = parseRequest(ResumeUploadSchema, req.body);
    const resumeId = await services.extraction.createAndStoreResume(content);

    resumeLogger.info({ resumeId }, 'Resume uploaded');
    res.status(201).json({ resume_id: resumeId });
  }));

  /**
   * GET /api/v1/resumes/readiness?resume_id=&job_id=
   * Whether both documents can be scored, without running anything
   */
  router.get('/readiness', asyncHandler(async (req: Request, res: Response) => {
    const query = parseRequest(ReadinessQuerySchema, req.query);
    const summary = await services.readiness.validateImprovementReadiness(query.resume_id, query.job_id);

    if (summary.valid) {
      res.json({ valid: true, resume_id: query.resume_id, job_id: query.job_id, message: summary.message });
      return;
    }
    res.json(summary);
  }));

  /**
   * POST /api/v1/resumes/improve[?stream=true]
   */
  router.post('/improve', asyncHandler(async (req: Request, res: Response) => {
    const body = parseRequest(ImproveRequestSchema, req.body);
    const { stream } = parseRequest(ImproveQuerySchema, req.query);

    if (stream === 'true') {
      await streamImprovement(services, body.resume_id, body.job_id, res);
      return;
    }

    const requestId = requestIdOf(req) ?? randomUUID();
    const data = await services.improvement.run(body.resume_id, body.job_id);
    res.json({ request_id: requestId, data });
  }));

  return router;
}

/**
 * Resolves once the response can take more data or the client has gone
 */
function waitForDrain(res: Response): Promise<void> {
  return new Promise(resolve => {
    const done = () => {
      res.off('drain', done);
      res.off('close', done);
      resolve();
    };
    res.once('drain', done);
    res.once('close', done);
  });
}

async function streamImprovement(services: AppServices, resumeId: string, jobId: string, res: Response): Promise<void> {
  res.status(200);
  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.setHeader('X-Accel-Buffering', 'no');
  res.flushHeaders();

  // A disconnect stops the run at its next stage or rewrite attempt
  const disconnect = new AbortController();
  const onClose = () => {
    if (!res.writableEnded) {
      disconnect.abort();
    }
  };
  res.on('close', onClose);

  try {
    const stream = services.improvement.streamSse(resumeId, jobId, { signal: disconnect.signal });
    for await (const chunk of stream) {
      if (disconnect.signal.aborted) {
        break;
      }
      if (!res.write(chunk)) {
        await waitForDrain(res);
      }
    }
  } finally {
    res.off('close', onClose);
  }

  if (disconnect.signal.aborted) {
    resumeLogger.info({ resumeId, jobId }, 'Client disconnected from improvement stream');
    return;
  }
  res.end();
}
