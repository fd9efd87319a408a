/**
 * Request body and query schemas for the v1 API
 */

import { z } from 'zod';
import type { Request } from 'express';
import { formatZodIssues } from '../../shared/validation/validator';
import type { OutputSchema } from '../../shared/validation/types';
import { ApiError } from '../middleware/errorHandler';

const Identifier = z.string().trim().min(1);

export const ImproveRequestSchema = z.object({
  resume_id: Identifier,
  job_id: Identifier,
});

export const ImproveQuerySchema = z.object({
  stream: z.enum(['true', 'false']).optional(),
});

export const ResumeUploadSchema = z.object({
  content: z.string().trim().min(1, 'Resume content is empty'),
});

export const JobUploadSchema = z.object({
  resume_id: Identifier,
  job_descriptions: z.array(z.string().trim().min(1, 'Job description is empty')).min(1),
});

export const JobQuerySchema = z.object({
  job_id: Identifier,
});

export const ReadinessQuerySchema = z.object({
  resume_id: Identifier,
  job_id: Identifier,
});

/**
 * Parse a request part or throw a 400 ApiError listing the bad fields
 */
export function parseRequest<T>(schema: OutputSchema<T>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ApiError(400, 'Invalid request', 'VALIDATION_ERROR', formatZodIssues(result.error));
  }
  return result.data;
}

export function requestIdOf(req: Request): string | undefined {
  return typeof req.id === 'string' ? req.id : undefined;
}
