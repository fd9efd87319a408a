/**
 * Error handling middleware - provides centralized error handling for the API.
 * Catches errors from route handlers, formats error responses,
 * and handles structured logging of server-side errors.
 */

import { Request, Response, NextFunction } from 'express';
import { loggers, serializeError } from '../../shared/logging/logger';
import { ImprovementError, ImprovementErrorCode } from '../../improvement/errors/types';

/**
 * Custom error class for API errors with status codes
 */
export class ApiError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code?: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

/**
 * HTTP status for each engine error code
 */
export const STATUS_BY_CODE: Record<ImprovementErrorCode, number> = {
  [ImprovementErrorCode.RESOURCE_NOT_FOUND]: 404,
  [ImprovementErrorCode.NOT_PARSED]: 422,
  [ImprovementErrorCode.KEYWORD_EXTRACTION_MISSING]: 422,
  [ImprovementErrorCode.EXTERNAL_CAPABILITY_FAILURE]: 502,
  [ImprovementErrorCode.SCHEMA_VALIDATION_FAILED]: 502,
  [ImprovementErrorCode.STRUCTURED_EXTRACTION_FAILED]: 422,
  [ImprovementErrorCode.IMPROVEMENT_IN_PROGRESS]: 409,
  [ImprovementErrorCode.CONFIGURATION_ERROR]: 500,
};

function statusOf(err: Error): number {
  if (err instanceof ApiError) return err.statusCode;
  if (err instanceof ImprovementError) return STATUS_BY_CODE[err.code];
  return 500;
}

/**
 * Centralized error handler middleware
 * Logs errors with full context and returns appropriate responses
 */
export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  const statusCode = statusOf(err);
  const isServerError = statusCode >= 500;
  const requestId = typeof req.id === 'string' ? req.id : undefined;

  const errorContext = {
    err: serializeError(err),
    requestId,
    method: req.method,
    path: req.path,
    statusCode,
    ...(err instanceof ImprovementError && { errorCode: err.code }),
    ...(err instanceof ApiError && err.code && { errorCode: err.code }),
  };

  if (isServerError) {
    loggers.http.error(errorContext, `Request failed: ${err.message}`);
  } else {
    loggers.http.warn(errorContext, `Client error: ${err.message}`);
  }

  if (err instanceof ImprovementError) {
    res.status(statusCode).json(err.toErrorResponse(requestId));
    return;
  }

  const response: Record<string, unknown> = {
    error: isServerError ? 'Internal Server Error' : err.message,
  };

  if (err instanceof ApiError) {
    if (err.code) {
      response.code = err.code;
    }
    if (err.details !== undefined) {
      response.details = err.details;
    }
  }

  res.status(statusCode).json(response);
};

/**
 * Async handler wrapper to catch errors in async route handlers
 * Forwards errors to the error handling middleware
 */
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) => {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
