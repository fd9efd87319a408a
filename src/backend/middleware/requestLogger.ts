/**
 * Request Logging Middleware
 *
 * Logs HTTP requests with method, path, duration, and status code.
 * Uses pino-http for automatic request/response logging with timing.
 */

import pinoHttp from 'pino-http';
import { randomUUID } from 'crypto';
import type { IncomingMessage, ServerResponse } from 'http';
import { loggers } from '../../shared/logging/logger';

/**
 * Generate a unique request ID for tracing
 */
function genReqId(req: IncomingMessage): string {
  // Use existing request ID header if present (from load balancer/proxy)
  const existingId = req.headers['x-request-id'] || req.headers['x-correlation-id'];
  if (typeof existingId === 'string') {
    return existingId;
  }
  return randomUUID();
}

const serializers = {
  req(req: IncomingMessage & { id?: unknown }) {
    return {
      id: req.id,
      method: req.method,
      url: req.url,
      headers: {
        host: req.headers.host,
        'user-agent': req.headers['user-agent'],
        'content-type': req.headers['content-type'],
        'content-length': req.headers['content-length'],
      },
    };
  },
  res(res: ServerResponse) {
    return {
      statusCode: res.statusCode,
    };
  },
};

/**
 * Determine log level based on status code
 */
function customLogLevel(req: IncomingMessage, res: ServerResponse, err?: Error) {
  if (err || res.statusCode >= 500) {
    return 'error' as const;
  }
  if (res.statusCode >= 400) {
    return 'warn' as const;
  }
  // Health checks are too noisy for info
  if (req.url === '/api/health') {
    return 'debug' as const;
  }
  return 'info' as const;
}

function customSuccessMessage(req: IncomingMessage, res: ServerResponse, responseTime: number): string {
  return `${req.method} ${req.url} ${res.statusCode} ${responseTime.toFixed(0)}ms`;
}

function customErrorMessage(req: IncomingMessage, res: ServerResponse, err: Error): string {
  return `${req.method} ${req.url} ${res.statusCode} - ${err.message}`;
}

/**
 * Request logging middleware
 * Automatically logs all HTTP requests with timing and status
 */
export const requestLogger = pinoHttp({
  logger: loggers.http,
  genReqId,
  serializers,
  customLogLevel,
  customSuccessMessage,
  customErrorMessage,
  customAttributeKeys: {
    req: 'req',
    res: 'res',
    err: 'err',
    responseTime: 'responseTime',
    reqId: 'requestId',
  },
});

export default requestLogger;
