/**
 * Logger Configuration
 *
 * Configures pino logger with environment-aware formatting:
 * - Production: JSON output for log aggregation
 * - Development: Pretty-printed colorized output for readability
 * - Test: JSON, normally silenced through LOG_LEVEL=silent
 *
 * Usage:
 *   import { logger } from '../shared/logging/logger';
 *   logger.info({ resumeId }, 'Improvement started');
 *   logger.error({ err: serializeError(err) }, 'Improvement failed');
 */

import pino, { Logger, LoggerOptions } from 'pino';

// =============================================================================
// Configuration
// =============================================================================

const NODE_ENV = process.env.NODE_ENV || 'development';
const IS_DEVELOPMENT = NODE_ENV === 'development';
const LOG_LEVEL = process.env.LOG_LEVEL || (IS_DEVELOPMENT ? 'debug' : 'info');

/**
 * Base logger options shared across environments
 */
const baseOptions: LoggerOptions = {
  level: LOG_LEVEL,
  base: {
    pid: process.pid,
    env: NODE_ENV,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  // Redact sensitive fields from logs
  redact: {
    paths: [
      'req.headers.authorization',
      'req.headers.cookie',
      'res.headers["set-cookie"]',
      'apiKey',
      'token',
      'secret',
      '*.apiKey',
      '*.token',
      '*.secret',
    ],
    remove: true,
  },
};

/**
 * Development-specific options with pretty printing
 */
const developmentOptions: LoggerOptions = {
  ...baseOptions,
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:HH:MM:ss.l',
      ignore: 'pid,hostname,env',
      messageFormat: '{msg}',
      singleLine: false,
    },
  },
};

/**
 * Production options - JSON output for log aggregation
 */
const productionOptions: LoggerOptions = {
  ...baseOptions,
  formatters: {
    level: (label) => ({ level: label }),
    bindings: (bindings) => ({
      pid: bindings.pid,
      host: bindings.hostname,
      env: NODE_ENV,
    }),
  },
};

// =============================================================================
// Logger Instance
// =============================================================================

export const logger: Logger = pino(IS_DEVELOPMENT ? developmentOptions : productionOptions);

// =============================================================================
// Child Logger Factories
// =============================================================================

/**
 * Create a child logger for a specific component/module
 *
 * @example
 * const log = createComponentLogger('improvement');
 * log.info({ attempt }, 'Attempt did not improve score');
 */
export function createComponentLogger(component: string): Logger {
  return logger.child({ component });
}

/**
 * Create a child logger with request context
 */
export function createRequestLogger(requestId: string): Logger {
  return logger.child({ requestId });
}

/**
 * Pre-configured loggers for common components
 */
export const loggers = {
  /** HTTP request/response logging */
  http: createComponentLogger('http'),
  /** Database operations */
  db: createComponentLogger('db'),
  /** LLM and embedding calls */
  llm: createComponentLogger('llm'),
  /** Scoring and improvement loop */
  improvement: createComponentLogger('improvement'),
  /** Structured extraction of uploaded documents */
  ingestion: createComponentLogger('ingestion'),
};

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Serialize an error for structured logging
 * Extracts useful properties from Error objects
 */
export function serializeError(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    const extras: Record<string, unknown> = {};
    for (const key of Object.getOwnPropertyNames(err)) {
      if (!['name', 'message', 'stack'].includes(key)) {
        extras[key] = Reflect.get(err, key);
      }
    }
    return {
      type: err.constructor.name,
      message: err.message,
      stack: IS_DEVELOPMENT ? err.stack : undefined,
      ...extras,
    };
  }
  return { message: String(err) };
}

/**
 * Log a fatal error and optionally exit
 * Use for unrecoverable errors during startup
 */
export function logFatal(err: unknown, message: string, exitCode = 1): void {
  logger.fatal({ err: serializeError(err) }, message);
  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}

export default logger;
