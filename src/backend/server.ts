/**
 * Express server setup - main entry point for the backend API server.
 * Configures Express middleware, mounts routes, and starts the HTTP server.
 */

import express, { Application } from 'express';
import cors from 'cors';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { logger, logFatal } from '../shared/logging/logger';
import { getConfig } from './config';
import { errorHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { createApiRouter } from './routes';
import { createServices } from './services';
import type { AppServices } from './services';

export interface AppOptions {
  /** Allowed browser origins; any localhost origin is always allowed */
  corsOrigins?: string[];
}

export function createApp(services: AppServices, options: AppOptions = {}): Application {
  const app = express();
  const allowedOrigins = options.corsOrigins ?? [];

  const corsOptions: cors.CorsOptions = {
    origin: (origin, callback) => {
      // Allow requests with no origin (like curl)
      if (!origin) {
        return callback(null, true);
      }
      if (allowedOrigins.includes(origin) || /^https?:\/\/localhost(:\d+)?$/.test(origin)) {
        return callback(null, true);
      }
      callback(new Error('Not allowed by CORS'));
    },
    credentials: true,
  };

  app.use(requestLogger);
  app.use(cors(corsOptions));
  app.use(express.json({ limit: '1mb' }));

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/api/v1', createApiRouter(services));

  app.use(errorHandler);

  return app;
}

export const start = (): void => {
  const config = getConfig();
  if (config.database.path !== ':memory:') {
    mkdirSync(dirname(config.database.path), { recursive: true });
  }

  const services = createServices(config);
  const app = createApp(services, { corsOrigins: config.server.corsOrigins });

  const server = app.listen(config.server.port, () => {
    logger.info({ port: config.server.port, env: config.server.nodeEnv }, 'Server listening');
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    server.close(() => {
      services.close();
      process.exit(0);
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
};

// Start server when run directly
if (require.main === module) {
  try {
    start();
  } catch (error) {
    logFatal(error, 'Server failed to start');
  }
}
