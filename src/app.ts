import express from 'express';
import cors from 'cors';
import type { Express, Request, Response, NextFunction } from 'express';
import { createApiRouter, type ApiDependencies } from './api/index.js';
import { createErrorHandler, notFoundHandler } from './api/errorHandler.js';
import type { CachedReader } from './infra/CachedReader.js';
import type { Env } from './infra/env.js';
import { logger } from './infra/logger.js';
import { describeError } from './domain/errors.js';

export interface AppDependencies extends ApiDependencies {
  reader: CachedReader;
  dataTable: string;
  env: Pick<Env, 'NODE_ENV'>;
}

/**
 * Builds the Express application without binding a port
 */
export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '100kb' }));

  // Request logging middleware
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.info('Incoming request', {
      method: req.method,
      path: req.path,
      ip: req.ip,
    });
    next();
  });

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Readiness endpoint: the data table must be readable
  app.get('/ready', async (_req: Request, res: Response) => {
    try {
      await deps.reader.read(deps.dataTable);
      res.json({ status: 'ready' });
    } catch (error) {
      logger.warn('Readiness check failed', { error: describeError(error) });
      res.status(503).json({ status: 'not-ready' });
    }
  });

  app.use('/api', createApiRouter(deps));

  app.use(notFoundHandler);
  app.use(createErrorHandler(deps.env));

  return app;
}
