/**
 * Express application for stop-departures-proxy
 *
 * Kept separate from the process entry point so tests can mount the full
 * middleware stack with supertest.
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { createDeparturesRouter } from './api/departures.js';
import { createPingRouter } from './api/ping.js';
import type { DepartureLookup } from './services/departure-service.js';
import type { Logger } from './utils/logger.js';

export interface AppDependencies {
  departureService: DepartureLookup;
  logger: Logger;
  now?: () => Date;
}

export function createApp(deps: AppDependencies): Express {
  const { logger } = deps;
  const app = express();

  // Middleware: Correlation ID
  app.use((req: Request, res: Response, next: NextFunction) => {
    const correlationId = req.get('x-correlation-id') || randomUUID();
    req.correlationId = correlationId;
    res.setHeader('X-Correlation-ID', correlationId);
    next();
  });

  // Middleware: Request logging
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      const duration = Date.now() - start;
      logger.info('HTTP request', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: duration,
        correlation_id: req.correlationId,
      });
    });
    next();
  });

  app.use('/departures', createDeparturesRouter(deps.departureService));
  app.use('/', createPingRouter(deps.now));

  // Error handler (Express recognises it by its four parameters)
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled error', {
      error: err.message,
      stack: err.stack,
      correlation_id: req.correlationId,
    });

    res.status(500).json({
      error: 'Internal server error',
      correlation_id: req.correlationId,
    });
  });

  return app;
}
