/**
 * Express application setup for the coverage planner.
 *
 * This module:
 * - Creates and configures the Express 5 app instance.
 * - Registers global middleware (correlation id, timing, JSON parsing).
 * - Exposes a healthcheck endpoint for monitoring.
 * - Mounts the coverage routes and the standard 404 / error handlers.
 *
 * Dependencies are injected so tests never touch the real database;
 * server.ts passes the ones built by the composition root.
 */
import express, { Application, Request, Response } from 'express';

import { correlationIdMiddleware } from './http/middleware/correlationId';
import { requestTimingMiddleware } from './http/middleware/requestTiming';
import { errorHandler } from './http/middleware/errorHandler';
import { notFound } from './http/middleware/notFound';
import { createCoverageRoutes, type CoveragePlannerPort } from './http/routes/coverageRoutes';
import { config } from './shared/config/Config';

export type AppDeps = {
  coveragePlanner: CoveragePlannerPort;
};

const unconfiguredPlanner: CoveragePlannerPort = {
  planCoverage: async () => Promise.reject(new Error('Coverage planner is not configured')),
  getTrajectory: async () => Promise.reject(new Error('Coverage planner is not configured')),
};

export function createApp(deps: Partial<AppDeps> = {}): Application {
  const app = express();

  app.use(correlationIdMiddleware);
  app.use(requestTimingMiddleware);
  app.use(express.json());

  // Basic healthcheck endpoint used by monitors
  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'ok',
      service: config.serviceName,
      timestamp: new Date().toISOString(),
    });
  });

  app.use(createCoverageRoutes(deps.coveragePlanner ?? unconfiguredPlanner));

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
