/**
 * =============================================================================
 * EXPRESS APPLICATION SETUP: HTTP Routing & Middleware Pipeline
 * =============================================================================
 *
 * PURPOSE:
 *   Creates and configures the Express web application with all middleware and
 *   routes. This is the "wiring" layer: middleware → routes → controllers →
 *   services. No business logic lives here.
 *
 * MIDDLEWARE PIPELINE (order matters):
 *   1. Body parsing (JSON + URL-encoded, so the dashboard form can post)
 *   2. Request logging and counting
 *   3. Static file serving (dashboard)
 *   4. Routes
 *   5. 404 handler (unmatched routes)
 *   6. Global error handler (returns JSON)
 *
 * ROUTE STRUCTURE:
 *   GET    /health          → liveness (also /health/live)
 *   GET    /health/ready    → readiness
 *   GET    /status          → current run or idle
 *   DELETE /status          → reset a finished run to idle
 *   GET    /metrics         → host + application metrics
 *   POST   /stress          → start a load test
 *   DELETE /stress/:id      → stop a load test
 *   POST   /stop            → stop whatever is running
 *   GET    /admin/status    → configuration, stressor, run and metrics
 *   GET    /admin/events    → event log entries
 *
 * @module app
 */

import express, { Application, Request, Response } from 'express';
import * as fs from 'fs';
import path from 'path';
import { errorHandler } from './middleware/error-handler';
import { requestLogger } from './middleware/request-logger';
import { healthRouter } from './controllers/health.controller';
import { metricsRouter } from './controllers/metrics.controller';
import { statusRouter } from './controllers/status.controller';
import { stressRouter } from './controllers/stress.controller';
import { adminRouter } from './controllers/admin.controller';

/**
 * Finds the dashboard directory from either src/ (ts-node-dev, Jest) or
 * dist/src/ (compiled).
 */
function resolvePublicDir(): string | null {
  const candidates = [path.join(__dirname, '..', 'public'), path.join(__dirname, '..', '..', 'public')];
  return candidates.find((dir) => fs.existsSync(path.join(dir, 'index.html'))) ?? null;
}

/**
 * Creates and configures the Express application.
 *
 * This factory function pattern allows creating fresh app instances for testing.
 *
 * @returns Configured Express application instance (the HTTP server is created in index.ts)
 */
export function createApp(): Application {
  const app = express();

  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.use(requestLogger);

  const publicDir = resolvePublicDir();
  if (publicDir) {
    app.use(express.static(publicDir));
  }

  app.use('/health', healthRouter);
  app.use('/status', statusRouter);
  app.use('/metrics', metricsRouter);
  app.use('/admin', adminRouter);
  app.use('/', stressRouter); // Handles /stress, /stress/:id and /stop

  // 404 handler for unmatched routes
  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      error: 'Not Found',
      message: 'The requested resource does not exist',
    });
  });

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
