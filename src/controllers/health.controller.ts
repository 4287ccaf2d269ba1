/**
 * =============================================================================
 * HEALTH CONTROLLER: Liveness & Readiness Probes
 * =============================================================================
 *
 * ENDPOINTS:
 *   GET /health       → liveness with uptime and version
 *   GET /health/live  → bare liveness for the kubelet livenessProbe
 *   GET /health/ready → readiness: 503 while the stressor executable is
 *                       missing, 200 otherwise (also while a test runs)
 *
 * @module controllers/health
 */

import { Router, Request, Response } from 'express';
import { APP_VERSION } from '../config';
import { HealthResponse } from '../types';
import { HealthService } from '../services/health.service';

/**
 * Express router for health endpoints.
 */
export const healthRouter = Router();

/**
 * GET /health
 *
 * @route GET /health
 * @returns {HealthResponse} Service health status
 */
healthRouter.get('/', (_req: Request, res: Response) => {
  const response: HealthResponse = {
    status: HealthService.liveness().status,
    timestamp: new Date().toISOString(),
    uptime: Math.round(process.uptime() * 100) / 100,
    version: APP_VERSION,
  };

  res.json(response);
});

/**
 * GET /health/live
 *
 * @route GET /health/live
 */
healthRouter.get('/live', (_req: Request, res: Response) => {
  res.json(HealthService.liveness());
});

/**
 * GET /health/ready
 *
 * @route GET /health/ready
 */
healthRouter.get('/ready', (_req: Request, res: Response) => {
  const readiness = HealthService.readiness();
  const probe = HealthService.getLastProbe();
  const stressor = probe
    ? { command: probe.command, available: probe.available, path: probe.resolvedPath }
    : null;

  if (!readiness.ready) {
    res.status(503).json({ status: 'not_ready', reason: readiness.reason, stressor });
    return;
  }

  res.json({ status: 'ready', stressor });
});
