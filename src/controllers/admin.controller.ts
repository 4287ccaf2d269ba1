/**
 * =============================================================================
 * ADMIN CONTROLLER: Administrative & Diagnostic REST API
 * =============================================================================
 *
 * ENDPOINTS:
 *   GET /admin/status → configuration, stressor lookup, current run and metrics
 *   GET /admin/events → recent event log entries (limit and run_id parameters)
 *
 * @module controllers/admin
 */

import { Router, Request, Response, NextFunction } from 'express';
import { RunTrackerService } from '../services/run-tracker.service';
import { EventLogService } from '../services/event-log.service';
import { HealthService } from '../services/health.service';
import { LoadTestService } from '../services/load-test.service';
import { config, APP_VERSION } from '../config';
import { validateOptionalInteger, validateUuid } from '../middleware/validation';
import { toStatusResponse } from './run-response';
import { currentMetricsResponse } from './metrics.controller';

/**
 * Express router for admin endpoints.
 */
export const adminRouter = Router();

/**
 * GET /admin/status
 *
 * @route GET /admin/status
 */
adminRouter.get('/status', (_req: Request, res: Response) => {
  const probe = HealthService.getLastProbe();

  res.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    uptime: Math.round(process.uptime() * 100) / 100,
    version: APP_VERSION,
    config: {
      port: config.port,
      host: config.host,
      stressorCommand: config.stressorCommand,
      stressorExtraArgs: config.stressorExtraArgs,
      maxTestDurationSeconds: config.maxTestDurationSeconds,
      maxWorkers: config.maxWorkers,
      maxMemorySizeMb: config.maxMemorySizeMb,
      stopGraceMs: config.stopGraceMs,
      outputMaxBytes: config.outputMaxBytes,
      metricsIntervalMs: config.metricsIntervalMs,
      eventLogMaxEntries: config.eventLogMaxEntries,
    },
    stressor: probe
      ? {
          command: probe.command,
          available: probe.available,
          path: probe.resolvedPath,
          reason: probe.reason,
          checked_at: probe.checkedAt.toISOString(),
        }
      : null,
    active_pid: LoadTestService.getActivePid(),
    run: toStatusResponse(RunTrackerService.currentStatus()),
    metrics: currentMetricsResponse(),
  });
});

/**
 * GET /admin/events
 *
 * @route GET /admin/events
 * @query {number} limit - Maximum number of events to return (default: 50, max: 100)
 * @query {string} run_id - Only events of this run (UUID)
 */
adminRouter.get('/events', (req: Request, res: Response, next: NextFunction) => {
  try {
    const limit = validateOptionalInteger(req.query.limit, 'limit', 1, 100, 50);
    const runId = req.query.run_id === undefined ? null : validateUuid(req.query.run_id, 'run_id');
    const matching = runId ? EventLogService.getEntriesForRun(runId).reverse() : null;
    const events = matching ? matching.slice(0, limit) : EventLogService.getRecentEntries(limit);

    res.json({
      events: events.map((event) => ({
        id: event.id,
        timestamp: event.timestamp.toISOString(),
        level: event.level,
        event: event.event,
        message: event.message,
        runId: event.runId,
        details: event.details,
      })),
      count: events.length,
      total: matching ? matching.length : EventLogService.getCount(),
    });
  } catch (error) {
    next(error);
  }
});
