/**
 * =============================================================================
 * METRICS CONTROLLER: Host & Application Metrics
 * =============================================================================
 *
 * ENDPOINTS:
 *   GET /metrics → host metrics snapshot plus the service's own counters.
 *                  Always 200: unavailable OS sources read as zero and are
 *                  listed under `unavailable`.
 *
 * NOTE: The same snapshot is pushed to Socket.IO clients every
 *       METRICS_INTERVAL_MS (see index.ts).
 *
 * @module controllers/metrics
 */

import { Router, Request, Response } from 'express';
import { MetricsService } from '../services/metrics.service';
import { RunTrackerService } from '../services/run-tracker.service';
import { ApplicationMetrics, SystemMetrics } from '../types';

/**
 * Express router for metrics endpoints.
 */
export const metricsRouter = Router();

/**
 * Maps a metrics snapshot onto the snake_case wire format.
 */
export function toMetricsResponse(system: SystemMetrics, application: ApplicationMetrics): Record<string, unknown> {
  return {
    cpu_percent: system.cpuPercent,
    cpu_count: system.cpuCount,
    memory_used_bytes: system.memoryUsedBytes,
    memory_total_bytes: system.memoryTotalBytes,
    memory_available_bytes: system.memoryAvailableBytes,
    memory_percent: system.memoryPercent,
    memory_limit_source: system.memoryLimitSource,
    load_average: system.loadAverage,
    process_count: system.processCount,
    unavailable: system.unavailable,
    sampled_at: system.sampledAt.toISOString(),
    application: {
      requests_total: application.requestsTotal,
      tests_started: application.testsStarted,
      tests_completed: application.testsCompleted,
      tests_failed: application.testsFailed,
      tests_stopped: application.testsStopped,
      tests_running: application.testsRunning,
      last_test_duration_seconds: application.lastTestDurationSeconds,
      uptime_seconds: application.uptimeSeconds,
      pid: application.pid,
      rss_bytes: application.rssBytes,
    },
  };
}

/**
 * Reads a fresh snapshot in wire format.
 */
export function currentMetricsResponse(): Record<string, unknown> {
  return toMetricsResponse(
    MetricsService.readMetrics(),
    MetricsService.getApplicationMetrics(RunTrackerService.getStats())
  );
}

/**
 * GET /metrics
 *
 * @route GET /metrics
 */
metricsRouter.get('/', (_req: Request, res: Response) => {
  res.json(currentMetricsResponse());
});
