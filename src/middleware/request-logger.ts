/**
 * =============================================================================
 * REQUEST LOGGER MIDDLEWARE
 * =============================================================================
 *
 * PURPOSE:
 *   Logs every HTTP request with method, URL, status code, and response time,
 *   and counts it for the application metrics.
 *
 * FILTERING:
 *   Successful /health probes are counted but not logged; the kubelet hits
 *   them every few seconds. Failed probes are still logged.
 *
 * @module middleware/request-logger
 */

import { Request, Response, NextFunction } from 'express';
import { MetricsService } from '../services/metrics.service';

/**
 * Request logging middleware.
 *
 * @param req - Express request
 * @param res - Express response
 * @param next - Express next function
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();
  const isProbe = req.originalUrl === '/health' || req.originalUrl.startsWith('/health/');

  MetricsService.recordRequest();

  res.on('finish', () => {
    const duration = Date.now() - startTime;
    const isError = res.statusCode >= 400;

    if (isProbe && !isError) {
      return;
    }

    const logMessage = `[${new Date().toISOString()}] ${req.method} ${req.originalUrl} ${res.statusCode} ${duration}ms`;

    if (isError) {
      console.warn(logMessage);
    } else {
      console.log(logMessage);
    }
  });

  next();
}
