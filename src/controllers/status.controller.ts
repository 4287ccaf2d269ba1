/**
 * Status Controller
 *
 *   GET    /status → the current (most recent) run, or `{ state: "idle" }`
 *   DELETE /status → discard a finished run and return to idle
 *
 * @module controllers/status
 */

import { Router, Request, Response, NextFunction } from 'express';
import { RunTrackerService } from '../services/run-tracker.service';
import { EventLogService } from '../services/event-log.service';
import { toStatusResponse } from './run-response';

/**
 * Express router for run status endpoints.
 */
export const statusRouter = Router();

/**
 * GET /status
 *
 * @route GET /status
 */
statusRouter.get('/', (_req: Request, res: Response) => {
  res.json(toStatusResponse(RunTrackerService.currentStatus()));
});

/**
 * DELETE /status
 *
 * @route DELETE /status
 * @returns 409 while a run is running
 */
statusRouter.delete('/', (_req: Request, res: Response, next: NextFunction) => {
  try {
    const status = RunTrackerService.reset();
    EventLogService.info('STATUS_RESET', 'Run status reset to idle');
    res.json(toStatusResponse(status));
  } catch (error) {
    next(error);
  }
});
