/**
 * Stress Controller
 *
 * Starts and stops load test runs.
 *
 *   POST   /stress      → start a run (202), 400 / 409 / 500 on error
 *   DELETE /stress/:id  → stop a running run
 *   POST   /stop        → stop whatever is running
 *
 * @module controllers/stress
 */

import { Router, Request, Response, NextFunction } from 'express';
import { LoadTestService } from '../services/load-test.service';
import { validateLoadTestRequest, validateUuid } from '../middleware/validation';
import { toRequestBody } from './run-response';

/**
 * Express router for load test endpoints.
 */
export const stressRouter = Router();

/**
 * POST /stress
 *
 * Validates the request, launches the stressor and returns without waiting
 * for the run to finish. Accepts JSON or form-encoded bodies.
 *
 * @route POST /stress
 * @body {number} cpu_workers - CPU stressor workers (default 2)
 * @body {number} memory_workers - VM stressor workers (default 1)
 * @body {number} duration - Run duration in seconds (default 30)
 * @body {string} memory_size - Memory per VM worker, e.g. "512M" (default "256M")
 */
stressRouter.post('/stress', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const request = validateLoadTestRequest(req.body);
    const run = await LoadTestService.startTest(request);

    res.status(202).json({
      run_id: run.id,
      state: run.state,
      message: 'Load test started',
      request: toRequestBody(run.request),
      command: run.command.join(' '),
      started_at: run.startedAt.toISOString(),
    });
  } catch (error) {
    next(error);
  }
});

/**
 * DELETE /stress/:id
 *
 * Signals the stressor of a running run. The run reports `stopped` once the
 * process has exited.
 *
 * @route DELETE /stress/:id
 * @param {string} id - Run ID (UUID)
 */
stressRouter.delete('/stress/:id', (req: Request, res: Response, next: NextFunction) => {
  try {
    const id = validateUuid(req.params.id, 'id');
    const run = LoadTestService.stopTest(id);

    res.json({
      run_id: run.id,
      state: run.state,
      stop_requested: run.stopRequested,
      message: 'Stop signal sent',
    });
  } catch (error) {
    next(error);
  }
});

/**
 * POST /stop
 *
 * Stops the running load test, if there is one.
 *
 * @route POST /stop
 */
stressRouter.post('/stop', (_req: Request, res: Response, next: NextFunction) => {
  try {
    const run = LoadTestService.stopActive();

    if (!run) {
      res.json({ stopped: 0, message: 'No load test is running' });
      return;
    }

    res.json({ stopped: 1, run_id: run.id, message: 'Stop signal sent' });
  } catch (error) {
    next(error);
  }
});
