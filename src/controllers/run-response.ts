/**
 * Run Response Mapping
 *
 * Maps run records onto the snake_case JSON shape served by /status,
 * /stress and /admin/status.
 *
 * @module controllers/run-response
 */

import { LoadTestRequest, LoadTestRun, RunStatus } from '../types';

/**
 * Wire form of a load test request.
 */
export interface LoadTestRequestBody {
  cpu_workers: number;
  memory_workers: number;
  duration: number;
  memory_size: string;
}

/**
 * Wire form of a run.
 */
export interface RunResponse {
  state: LoadTestRun['state'];
  run_id: string;
  request: LoadTestRequestBody;
  command: string;
  started_at: string;
  stop_requested: boolean;
  finished_at?: string;
  exit_code?: number | null;
  signal?: string | null;
  reason?: string | null;
  output?: string;
}

/**
 * Maps a validated request back onto the field names the caller used.
 */
export function toRequestBody(request: LoadTestRequest): LoadTestRequestBody {
  return {
    cpu_workers: request.cpuWorkers,
    memory_workers: request.memoryWorkers,
    duration: request.durationSeconds,
    memory_size: request.memorySize,
  };
}

/**
 * Maps a run. Exit details are only present once the run has finished.
 */
export function toRunResponse(run: LoadTestRun): RunResponse {
  const response: RunResponse = {
    state: run.state,
    run_id: run.id,
    request: toRequestBody(run.request),
    command: run.command.join(' '),
    started_at: run.startedAt.toISOString(),
    stop_requested: run.stopRequested,
  };

  if (run.finishedAt) {
    response.finished_at = run.finishedAt.toISOString();
    response.exit_code = run.exitCode;
    response.signal = run.signal;
    response.reason = run.reason;
    response.output = run.output;
  }

  return response;
}

/**
 * Maps the tracker status: the run, or `{ state: "idle" }`.
 */
export function toStatusResponse(status: RunStatus): RunResponse | { state: 'idle' } {
  return status.state === 'idle' ? { state: 'idle' } : toRunResponse(status);
}
