/**
 * =============================================================================
 * RUN TRACKER SERVICE: Single-Slot Run State Machine
 * =============================================================================
 *
 * PURPOSE:
 *   Holds the most recent load test run and owns every transition of its
 *   state. Exactly one run is tracked at a time; a new start replaces a
 *   finished run, never a running one.
 *
 * STATE MACHINE:
 *   idle ──begin()──────────────▶ running
 *   idle ──recordSpawnFailure()─▶ failed          (never passes through running)
 *   running ──finish()──────────▶ completed | failed | stopped
 *   terminal ──begin()──────────▶ running         (slot overwritten)
 *   terminal ──reset()──────────▶ idle
 *
 * SINGLE WRITER:
 *   Only LoadTestService calls the mutating methods: once when a start is
 *   accepted and once from the process watcher when the stressor exits.
 *   Transitions name the run they apply to, so a late exit callback for a
 *   run that has already been replaced is ignored. Readers always receive a
 *   copy, never the live record.
 *
 * STORAGE:
 *   In memory only. All data is lost on process restart.
 *
 * @module services/run-tracker
 */

import { LoadTestRequest, LoadTestRun, ProcessExit, RunStatus } from '../types';
import { ConflictError } from '../middleware/error-handler';

/**
 * Counters over every run observed since the service started.
 */
export interface RunStats {
  started: number;
  completed: number;
  failed: number;
  stopped: number;
  running: number;
  lastDurationSeconds: number;
}

/** Receives a snapshot after each transition. */
export type RunStatusListener = (status: RunStatus) => void;

/**
 * Copies a run so callers cannot mutate the tracked record.
 */
function snapshot(run: LoadTestRun): LoadTestRun {
  return {
    ...run,
    request: { ...run.request },
    command: [...run.command],
    startedAt: new Date(run.startedAt.getTime()),
    finishedAt: run.finishedAt ? new Date(run.finishedAt.getTime()) : null,
  };
}

/**
 * Describes why a run ended, for failed and stopped runs.
 */
export function describeExit(exit: Pick<ProcessExit, 'code' | 'signal'>): string {
  if (exit.signal) {
    return `terminated by ${exit.signal}`;
  }
  return `exited with code ${exit.code ?? 'unknown'}`;
}

/**
 * Service tracking the current (most recent) load test run.
 */
export class RunTrackerServiceClass {
  private current: LoadTestRun | null = null;
  private listener: RunStatusListener | null = null;
  private stats: RunStats = RunTrackerServiceClass.emptyStats();

  private static emptyStats(): RunStats {
    return { started: 0, completed: 0, failed: 0, stopped: 0, running: 0, lastDurationSeconds: 0 };
  }

  /**
   * Registers a listener for state transitions (e.g., Socket.IO broadcast).
   *
   * @param fn - Listener, or null to detach
   */
  setListener(fn: RunStatusListener | null): void {
    this.listener = fn;
  }

  /**
   * Returns the run in the slot, or idle. Never blocks, never mutates.
   */
  currentStatus(): RunStatus {
    return this.current ? snapshot(this.current) : { state: 'idle' };
  }

  /**
   * Returns the tracked run if it has the given ID.
   *
   * @param id - Run ID
   */
  getRun(id: string): LoadTestRun | undefined {
    return this.current && this.current.id === id ? snapshot(this.current) : undefined;
  }

  /**
   * Whether the slot holds a running run.
   */
  isRunning(): boolean {
    return this.current?.state === 'running';
  }

  /**
   * Records a run whose process has started.
   *
   * @param id - Run ID
   * @param request - Validated request
   * @param command - Full argument vector, command first
   * @param startedAt - When the start was accepted
   * @returns Snapshot of the new run
   * @throws ConflictError if a run is still running
   */
  begin(id: string, request: LoadTestRequest, command: string[], startedAt: Date = new Date()): LoadTestRun {
    this.assertNotRunning();

    this.current = {
      id,
      request: { ...request },
      command: [...command],
      state: 'running',
      startedAt,
      finishedAt: null,
      exitCode: null,
      signal: null,
      reason: null,
      output: '',
      stopRequested: false,
    };

    this.stats.started++;
    this.stats.running = 1;
    this.stats.lastDurationSeconds = request.durationSeconds;

    return this.emit(this.current);
  }

  /**
   * Records a run whose process could not be started. It goes straight to
   * failed.
   *
   * @param id - Run ID
   * @param request - Validated request
   * @param command - Full argument vector, command first
   * @param reason - Why the spawn failed
   * @param startedAt - When the attempt was made
   * @returns Snapshot of the failed run
   * @throws ConflictError if a run is still running
   */
  recordSpawnFailure(
    id: string,
    request: LoadTestRequest,
    command: string[],
    reason: string,
    startedAt: Date = new Date()
  ): LoadTestRun {
    this.assertNotRunning();

    const finishedAt = new Date();
    this.current = {
      id,
      request: { ...request },
      command: [...command],
      state: 'failed',
      startedAt,
      finishedAt: finishedAt < startedAt ? startedAt : finishedAt,
      exitCode: null,
      signal: null,
      reason,
      output: '',
      stopRequested: false,
    };

    this.stats.failed++;

    return this.emit(this.current);
  }

  /**
   * Flags the running run as stopping. The state stays running until the
   * process watcher reports the exit.
   *
   * @param id - Run ID
   * @returns Snapshot of the run, or undefined if it is not the running run
   */
  markStopRequested(id: string): LoadTestRun | undefined {
    const run = this.current;
    if (!run || run.id !== id || run.state !== 'running') {
      return undefined;
    }
    run.stopRequested = true;
    return this.emit(run);
  }

  /**
   * Records the exit of a run's process.
   *
   * A run that was asked to stop ends as stopped whatever its exit status;
   * otherwise exit code 0 is completed and anything else is failed.
   *
   * @param id - Run ID
   * @param exit - Exit code, signal and captured output
   * @returns Snapshot of the finished run, or undefined if the run is not
   *          the running run in the slot
   */
  finish(id: string, exit: ProcessExit): LoadTestRun | undefined {
    const run = this.current;
    if (!run || run.id !== id || run.state !== 'running') {
      return undefined;
    }

    const finishedAt = new Date();
    run.finishedAt = finishedAt < run.startedAt ? new Date(run.startedAt.getTime()) : finishedAt;
    run.exitCode = exit.code;
    run.signal = exit.signal;
    run.output = exit.output;

    if (run.stopRequested) {
      run.state = 'stopped';
      run.reason = `stopped on request (${describeExit(exit)})`;
      this.stats.stopped++;
    } else if (exit.code === 0) {
      run.state = 'completed';
      run.reason = null;
      this.stats.completed++;
    } else {
      run.state = 'failed';
      run.reason = describeExit(exit);
      this.stats.failed++;
    }
    this.stats.running = 0;

    return this.emit(run);
  }

  /**
   * Discards a finished run and returns to idle.
   *
   * @throws ConflictError if a run is still running
   */
  reset(): RunStatus {
    this.assertNotRunning();
    this.current = null;
    const idle: RunStatus = { state: 'idle' };
    if (this.listener) {
      this.listener(idle);
    }
    return idle;
  }

  /**
   * Gets the run counters.
   */
  getStats(): RunStats {
    return { ...this.stats };
  }

  /**
   * Drops the tracked run, counters and listener unconditionally.
   *
   * Useful for testing.
   */
  clear(): void {
    this.current = null;
    this.listener = null;
    this.stats = RunTrackerServiceClass.emptyStats();
  }

  private assertNotRunning(): void {
    if (this.current && this.current.state === 'running') {
      throw new ConflictError('A load test is already running', {
        run_id: this.current.id,
        started_at: this.current.startedAt.toISOString(),
      });
    }
  }

  private emit(run: LoadTestRun): LoadTestRun {
    const copy = snapshot(run);
    if (this.listener) {
      this.listener(snapshot(run));
    }
    return copy;
  }
}

/**
 * Singleton instance of the RunTrackerService.
 */
export const RunTrackerService = new RunTrackerServiceClass();
