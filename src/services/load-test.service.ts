/**
 * =============================================================================
 * LOAD TEST SERVICE: Stressor Invocation & Run Lifecycle
 * =============================================================================
 *
 * PURPOSE:
 *   Turns a validated LoadTestRequest into one invocation of the external
 *   stressor (stress-ng by default), records the run in RunTrackerService
 *   and watches the process until it exits.
 *
 * HOW IT WORKS:
 *   1. Reject with ConflictError while a run is running or a start is in
 *      flight. Overlapping runs would fight over the same host resources,
 *      and replacing a run would orphan its process.
 *   2. Build the argument vector from the request (buildStressorArgs).
 *   3. Spawn the stressor and wait only until the OS reports it started:
 *        - spawn error → run recorded as failed, SpawnError thrown (HTTP 500)
 *        - spawned     → run recorded as running, start resolves (HTTP 202)
 *   4. The exit hook (one per run) reports exit code, signal and output;
 *      the tracker turns that into completed / failed / stopped.
 *
 * STOPPING:
 *   stopTest() flags the run and sends SIGTERM. If the process is still alive
 *   after stopGraceMs it gets SIGKILL. The state only changes when the exit
 *   hook fires, so /status never reports a stopped run whose process lives.
 *
 * The stressor's own --timeout bounds every run; there is no extra timer.
 *
 * @module services/load-test
 */

import { LoadTestRequest, LoadTestRun, ProcessExit } from '../types';
import { config } from '../config';
import { formatByteSize, generateId } from '../utils';
import { ConflictError, NotFoundError, SpawnError } from '../middleware/error-handler';
import { RunTrackerService, RunTrackerServiceClass } from './run-tracker.service';
import { EventLogService, EventLogServiceClass } from './event-log.service';
import { StressorHandle, StressorSpawner, createStressorSpawner } from './stressor-process';

/** Characters of output included in a failure event. */
const FAILURE_OUTPUT_EXCERPT = 500;

/**
 * Builds the stressor arguments for a request.
 *
 * ARGUMENTS (stress-ng):
 *   --cpu N                    only when cpuWorkers > 0 (stress-ng reads 0 as "one per CPU")
 *   --vm N --vm-bytes SIZE     only when memoryWorkers > 0; SIZE is the parsed byte
 *                              count in a form stress-ng reads ("64MiB" → "64M")
 *   --timeout {duration}s      always
 *   ...extraArgs               appended as configured
 *
 * @param request - Validated load test request
 * @param extraArgs - Arguments appended to every invocation
 * @returns Argument vector (without the command)
 */
export function buildStressorArgs(request: LoadTestRequest, extraArgs: string[] = []): string[] {
  const args: string[] = [];

  if (request.cpuWorkers > 0) {
    args.push('--cpu', String(request.cpuWorkers));
  }

  if (request.memoryWorkers > 0) {
    args.push('--vm', String(request.memoryWorkers), '--vm-bytes', formatByteSize(request.memoryBytes));
  }

  args.push('--timeout', `${request.durationSeconds}s`);

  return [...args, ...extraArgs];
}

/**
 * One-line summary of a request for log messages.
 */
export function describeRequest(request: LoadTestRequest): string {
  const parts: string[] = [];
  if (request.cpuWorkers > 0) {
    parts.push(`${request.cpuWorkers} CPU worker(s)`);
  }
  if (request.memoryWorkers > 0) {
    parts.push(`${request.memoryWorkers} VM worker(s) x ${request.memorySize}`);
  }
  return `${parts.join(', ')} for ${request.durationSeconds}s`;
}

/**
 * Construction options for LoadTestServiceClass.
 */
export interface LoadTestServiceOptions {
  /** Stressor executable */
  command: string;
  /** Arguments appended to every invocation */
  extraArgs: string[];
  /** SIGTERM → SIGKILL escalation delay */
  stopGraceMs: number;
  /** Launches the stressor */
  spawner: StressorSpawner;
  /** Where runs are recorded */
  tracker: RunTrackerServiceClass;
  /** Where lifecycle events are logged */
  events: EventLogServiceClass;
}

/**
 * Load Test Service
 *
 * PROCESS MANAGEMENT:
 * - handle:       the running stressor (null when nothing runs)
 * - activeRunId:  run the handle belongs to
 * - pendingRunId: run whose spawn is in flight
 * - killTimer:    SIGKILL escalation after a stop request
 */
export class LoadTestServiceClass {
  private readonly command: string;
  private readonly extraArgs: string[];
  private readonly stopGraceMs: number;
  private readonly tracker: RunTrackerServiceClass;
  private readonly events: EventLogServiceClass;
  private spawner: StressorSpawner;

  private handle: StressorHandle | null = null;
  private activeRunId: string | null = null;
  private pendingRunId: string | null = null;
  private earlyExit: ProcessExit | null = null;
  private killTimer: NodeJS.Timeout | null = null;

  constructor(options: LoadTestServiceOptions) {
    this.command = options.command;
    this.extraArgs = [...options.extraArgs];
    this.stopGraceMs = options.stopGraceMs;
    this.spawner = options.spawner;
    this.tracker = options.tracker;
    this.events = options.events;
  }

  /**
   * Replaces the spawner (e.g., with an in-process fake in tests).
   */
  setSpawner(spawner: StressorSpawner): void {
    this.spawner = spawner;
  }

  /**
   * The configured stressor executable.
   */
  getCommand(): string {
    return this.command;
  }

  /**
   * PID of the running stressor, if any.
   */
  getActivePid(): number | null {
    return this.handle?.pid ?? null;
  }

  /**
   * Whether a run is running or being started.
   */
  isBusy(): boolean {
    return this.pendingRunId !== null || this.tracker.isRunning();
  }

  /**
   * Starts a load test.
   *
   * Resolves as soon as the stressor process is running; it does not wait
   * for the run to finish.
   *
   * @param request - Validated load test request
   * @returns Snapshot of the running run
   * @throws ConflictError if a run is running or starting
   * @throws SpawnError if the stressor could not be launched
   */
  async startTest(request: LoadTestRequest): Promise<LoadTestRun> {
    if (this.isBusy()) {
      const busyId = this.pendingRunId ?? this.activeRunId;
      this.events.warn('TEST_REJECTED', 'Load test rejected: another test is already running', {
        runId: busyId ?? undefined,
        details: { requested: describeRequest(request) },
      });
      throw new ConflictError('A load test is already running', busyId ? { run_id: busyId } : undefined);
    }

    const id = generateId();
    const args = buildStressorArgs(request, this.extraArgs);
    const commandLine = [this.command, ...args];
    const startedAt = new Date();

    this.pendingRunId = id;
    this.earlyExit = null;

    let handle: StressorHandle;
    try {
      handle = await this.spawner(this.command, args, {
        onExit: (exit) => this.handleExit(id, exit),
      });
    } catch (err) {
      this.pendingRunId = null;
      const message = err instanceof Error ? err.message : String(err);
      this.tracker.recordSpawnFailure(id, request, commandLine, `spawn error: ${message}`, startedAt);
      this.events.error('TEST_FAILED', `Stressor could not be started: ${message}`, {
        runId: id,
        details: { command: commandLine.join(' ') },
      });
      throw new SpawnError(`Failed to start ${this.command}: ${message}`, {
        run_id: id,
        command: this.command,
      });
    }

    this.pendingRunId = null;
    this.handle = handle;
    this.activeRunId = id;

    const run = this.tracker.begin(id, request, commandLine, startedAt);

    this.events.info('TEST_STARTED', `Load test started: ${describeRequest(request)}`, {
      runId: id,
      details: { pid: handle.pid ?? null, command: commandLine.join(' ') },
    });

    // The process may have exited before the start was recorded
    const early = this.earlyExit;
    if (early) {
      this.earlyExit = null;
      this.handleExit(id, early);
    }

    return run;
  }

  /**
   * Stops a running load test.
   *
   * Sends SIGTERM now and SIGKILL after the grace period. The run keeps the
   * running state until its process exits. Stopping a run that is already
   * stopping sends nothing and leaves the SIGKILL deadline as it was.
   *
   * @param id - Run ID
   * @returns Snapshot of the run (still running, with stopRequested set)
   * @throws NotFoundError if no running run has this ID
   */
  stopTest(id: string): LoadTestRun {
    const handle = this.handle;
    if (!handle || this.activeRunId !== id) {
      throw new NotFoundError('No running load test with that ID');
    }

    // Already stopping: keep the original SIGKILL deadline
    if (this.killTimer) {
      const stopping = this.tracker.getRun(id);
      if (stopping) {
        return stopping;
      }
    }

    const run = this.tracker.markStopRequested(id);
    if (!run) {
      throw new NotFoundError('No running load test with that ID');
    }

    this.events.info('TEST_STOPPING', `Sending SIGTERM to stressor (pid ${handle.pid ?? '?'})`, {
      runId: id,
    });
    handle.kill('SIGTERM');

    this.killTimer = setTimeout(() => {
      this.killTimer = null;
      if (this.activeRunId === id && this.handle) {
        this.events.warn('TEST_STOPPING', `Stressor ignored SIGTERM for ${this.stopGraceMs}ms, sending SIGKILL`, {
          runId: id,
        });
        this.handle.kill('SIGKILL');
      }
    }, this.stopGraceMs);
    this.killTimer.unref();

    return run;
  }

  /**
   * Stops whatever is running.
   *
   * @returns The run that was signalled, or undefined if nothing was running
   */
  stopActive(): LoadTestRun | undefined {
    if (!this.activeRunId) {
      return undefined;
    }
    return this.stopTest(this.activeRunId);
  }

  /**
   * Forgets the current process and timers without signalling anything.
   *
   * Useful for testing.
   */
  clear(): void {
    if (this.killTimer) {
      clearTimeout(this.killTimer);
      this.killTimer = null;
    }
    this.handle = null;
    this.activeRunId = null;
    this.pendingRunId = null;
    this.earlyExit = null;
  }

  /**
   * Process watcher callback: records the exit and logs the outcome.
   */
  private handleExit(id: string, exit: ProcessExit): void {
    if (this.pendingRunId === id) {
      this.earlyExit = exit;
      return;
    }

    if (this.activeRunId === id) {
      this.handle = null;
      this.activeRunId = null;
      if (this.killTimer) {
        clearTimeout(this.killTimer);
        this.killTimer = null;
      }
    }

    const run = this.tracker.finish(id, exit);
    if (!run) {
      return;
    }

    const details = { exitCode: exit.code, signal: exit.signal };
    if (run.state === 'completed') {
      this.events.info('TEST_COMPLETED', `Load test completed: ${describeRequest(run.request)}`, {
        runId: id,
        details,
      });
    } else if (run.state === 'stopped') {
      this.events.info('TEST_STOPPED', `Load test stopped (${run.reason ?? 'on request'})`, {
        runId: id,
        details,
      });
    } else {
      this.events.error('TEST_FAILED', `Load test failed: ${run.reason ?? 'unknown reason'}`, {
        runId: id,
        details: { ...details, output: exit.output.slice(-FAILURE_OUTPUT_EXCERPT) },
      });
    }
  }
}

/**
 * Singleton instance of the LoadTestService, wired to the stressor from config.
 */
export const LoadTestService = new LoadTestServiceClass({
  command: config.stressorCommand,
  extraArgs: config.stressorExtraArgs,
  stopGraceMs: config.stopGraceMs,
  spawner: createStressorSpawner(config.outputMaxBytes),
  tracker: RunTrackerService,
  events: EventLogService,
});
