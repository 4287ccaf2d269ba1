/**
 * =============================================================================
 * DATA MODEL: Types and Interfaces
 * =============================================================================
 *
 * PURPOSE:
 *   Central type definitions for StressPilot. Every data structure exchanged
 *   between controllers, services, Socket.IO events and the dashboard is
 *   defined here.
 *
 * ARCHITECTURE ROLE:
 *   This is the "contract" layer. Load test requests, run records, metrics
 *   snapshots and event log entries are typed here. Controllers validate
 *   incoming data into these types, services produce data conforming to them,
 *   and the controllers map them onto the snake_case JSON wire format.
 *
 * @module types
 */

// =============================================================================
// ENUMERATIONS
// =============================================================================

/**
 * Lifecycle states for a load test run.
 *
 * State machine: running → completed (stressor exited with code 0)
 *                running → failed    (non-zero exit or fatal signal)
 *                running → stopped   (stop requested, then the process exited)
 *                (none)  → failed    (spawn error, the run never ran)
 *
 * Only a running run owns a live process. Terminal states are immutable.
 */
export type RunState = 'running' | 'completed' | 'failed' | 'stopped';

/**
 * Log severity levels used in the event log ring buffer.
 * Maps to console.log/warn/error and is sent to the dashboard for color-coding.
 */
export type LogLevel = 'info' | 'warn' | 'error';

/**
 * Types of events recorded in the event log.
 */
export type EventType =
  | 'SERVER_STARTED'
  | 'SERVER_STOPPING'
  | 'STRESSOR_AVAILABLE'
  | 'STRESSOR_MISSING'
  | 'TEST_STARTED'
  | 'TEST_COMPLETED'
  | 'TEST_FAILED'
  | 'TEST_STOPPING'
  | 'TEST_STOPPED'
  | 'TEST_REJECTED'
  | 'STATUS_RESET';

// =============================================================================
// LOAD TEST REQUEST & RUN
// =============================================================================

/**
 * A validated request to run the stressor.
 *
 * Produced by validateLoadTestRequest() from the raw request body. At least
 * one of the worker counts is greater than zero, the duration is within the
 * configured ceiling, and the memory size has been parsed into bytes.
 */
export interface LoadTestRequest {
  /** CPU stressor workers (`--cpu N`). Zero omits the CPU stressor. */
  cpuWorkers: number;
  /** Virtual memory stressor workers (`--vm N`). Zero omits the VM stressor. */
  memoryWorkers: number;
  /** Time bound passed to the stressor as `--timeout {n}s`. */
  durationSeconds: number;
  /** Memory per VM worker as given by the caller, e.g. "512M". */
  memorySize: string;
  /** memorySize parsed into bytes. */
  memoryBytes: number;
}

/**
 * One invocation of the stressor, from start request to process exit.
 *
 * Held in the single slot of RunTrackerService. The process handle itself
 * is owned by LoadTestService and never stored here.
 */
export interface LoadTestRun {
  /** Unique identifier (UUID v4). */
  id: string;
  /** The validated request that produced this run. */
  request: LoadTestRequest;
  /** Full argument vector, command first. */
  command: string[];
  /** Current lifecycle state. */
  state: RunState;
  /** When the run was started (for spawn failures, when the attempt was made). */
  startedAt: Date;
  /** When the process exit (or spawn failure) was observed. */
  finishedAt: Date | null;
  /** Process exit code, if it exited normally. */
  exitCode: number | null;
  /** Signal that terminated the process, if any. */
  signal: string | null;
  /** Human-readable failure reason (failed and stopped runs). */
  reason: string | null;
  /** Tail of the combined stdout/stderr of the stressor. */
  output: string;
  /** Whether a stop was requested while the run was active. */
  stopRequested: boolean;
}

/** The state reported before any run, or after a reset. */
export interface IdleStatus {
  state: 'idle';
}

/**
 * What the status tracker reports: the run in the slot, or idle.
 */
export type RunStatus = LoadTestRun | IdleStatus;

/**
 * Outcome reported by the process watcher when the stressor exits.
 */
export interface ProcessExit {
  /** Exit code (null when terminated by a signal). */
  code: number | null;
  /** Terminating signal (null on a normal exit). */
  signal: string | null;
  /** Captured output tail. */
  output: string;
}

// =============================================================================
// SYSTEM METRICS
// =============================================================================

/**
 * Host metrics snapshot.
 *
 * Recomputed on every read, never persisted. Fields whose OS source is
 * unavailable degrade to zero instead of failing the read.
 */
export interface SystemMetrics {
  /** System-wide CPU busy share (0-100) since the previous read. */
  cpuPercent: number;
  /** Number of logical CPUs. */
  cpuCount: number;
  /** Memory in use, in bytes (against the container limit when there is one). */
  memoryUsedBytes: number;
  /** Memory available to this container or host, in bytes. */
  memoryTotalBytes: number;
  /** Memory still available, in bytes. */
  memoryAvailableBytes: number;
  /** memoryUsedBytes as a percentage of memoryTotalBytes. */
  memoryPercent: number;
  /** Where memoryTotalBytes came from (cgroup file, os.totalmem(), unavailable). */
  memoryLimitSource: string;
  /** 1, 5 and 15 minute load averages. */
  loadAverage: [number, number, number];
  /** Number of processes visible in /proc. */
  processCount: number;
  /** OS sources that failed during this read (their fields read as zero). */
  unavailable: string[];
  /** When the snapshot was taken. */
  sampledAt: Date;
}

/**
 * Counters kept by the service itself.
 */
export interface ApplicationMetrics {
  /** HTTP requests handled since start. */
  requestsTotal: number;
  /** Runs that reached the running state. */
  testsStarted: number;
  /** Runs that exited with code 0. */
  testsCompleted: number;
  /** Runs that failed, including spawn failures. */
  testsFailed: number;
  /** Runs that ended after a stop request. */
  testsStopped: number;
  /** Runs currently running (0 or 1). */
  testsRunning: number;
  /** Duration of the most recently started run, in seconds. */
  lastTestDurationSeconds: number;
  /** Service process uptime in seconds. */
  uptimeSeconds: number;
  /** Service process ID. */
  pid: number;
  /** Resident set size of the service process, in bytes. */
  rssBytes: number;
}

// =============================================================================
// HEALTH
// =============================================================================

/**
 * Result of looking up the stressor executable.
 */
export interface StressorProbe {
  /** The configured command. */
  command: string;
  /** Whether an executable file was found. */
  available: boolean;
  /** Resolved path, when found. */
  resolvedPath: string | null;
  /** Why the stressor is unavailable. */
  reason: string | null;
  /** When the lookup ran. */
  checkedAt: Date;
}

/**
 * Readiness verdict.
 */
export type ReadinessResult = { ready: true } | { ready: false; reason: string };

/**
 * Health check response structure (GET /health).
 */
export interface HealthResponse {
  /** Service status */
  status: 'ok';
  /** Response timestamp */
  timestamp: string;
  /** Process uptime in seconds */
  uptime: number;
  /** Application version */
  version: string;
}

// =============================================================================
// EVENT LOG
// =============================================================================

/**
 * An entry in the event log.
 *
 * The event log is a bounded ring buffer (default 100 entries). Each entry is
 * stored, printed to the console and broadcast to Socket.IO clients.
 */
export interface EventLogEntry {
  /** Unique identifier (UUID) */
  id: string;
  /** When the event occurred */
  timestamp: Date;
  /** Severity level */
  level: LogLevel;
  /** Associated run ID (if applicable) */
  runId: string | null;
  /** What happened */
  event: EventType;
  /** Human-readable description */
  message: string;
  /** Additional structured data */
  details: Record<string, unknown> | null;
}

// =============================================================================
// APPLICATION CONFIGURATION
// =============================================================================

/**
 * Application configuration, loaded from environment variables at startup.
 */
export interface AppConfig {
  /** HTTP server port */
  port: number;
  /** HTTP bind address */
  host: string;
  /** Stressor executable name or path */
  stressorCommand: string;
  /** Arguments appended to every stressor invocation */
  stressorExtraArgs: string[];
  /** Longest allowed run, in seconds */
  maxTestDurationSeconds: number;
  /** Largest allowed worker count per stressor */
  maxWorkers: number;
  /** Largest allowed memory size per VM worker, in MB */
  maxMemorySizeMb: number;
  /** Delay before a stop escalates from SIGTERM to SIGKILL */
  stopGraceMs: number;
  /** Bytes of stressor output kept per run */
  outputMaxBytes: number;
  /** Socket.IO metrics broadcast interval in ms */
  metricsIntervalMs: number;
  /** Maximum event log entries to retain */
  eventLogMaxEntries: number;
}

// =============================================================================
// API RESPONSE TYPES
// =============================================================================

/**
 * API error response structure.
 *
 * All error responses follow this shape. The global error handler middleware
 * transforms exceptions into this format.
 */
export interface ApiError {
  /** Error type/code */
  error: string;
  /** Human-readable error message */
  message: string;
  /** Additional error details (optional) */
  details?: Record<string, unknown>;
}
