/**
 * =============================================================================
 * APPLICATION CONFIGURATION
 * =============================================================================
 *
 * PURPOSE:
 *   Centralizes all configurable values in one place. Every tunable parameter
 *   (port, stressor command, limits, intervals) is defined here with defaults
 *   that can be overridden via environment variables.
 *
 * ENVIRONMENT VARIABLES:
 *   - PORT / HOST                 → HTTP listener
 *   - STRESSOR_COMMAND            → stressor executable (PATH lookup or path)
 *   - STRESSOR_EXTRA_ARGS         → whitespace-separated args appended to every run
 *   - MAX_TEST_DURATION_SECONDS   → duration ceiling for a single run
 *   - MAX_WORKERS                 → upper bound for cpu_workers / memory_workers
 *   - MAX_MEMORY_SIZE_MB          → upper bound for memory_size
 *   - STOP_GRACE_MS               → SIGTERM → SIGKILL escalation delay
 *   - OUTPUT_MAX_BYTES            → captured stressor output kept per run
 *   - METRICS_INTERVAL_MS         → Socket.IO metrics broadcast interval
 *   - EVENT_LOG_MAX_ENTRIES       → ring buffer size for the event log
 *
 * @module config
 */

import { AppConfig } from '../types';

/**
 * Parses an integer from environment variable with fallback.
 *
 * @param envVar - Environment variable name
 * @param defaultValue - Default value if env var is not set
 * @returns Parsed integer or default value
 */
export function parseIntEnv(envVar: string, defaultValue: number): number {
  const value = process.env[envVar];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Reads a string environment variable, falling back when unset or blank.
 */
export function parseStringEnv(envVar: string, defaultValue: string): string {
  const value = process.env[envVar];
  return value === undefined || value.trim() === '' ? defaultValue : value.trim();
}

/**
 * Splits a whitespace-separated argument list from an environment variable.
 * An explicitly empty value yields no arguments.
 */
export function parseArgsEnv(envVar: string, defaultValue: string[]): string[] {
  const value = process.env[envVar];
  if (value === undefined) {
    return defaultValue;
  }
  return value.split(/\s+/).filter((arg) => arg.length > 0);
}

/**
 * Application configuration loaded from environment variables with defaults.
 */
export const config: AppConfig = {
  /** HTTP server port */
  port: parseIntEnv('PORT', 8080),

  /** Bind address (all interfaces inside a container) */
  host: parseStringEnv('HOST', '0.0.0.0'),

  /** Stressor executable */
  stressorCommand: parseStringEnv('STRESSOR_COMMAND', 'stress-ng'),

  /** Appended to every invocation; --metrics-brief makes stress-ng print a bogo-ops summary */
  stressorExtraArgs: parseArgsEnv('STRESSOR_EXTRA_ARGS', ['--metrics-brief']),

  /** One hour */
  maxTestDurationSeconds: parseIntEnv('MAX_TEST_DURATION_SECONDS', 3600),

  maxWorkers: parseIntEnv('MAX_WORKERS', 256),

  maxMemorySizeMb: parseIntEnv('MAX_MEMORY_SIZE_MB', 65536),

  stopGraceMs: parseIntEnv('STOP_GRACE_MS', 5000),

  outputMaxBytes: parseIntEnv('OUTPUT_MAX_BYTES', 65536),

  metricsIntervalMs: parseIntEnv('METRICS_INTERVAL_MS', 5000),

  eventLogMaxEntries: parseIntEnv('EVENT_LOG_MAX_ENTRIES', 100),
};

/**
 * Application version reported by /health.
 */
export const APP_VERSION = '1.0.0';

/**
 * Application name.
 */
export const APP_NAME = 'StressPilot';

/**
 * Values applied when a /stress request omits a field.
 */
export const defaults = {
  cpuWorkers: 2,
  memoryWorkers: 1,
  durationSeconds: 30,
  memorySize: '256M',
};

/**
 * Validation limits for load test parameters.
 *
 * Used by the validation middleware to enforce bounds on user input.
 */
export const limits = {
  /** Minimum worker count per stressor (zero disables that stressor) */
  minWorkers: 0,
  /** Maximum worker count per stressor */
  maxWorkers: config.maxWorkers,
  /** Minimum run duration (seconds) */
  minDurationSeconds: 1,
  /** Maximum run duration (seconds) */
  maxDurationSeconds: config.maxTestDurationSeconds,
  /** Maximum memory per VM worker (MB) */
  maxMemorySizeMb: config.maxMemorySizeMb,
};
