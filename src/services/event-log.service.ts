/**
 * Event Log Service
 *
 * Maintains a ring buffer of run and server events, mirrors each entry to
 * the console and hands it to an optional broadcaster (Socket.IO).
 *
 * @module services/event-log
 */

import { EventLogEntry, EventType, LogLevel } from '../types';
import { generateId } from '../utils';
import { config } from '../config';

/**
 * Options accepted by the level helpers.
 */
export interface EventLogOptions {
  runId?: string;
  details?: Record<string, unknown>;
}

/**
 * Service for logging run and server events.
 *
 * Maintains a ring buffer with configurable maximum entries.
 */
export class EventLogServiceClass {
  private entries: EventLogEntry[] = [];
  private broadcaster: ((event: EventLogEntry) => void) | null = null;

  constructor(private readonly maxEntries: number = config.eventLogMaxEntries) {}

  /**
   * Sets a broadcaster function to emit events in real-time (e.g., via Socket.IO).
   * @param fn - Function to call with each new event, or null to detach
   */
  setBroadcaster(fn: ((event: EventLogEntry) => void) | null): void {
    this.broadcaster = fn;
  }

  /**
   * Logs a new event.
   *
   * @param event - Event type
   * @param message - Human-readable message
   * @param options - Level, associated run and structured details
   * @returns The created log entry
   */
  log(event: EventType, message: string, options: EventLogOptions & { level?: LogLevel } = {}): EventLogEntry {
    const entry: EventLogEntry = {
      id: generateId(),
      timestamp: new Date(),
      level: options.level ?? 'info',
      runId: options.runId ?? null,
      event,
      message,
      details: options.details ?? null,
    };

    this.entries.push(entry);

    // Ring buffer
    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }

    const consoleMessage = `[${entry.timestamp.toISOString()}] [${entry.level.toUpperCase()}] ${event}: ${message}`;
    if (entry.level === 'error') {
      console.error(consoleMessage);
    } else if (entry.level === 'warn') {
      console.warn(consoleMessage);
    } else {
      console.log(consoleMessage);
    }

    if (this.broadcaster) {
      this.broadcaster(entry);
    }

    return entry;
  }

  /**
   * Logs an info-level event.
   */
  info(event: EventType, message: string, options?: EventLogOptions): EventLogEntry {
    return this.log(event, message, { ...options, level: 'info' });
  }

  /**
   * Logs a warning-level event.
   */
  warn(event: EventType, message: string, options?: EventLogOptions): EventLogEntry {
    return this.log(event, message, { ...options, level: 'warn' });
  }

  /**
   * Logs an error-level event.
   */
  error(event: EventType, message: string, options?: EventLogOptions): EventLogEntry {
    return this.log(event, message, { ...options, level: 'error' });
  }

  /**
   * Gets the most recent log entries.
   *
   * @param limit - Maximum number of entries to return
   * @returns Array of recent log entries (newest first)
   */
  getRecentEntries(limit: number = 50): EventLogEntry[] {
    const entries = [...this.entries].reverse();
    return entries.slice(0, limit);
  }

  /**
   * Gets log entries for a specific run.
   *
   * @param runId - Run ID to filter by
   * @returns Array of log entries for the run (oldest first)
   */
  getEntriesForRun(runId: string): EventLogEntry[] {
    return this.entries.filter((entry) => entry.runId === runId);
  }

  /**
   * Gets the count of log entries.
   */
  getCount(): number {
    return this.entries.length;
  }

  /**
   * Clears all log entries.
   */
  clear(): void {
    this.entries = [];
  }
}

/**
 * Singleton instance of the EventLogService.
 */
export const EventLogService = new EventLogServiceClass();
