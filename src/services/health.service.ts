/**
 * Health Service
 *
 * Liveness and readiness for orchestrated deployments.
 *
 *   - Liveness is OK whenever the process can answer at all.
 *   - Readiness depends only on whether the stressor executable was found.
 *     A running load test does not make the service unready: status and
 *     metrics requests must keep working while the host is under load.
 *
 * @module services/health
 */

import { ReadinessResult, StressorProbe } from '../types';
import { config } from '../config';
import { locateExecutable } from './stressor-process';

/**
 * Service answering health probes.
 */
export class HealthServiceClass {
  private lastProbe: StressorProbe | null = null;

  constructor(
    private readonly command: string,
    private readonly locate: (command: string) => string | null = locateExecutable
  ) {}

  /**
   * Looks the stressor up and remembers the result.
   *
   * @returns The probe result
   */
  probeStressor(): StressorProbe {
    const resolvedPath = this.locate(this.command);
    const isPath = this.command.includes('/');

    this.lastProbe = {
      command: this.command,
      available: resolvedPath !== null,
      resolvedPath,
      reason:
        resolvedPath !== null
          ? null
          : isPath
            ? `${this.command} is missing or not executable`
            : `${this.command} was not found on PATH`,
      checkedAt: new Date(),
    };

    return { ...this.lastProbe };
  }

  /**
   * The most recent probe result, if any probe has run.
   */
  getLastProbe(): StressorProbe | null {
    return this.lastProbe ? { ...this.lastProbe } : null;
  }

  /**
   * Liveness: reaching this code means the process is serving.
   */
  liveness(): { status: 'ok' } {
    return { status: 'ok' };
  }

  /**
   * Readiness: ready once the stressor has been found. A failed lookup is
   * retried on each call so the service turns ready when the tool appears.
   */
  readiness(): ReadinessResult {
    const probe = this.lastProbe && this.lastProbe.available ? this.lastProbe : this.probeStressor();
    if (!probe.available) {
      return { ready: false, reason: probe.reason ?? `${this.command} is unavailable` };
    }
    return { ready: true };
  }
}

/**
 * Singleton instance of the HealthService.
 */
export const HealthService = new HealthServiceClass(config.stressorCommand);
