/**
 * Metrics Service
 *
 * Reads host CPU, memory, load and process metrics at request time, plus the
 * service's own request and run counters. Every OS source is optional: a
 * source that throws degrades its fields to zero and is listed under
 * `unavailable`, and the read still succeeds.
 *
 * @module services/metrics
 */

import * as os from 'os';
import * as fs from 'fs';
import { ApplicationMetrics, SystemMetrics } from '../types';
import { RunStats } from './run-tracker.service';
import { clamp, round2 } from '../utils';

// Marker value used by cgroups v1 when memory is unlimited
const CGROUP_UNLIMITED = 9223372036854771712;

const CGROUP_V2_LIMIT = '/sys/fs/cgroup/memory.max';
const CGROUP_V2_USAGE = '/sys/fs/cgroup/memory.current';
const CGROUP_V1_LIMIT = '/sys/fs/cgroup/memory/memory.limit_in_bytes';
const CGROUP_V1_USAGE = '/sys/fs/cgroup/memory/memory.usage_in_bytes';

/**
 * The OS calls the reader depends on. Swapped out in tests.
 */
export interface MetricsSource {
  cpus(): os.CpuInfo[];
  totalmem(): number;
  freemem(): number;
  loadavg(): number[];
  readFile(path: string): string;
  readDir(path: string): string[];
}

/**
 * MetricsSource backed by node:os and node:fs.
 */
export const nodeMetricsSource: MetricsSource = {
  cpus: () => os.cpus(),
  totalmem: () => os.totalmem(),
  freemem: () => os.freemem(),
  loadavg: () => os.loadavg(),
  readFile: (path) => fs.readFileSync(path, 'utf8'),
  readDir: (path) => fs.readdirSync(path),
};

interface CpuTicks {
  idle: number;
  total: number;
}

interface MemoryLimit {
  limit: number;
  source: string;
  usagePath: string | null;
}

/**
 * Service for reading system metrics.
 */
export class MetricsServiceClass {
  private lastTicks: CpuTicks | null = null;
  private lastCpuPercent = 0;
  private memoryLimit: MemoryLimit | null = null;
  private requestsTotal = 0;

  constructor(private readonly source: MetricsSource = nodeMetricsSource) {}

  /**
   * Counts a handled HTTP request.
   */
  recordRequest(): void {
    this.requestsTotal++;
  }

  /**
   * Reads a complete host metrics snapshot. Never throws.
   */
  readMetrics(): SystemMetrics {
    const unavailable: string[] = [];
    const attempt = <T>(name: string, fn: () => T, fallback: T): T => {
      try {
        return fn();
      } catch {
        unavailable.push(name);
        return fallback;
      }
    };

    const cpuInfo = attempt('cpu', () => this.source.cpus(), []);
    const cpuPercent = cpuInfo.length > 0 ? this.computeCpuPercent(cpuInfo) : 0;

    const memory = attempt('memory', () => this.readMemory(), null);

    const load = attempt('loadavg', () => this.source.loadavg(), [0, 0, 0]);

    const processCount = attempt(
      'processes',
      () => this.source.readDir('/proc').filter((entry) => /^\d+$/.test(entry)).length,
      0
    );

    return {
      cpuPercent,
      cpuCount: cpuInfo.length,
      memoryUsedBytes: memory?.used ?? 0,
      memoryTotalBytes: memory?.total ?? 0,
      memoryAvailableBytes: memory?.available ?? 0,
      memoryPercent: memory && memory.total > 0 ? round2((memory.used / memory.total) * 100) : 0,
      memoryLimitSource: memory?.source ?? 'unavailable',
      loadAverage: [round2(load[0] ?? 0), round2(load[1] ?? 0), round2(load[2] ?? 0)],
      processCount,
      unavailable,
      sampledAt: new Date(),
    };
  }

  /**
   * Combines the request counter with run counters and process figures.
   *
   * @param runs - Counters from the run tracker
   */
  getApplicationMetrics(runs: RunStats): ApplicationMetrics {
    return {
      requestsTotal: this.requestsTotal,
      testsStarted: runs.started,
      testsCompleted: runs.completed,
      testsFailed: runs.failed,
      testsStopped: runs.stopped,
      testsRunning: runs.running,
      lastTestDurationSeconds: runs.lastDurationSeconds,
      uptimeSeconds: round2(process.uptime()),
      pid: process.pid,
      rssBytes: process.memoryUsage().rss,
    };
  }

  /**
   * Resets the request counter and CPU baseline.
   *
   * Useful for testing.
   */
  reset(): void {
    this.requestsTotal = 0;
    this.lastTicks = null;
    this.lastCpuPercent = 0;
    this.memoryLimit = null;
  }

  /**
   * System-wide busy share since the previous read (since boot on the first
   * read). When no ticks elapsed the previous figure is repeated.
   */
  private computeCpuPercent(cpuInfo: os.CpuInfo[]): number {
    const ticks = cpuInfo.reduce<CpuTicks>(
      (acc, cpu) => {
        const { user, nice, sys, idle, irq } = cpu.times;
        return { idle: acc.idle + idle, total: acc.total + user + nice + sys + idle + irq };
      },
      { idle: 0, total: 0 }
    );

    const previous = this.lastTicks ?? { idle: 0, total: 0 };
    const totalDelta = ticks.total - previous.total;
    const idleDelta = ticks.idle - previous.idle;
    this.lastTicks = ticks;

    if (totalDelta <= 0) {
      return this.lastCpuPercent;
    }

    this.lastCpuPercent = round2(clamp((1 - idleDelta / totalDelta) * 100, 0, 100));
    return this.lastCpuPercent;
  }

  /**
   * Memory against the container limit when a cgroup sets one, otherwise
   * against the host.
   */
  private readMemory(): { total: number; used: number; available: number; source: string } {
    const limit = this.detectMemoryLimit();

    if (limit.usagePath) {
      const usage = this.readCgroupValue(limit.usagePath);
      if (usage !== null) {
        const used = Math.min(usage, limit.limit);
        return { total: limit.limit, used, available: limit.limit - used, source: limit.source };
      }
    }

    const total = this.source.totalmem();
    const available = this.source.freemem();
    return { total, used: Math.max(0, total - available), available, source: 'os.totalmem()' };
  }

  /**
   * Detects the container memory limit once and caches it.
   */
  private detectMemoryLimit(): MemoryLimit {
    if (this.memoryLimit) {
      return this.memoryLimit;
    }

    const v2 = this.readCgroupValue(CGROUP_V2_LIMIT);
    const v1 = v2 === null ? this.readCgroupValue(CGROUP_V1_LIMIT) : null;

    if (v2 !== null) {
      this.memoryLimit = { limit: v2, source: `cgroup v2: ${CGROUP_V2_LIMIT}`, usagePath: CGROUP_V2_USAGE };
    } else if (v1 !== null) {
      this.memoryLimit = { limit: v1, source: `cgroup v1: ${CGROUP_V1_LIMIT}`, usagePath: CGROUP_V1_USAGE };
    } else {
      this.memoryLimit = { limit: this.source.totalmem(), source: 'os.totalmem()', usagePath: null };
    }

    console.log(`[Metrics] Memory limit detected: ${this.memoryLimit.limit} bytes (source: ${this.memoryLimit.source})`);
    return this.memoryLimit;
  }

  /**
   * Reads a numeric cgroup file, or null when missing or unlimited.
   */
  private readCgroupValue(path: string): number | null {
    let content: string;
    try {
      content = this.source.readFile(path).trim();
    } catch {
      return null;
    }
    if (content === 'max') return null; // cgroup v2 unlimited marker
    const value = parseInt(content, 10);
    if (!isNaN(value) && value > 0 && value < CGROUP_UNLIMITED) {
      return value;
    }
    return null;
  }
}

/**
 * Singleton instance of the MetricsService.
 */
export const MetricsService = new MetricsServiceClass();
