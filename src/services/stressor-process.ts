/**
 * Stressor Process
 *
 * Launches the external stressor as a child process and watches it until it
 * exits. The load test service only sees the small StressorHandle and the
 * exit hook; everything child_process-specific stays in this module so tests
 * can substitute an in-process spawner.
 *
 * @module services/stressor-process
 */

import { spawn, ChildProcess } from 'child_process';
import * as fs from 'fs';
import path from 'path';
import { ProcessExit } from '../types';

/**
 * Callbacks for a launched stressor.
 */
export interface StressorHooks {
  /** Called exactly once, after the process has exited and its output is drained. */
  onExit(exit: ProcessExit): void;
}

/**
 * What the caller keeps of a launched process.
 */
export interface StressorHandle {
  readonly pid: number | undefined;
  kill(signal: NodeJS.Signals): boolean;
}

/**
 * Launches a stressor. Resolves once the process is running; rejects if it
 * could not be started (missing executable, permission denied).
 */
export type StressorSpawner = (command: string, args: string[], hooks: StressorHooks) => Promise<StressorHandle>;

/**
 * Keeps the last `maxBytes` of a byte stream.
 */
export class OutputTail {
  private data: Buffer = Buffer.alloc(0);

  constructor(private readonly maxBytes: number) {}

  append(chunk: Buffer): void {
    this.data = Buffer.concat([this.data, chunk]);
    if (this.data.length > this.maxBytes) {
      this.data = this.data.subarray(this.data.length - this.maxBytes);
    }
  }

  toString(): string {
    return this.data.toString('utf8');
  }
}

/**
 * Creates the spawner backed by child_process.spawn().
 *
 * stdin is closed; stdout and stderr are merged into one bounded tail that
 * is reported with the exit. The 'close' event is used rather than 'exit' so
 * the output is complete when the hook runs.
 *
 * @param outputMaxBytes - Bytes of output kept per run
 */
export function createStressorSpawner(outputMaxBytes: number): StressorSpawner {
  return (command, args, hooks) =>
    new Promise<StressorHandle>((resolve, reject) => {
      let child: ChildProcess;
      try {
        child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
      } catch (err) {
        reject(err);
        return;
      }

      const output = new OutputTail(outputMaxBytes);
      let spawned = false;

      child.stdout?.on('data', (chunk: Buffer) => output.append(chunk));
      child.stderr?.on('data', (chunk: Buffer) => output.append(chunk));

      child.once('spawn', () => {
        spawned = true;
        resolve({
          pid: child.pid,
          kill: (signal) => child.kill(signal),
        });
      });

      child.on('error', (err) => {
        if (!spawned) {
          reject(err);
          return;
        }
        // After a successful spawn this only reports failed kill() calls
        console.error(`[Stressor] pid ${child.pid ?? '?'}: ${err.message}`);
      });

      child.once('close', (code, signal) => {
        if (!spawned) {
          return;
        }
        hooks.onExit({ code, signal, output: output.toString() });
      });
    });
}

/**
 * Checks that a path is a regular file the service may execute.
 */
function isExecutableFile(candidate: string): boolean {
  try {
    if (!fs.statSync(candidate).isFile()) {
      return false;
    }
    fs.accessSync(candidate, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolves a command the way the shell would: a name containing a path
 * separator is checked directly, anything else is searched on PATH.
 *
 * @param command - Executable name or path
 * @param searchPath - PATH value to search (defaults to the process PATH)
 * @returns Absolute path of the executable, or null if none was found
 */
export function locateExecutable(command: string, searchPath: string = process.env.PATH ?? ''): string | null {
  if (command.length === 0) {
    return null;
  }

  if (command.includes('/') || command.includes(path.sep)) {
    const candidate = path.resolve(command);
    return isExecutableFile(candidate) ? candidate : null;
  }

  for (const dir of searchPath.split(path.delimiter)) {
    if (dir.length === 0) {
      continue;
    }
    const candidate = path.join(dir, command);
    if (isExecutableFile(candidate)) {
      return candidate;
    }
  }

  return null;
}
