/**
 * Stressor Process Unit Tests
 *
 * Spawns the running Node.js binary as a stand-in stressor.
 */

import * as fs from 'fs';
import * as os from 'os';
import path from 'path';
import {
  OutputTail,
  StressorHandle,
  createStressorSpawner,
  locateExecutable,
} from '../../../src/services/stressor-process';
import { ProcessExit } from '../../../src/types';

const spawner = createStressorSpawner(65536);

/** Spawns a command and resolves with its handle and a promise of its exit. */
async function run(command: string, args: string[]): Promise<{ handle: StressorHandle; exited: Promise<ProcessExit> }> {
  let onExit: (exit: ProcessExit) => void = () => undefined;
  const exited = new Promise<ProcessExit>((resolve) => {
    onExit = resolve;
  });
  const handle = await spawner(command, args, { onExit: (exit) => onExit(exit) });
  return { handle, exited };
}

describe('createStressorSpawner', () => {
  it('should report exit code 0 and captured stdout', async () => {
    const { handle, exited } = await run(process.execPath, ['-e', 'process.stdout.write("hello")']);

    expect(typeof handle.pid).toBe('number');
    await expect(exited).resolves.toEqual({ code: 0, signal: null, output: 'hello' });
  });

  it('should report a non-zero exit with the error output', async () => {
    const { exited } = await run(process.execPath, ['--cpu', '2']);

    const exit = await exited;
    expect(exit.code).toBe(9);
    expect(exit.signal).toBeNull();
    expect(exit.output).toContain('bad option: --cpu');
  });

  it('should report the signal when the process is killed', async () => {
    const { handle, exited } = await run(process.execPath, ['-e', 'setInterval(() => {}, 1000)']);

    expect(handle.kill('SIGTERM')).toBe(true);

    const exit = await exited;
    expect(exit.code).toBeNull();
    expect(exit.signal).toBe('SIGTERM');
  });

  it('should reject when the executable does not exist', async () => {
    const onExit = jest.fn();

    await expect(spawner('/nonexistent/stress-ng', ['--cpu', '1'], { onExit })).rejects.toMatchObject({
      code: 'ENOENT',
    });
    expect(onExit).not.toHaveBeenCalled();
  });
});

describe('OutputTail', () => {
  it('should keep everything under the limit', () => {
    const tail = new OutputTail(16);
    tail.append(Buffer.from('abc'));
    tail.append(Buffer.from('def'));

    expect(tail.toString()).toBe('abcdef');
  });

  it('should keep only the last bytes over the limit', () => {
    const tail = new OutputTail(4);
    tail.append(Buffer.from('abcdef'));
    tail.append(Buffer.from('gh'));

    expect(tail.toString()).toBe('efgh');
  });
});

describe('locateExecutable', () => {
  let tmpDir: string;

  beforeAll(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'stressor-test-'));
  });

  afterAll(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should accept an executable path', () => {
    expect(locateExecutable(process.execPath)).toBe(process.execPath);
  });

  it('should find a bare name on the search path', () => {
    const dir = path.dirname(process.execPath);
    const name = path.basename(process.execPath);

    expect(locateExecutable(name, dir)).toBe(path.join(dir, name));
  });

  it('should return null for a missing path', () => {
    expect(locateExecutable('/nonexistent/stress-ng')).toBeNull();
  });

  it('should return null for a name that is not on the search path', () => {
    expect(locateExecutable('stress-ng', tmpDir)).toBeNull();
    expect(locateExecutable('stress-ng', '')).toBeNull();
  });

  it('should return null for a file without execute permission', () => {
    const file = path.join(tmpDir, 'stress-ng');
    fs.writeFileSync(file, '#!/bin/sh\n', { mode: 0o644 });

    expect(locateExecutable(file)).toBeNull();
    expect(locateExecutable('stress-ng', tmpDir)).toBeNull();
  });

  it('should return null for a directory', () => {
    expect(locateExecutable(tmpDir)).toBeNull();
  });

  it('should return null for an empty command', () => {
    expect(locateExecutable('')).toBeNull();
  });
});
