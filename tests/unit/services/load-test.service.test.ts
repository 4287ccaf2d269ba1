/**
 * Load Test Service Unit Tests
 */

import {
  LoadTestServiceClass,
  buildStressorArgs,
  describeRequest,
} from '../../../src/services/load-test.service';
import { RunTrackerServiceClass } from '../../../src/services/run-tracker.service';
import { EventLogServiceClass } from '../../../src/services/event-log.service';
import { ConflictError, NotFoundError, SpawnError } from '../../../src/middleware/error-handler';
import { StressorHandle, StressorHooks } from '../../../src/services/stressor-process';
import { LoadTestRequest } from '../../../src/types';
import { validateLoadTestRequest } from '../../../src/middleware/validation';
import { FakeStressor, flushImmediate } from '../../helpers/fake-stressor';

const request: LoadTestRequest = {
  cpuWorkers: 2,
  memoryWorkers: 1,
  durationSeconds: 10,
  memorySize: '128M',
  memoryBytes: 128 * 1024 * 1024,
};

describe('buildStressorArgs', () => {
  it('should pass cpu, vm and timeout arguments followed by extra args', () => {
    expect(buildStressorArgs(request, ['--metrics-brief'])).toEqual([
      '--cpu',
      '2',
      '--vm',
      '1',
      '--vm-bytes',
      '128M',
      '--timeout',
      '10s',
      '--metrics-brief',
    ]);
  });

  it('should omit the cpu stressor when cpu_workers is 0', () => {
    expect(buildStressorArgs({ ...request, cpuWorkers: 0 })).toEqual([
      '--vm',
      '1',
      '--vm-bytes',
      '128M',
      '--timeout',
      '10s',
    ]);
  });

  it('should omit the vm stressor and its size when memory_workers is 0', () => {
    expect(buildStressorArgs({ ...request, memoryWorkers: 0 })).toEqual(['--cpu', '2', '--timeout', '10s']);
  });
});

describe('buildStressorArgs memory size', () => {
  function vmBytesFor(memorySize: string): string | undefined {
    const validated = validateLoadTestRequest({ cpu_workers: 0, memory_workers: 1, memory_size: memorySize });
    const args = buildStressorArgs(validated);
    return args[args.indexOf('--vm-bytes') + 1];
  }

  it('should pass the parsed size with a single-letter suffix', () => {
    expect(vmBytesFor('64MiB')).toBe('64M');
    expect(vmBytesFor('64MB')).toBe('64M');
    expect(vmBytesFor('1GiB')).toBe('1G');
    expect(vmBytesFor('512 M')).toBe('512M');
    expect(vmBytesFor('1048576')).toBe('1M');
  });

  it('should keep the caller\'s spelling in the request', () => {
    const validated = validateLoadTestRequest({ memory_workers: 1, memory_size: '64MiB' });

    expect(validated.memorySize).toBe('64MiB');
    expect(buildStressorArgs(validated)).toContain('64M');
    expect(buildStressorArgs(validated)).not.toContain('64MiB');
  });
});

describe('describeRequest', () => {
  it('should summarize the workers and duration', () => {
    expect(describeRequest(request)).toBe('2 CPU worker(s), 1 VM worker(s) x 128M for 10s');
    expect(describeRequest({ ...request, memoryWorkers: 0 })).toBe('2 CPU worker(s) for 10s');
  });
});

describe('LoadTestService', () => {
  let fake: FakeStressor;
  let tracker: RunTrackerServiceClass;
  let events: EventLogServiceClass;
  let service: LoadTestServiceClass;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    fake = new FakeStressor();
    tracker = new RunTrackerServiceClass();
    events = new EventLogServiceClass(100);
    service = new LoadTestServiceClass({
      command: 'stress-ng',
      extraArgs: ['--metrics-brief'],
      stopGraceMs: 1000,
      spawner: fake.spawner,
      tracker,
      events,
    });
  });

  afterEach(() => {
    service.clear();
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  describe('startTest', () => {
    it('should spawn the stressor and record a running run', async () => {
      const run = await service.startTest(request);

      expect(fake.calls).toEqual([
        {
          command: 'stress-ng',
          args: ['--cpu', '2', '--vm', '1', '--vm-bytes', '128M', '--timeout', '10s', '--metrics-brief'],
        },
      ]);
      expect(run.state).toBe('running');
      expect(run.command).toEqual([
        'stress-ng',
        '--cpu',
        '2',
        '--vm',
        '1',
        '--vm-bytes',
        '128M',
        '--timeout',
        '10s',
        '--metrics-brief',
      ]);
      expect(service.getActivePid()).toBe(4000);
      expect(service.isBusy()).toBe(true);
      expect(events.getRecentEntries(1)[0].event).toBe('TEST_STARTED');
    });

    it('should mark the run completed when the stressor exits with 0', async () => {
      const run = await service.startTest(request);
      fake.exit(0, null, 'stress-ng: info: successful run completed\n');

      const finished = tracker.getRun(run.id);
      expect(finished?.state).toBe('completed');
      expect(finished?.exitCode).toBe(0);
      expect(finished?.output).toBe('stress-ng: info: successful run completed\n');
      expect(service.isBusy()).toBe(false);
      expect(service.getActivePid()).toBeNull();
      expect(events.getRecentEntries(1)[0].event).toBe('TEST_COMPLETED');
    });

    it('should mark the run failed when the stressor exits non-zero', async () => {
      const run = await service.startTest(request);
      fake.exit(2, null, 'stress-ng: error: invalid option\n');

      const finished = tracker.getRun(run.id);
      expect(finished?.state).toBe('failed');
      expect(finished?.reason).toBe('exited with code 2');

      const entry = events.getRecentEntries(1)[0];
      expect(entry.event).toBe('TEST_FAILED');
      expect(entry.level).toBe('error');
      expect(entry.details).toEqual({
        exitCode: 2,
        signal: null,
        output: 'stress-ng: error: invalid option\n',
      });
    });

    it('should reject a start while a run is running', async () => {
      const run = await service.startTest(request);

      await expect(service.startTest(request)).rejects.toThrow(ConflictError);
      expect(fake.calls).toHaveLength(1);
      expect(tracker.getRun(run.id)?.state).toBe('running');
      expect(events.getRecentEntries(1)[0].event).toBe('TEST_REJECTED');
    });

    it('should reject a start while another start is still spawning', async () => {
      let release: (handle: StressorHandle) => void = () => undefined;
      service.setSpawner(
        () =>
          new Promise<StressorHandle>((resolve) => {
            release = resolve;
          })
      );

      const first = service.startTest(request);
      await expect(service.startTest(request)).rejects.toThrow(ConflictError);

      release({ pid: 1, kill: () => true });
      const run = await first;
      expect(run.state).toBe('running');
    });

    it('should accept a new start after the previous run finished', async () => {
      const first = await service.startTest(request);
      fake.exit(0);

      const second = await service.startTest(request);

      expect(second.id).not.toBe(first.id);
      expect(tracker.currentStatus().state).toBe('running');
      expect(tracker.getRun(first.id)).toBeUndefined();
    });

    it('should record a failed run and throw SpawnError when the spawn fails', async () => {
      fake.failWith = new Error('spawn stress-ng ENOENT');

      const attempt = service.startTest(request);
      await expect(attempt).rejects.toThrow(SpawnError);
      await expect(attempt).rejects.toThrow('Failed to start stress-ng: spawn stress-ng ENOENT');

      const status = tracker.currentStatus();
      expect(status.state).toBe('failed');
      if (status.state !== 'idle') {
        expect(status.reason).toBe('spawn error: spawn stress-ng ENOENT');
        expect(status.finishedAt).toBeInstanceOf(Date);
      }
      expect(service.isBusy()).toBe(false);
      expect(tracker.getStats()).toMatchObject({ started: 0, failed: 1 });
    });

    it('should apply an exit that arrives before the start is recorded', async () => {
      service.setSpawner(async (_command: string, _args: string[], hooks: StressorHooks) => {
        hooks.onExit({ code: 0, signal: null, output: '' });
        return { pid: 7, kill: () => true };
      });

      const run = await service.startTest(request);

      expect(run.state).toBe('running');
      expect(tracker.getRun(run.id)?.state).toBe('completed');
      expect(service.isBusy()).toBe(false);
    });
  });

  describe('stopTest', () => {
    it('should send SIGTERM and report stopped once the process exits', async () => {
      const run = await service.startTest(request);

      const stopping = service.stopTest(run.id);
      expect(stopping.state).toBe('running');
      expect(stopping.stopRequested).toBe(true);
      expect(fake.signals).toEqual(['SIGTERM']);

      await flushImmediate();

      const stopped = tracker.getRun(run.id);
      expect(stopped?.state).toBe('stopped');
      expect(stopped?.signal).toBe('SIGTERM');
      expect(events.getRecentEntries(1)[0].event).toBe('TEST_STOPPED');
    });

    it('should escalate to SIGKILL after the grace period', async () => {
      fake.ignoreSigterm = true;
      const run = await service.startTest(request);

      jest.useFakeTimers();
      service.stopTest(run.id);
      expect(fake.signals).toEqual(['SIGTERM']);

      jest.advanceTimersByTime(999);
      expect(fake.signals).toEqual(['SIGTERM']);

      jest.advanceTimersByTime(1);
      expect(fake.signals).toEqual(['SIGTERM', 'SIGKILL']);

      jest.useRealTimers();
      fake.exit(null, 'SIGKILL');
      expect(tracker.getRun(run.id)?.state).toBe('stopped');
      expect(tracker.getRun(run.id)?.reason).toBe('stopped on request (terminated by SIGKILL)');
    });

    it('should keep the original SIGKILL deadline when stopped again', async () => {
      fake.ignoreSigterm = true;
      const run = await service.startTest(request);

      jest.useFakeTimers();
      service.stopTest(run.id);
      jest.advanceTimersByTime(600);

      const again = service.stopTest(run.id);
      expect(again.stopRequested).toBe(true);
      expect(again.state).toBe('running');
      expect(fake.signals).toEqual(['SIGTERM']);

      jest.advanceTimersByTime(400);
      expect(fake.signals).toEqual(['SIGTERM', 'SIGKILL']);

      jest.useRealTimers();
      fake.exit(null, 'SIGKILL');
      expect(tracker.getRun(run.id)?.state).toBe('stopped');
    });

    it('should throw NotFoundError for an unknown run', async () => {
      await service.startTest(request);

      expect(() => service.stopTest('00000000-0000-4000-8000-000000000000')).toThrow(NotFoundError);
    });

    it('should throw NotFoundError for a run that already finished', async () => {
      const run = await service.startTest(request);
      fake.exit(0);

      expect(() => service.stopTest(run.id)).toThrow(NotFoundError);
    });
  });

  describe('stopActive', () => {
    it('should return undefined when nothing runs', () => {
      expect(service.stopActive()).toBeUndefined();
      expect(fake.signals).toEqual([]);
    });

    it('should stop the running run', async () => {
      const run = await service.startTest(request);

      expect(service.stopActive()?.id).toBe(run.id);
      expect(fake.signals).toEqual(['SIGTERM']);
      await flushImmediate();
    });
  });
});
