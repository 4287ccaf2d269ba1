/**
 * Event Log Service Unit Tests
 */

import { EventLogServiceClass } from '../../../src/services/event-log.service';
import { EventLogEntry } from '../../../src/types';

describe('EventLogService', () => {
  let events: EventLogServiceClass;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    events = new EventLogServiceClass(3);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should record level, run and details', () => {
    const entry = events.warn('TEST_REJECTED', 'busy', { runId: 'run-1', details: { reason: 'busy' } });

    expect(entry).toMatchObject({
      level: 'warn',
      event: 'TEST_REJECTED',
      message: 'busy',
      runId: 'run-1',
      details: { reason: 'busy' },
    });
    expect(entry.timestamp).toBeInstanceOf(Date);
  });

  it('should default to info with no run and no details', () => {
    const entry = events.log('SERVER_STARTED', 'up');

    expect(entry.level).toBe('info');
    expect(entry.runId).toBeNull();
    expect(entry.details).toBeNull();
  });

  it('should write errors to console.error in a single line', () => {
    const entry = events.error('TEST_FAILED', 'exited with code 2');

    expect(console.error).toHaveBeenCalledWith(
      `[${entry.timestamp.toISOString()}] [ERROR] TEST_FAILED: exited with code 2`
    );
  });

  it('should return the newest entries first', () => {
    events.info('TEST_STARTED', 'one');
    events.info('TEST_STOPPING', 'two');
    events.info('TEST_STOPPED', 'three');

    expect(events.getRecentEntries(2).map((entry) => entry.message)).toEqual(['three', 'two']);
  });

  it('should drop the oldest entries beyond the maximum', () => {
    events.info('TEST_STARTED', 'one');
    events.info('TEST_STARTED', 'two');
    events.info('TEST_STARTED', 'three');
    events.info('TEST_STARTED', 'four');

    expect(events.getCount()).toBe(3);
    expect(events.getRecentEntries().map((entry) => entry.message)).toEqual(['four', 'three', 'two']);
  });

  it('should filter entries by run', () => {
    events.info('TEST_STARTED', 'a', { runId: 'run-1' });
    events.info('TEST_STARTED', 'b', { runId: 'run-2' });
    events.info('TEST_COMPLETED', 'c', { runId: 'run-1' });

    expect(events.getEntriesForRun('run-1').map((entry) => entry.message)).toEqual(['a', 'c']);
  });

  it('should hand each entry to the broadcaster until detached', () => {
    const seen: EventLogEntry[] = [];
    events.setBroadcaster((entry) => seen.push(entry));

    events.info('TEST_STARTED', 'one');
    events.setBroadcaster(null);
    events.info('TEST_COMPLETED', 'two');

    expect(seen.map((entry) => entry.message)).toEqual(['one']);
  });

  it('should clear all entries', () => {
    events.info('TEST_STARTED', 'one');
    events.clear();

    expect(events.getCount()).toBe(0);
  });
});
