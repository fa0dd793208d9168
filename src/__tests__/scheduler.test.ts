import { describe, it, expect, vi, beforeEach } from 'vitest';

const { schedule, validate, stopTask } = vi.hoisted(() => {
  const stopTask = vi.fn();
  return {
    stopTask,
    schedule: vi.fn<(expression: string, callback: () => void) => { stop: () => void }>(() => ({ stop: stopTask })),
    validate: vi.fn((expression: string) => expression.split(' ').length === 5)
  };
});

vi.mock('node-cron', () => ({
  default: { schedule, validate }
}));

vi.mock('../logger.js', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}));

import { logger } from '../logger.js';
import { Scheduler } from '../scheduler.js';

describe('Scheduler', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('schedules the digest and runs it on each tick', async () => {
    const runDigest = vi.fn().mockResolvedValue(1);
    new Scheduler(runDigest).start('0 8 * * *');

    expect(schedule).toHaveBeenCalledWith('0 8 * * *', expect.any(Function));
    schedule.mock.calls[0]?.[1]();

    await vi.waitFor(() => expect(runDigest).toHaveBeenCalledTimes(1));
  });

  it('rejects an invalid cron expression', () => {
    expect(() => new Scheduler(vi.fn()).start('every morning')).toThrow(
      'Invalid DIGEST_CRON expression: every morning'
    );
    expect(schedule).not.toHaveBeenCalled();
  });

  it('logs a failed run instead of throwing', async () => {
    const failure = new Error('queue closed');
    new Scheduler(vi.fn().mockRejectedValue(failure)).start('0 8 * * *');

    schedule.mock.calls[0]?.[1]();

    await vi.waitFor(() =>
      expect(logger.error).toHaveBeenCalledWith({ err: failure }, 'scheduled daily digest failed')
    );
  });

  it('stops the previous task when restarted and on stop', () => {
    const scheduler = new Scheduler(vi.fn());
    scheduler.start('0 8 * * *');
    scheduler.start('0 9 * * *');

    expect(stopTask).toHaveBeenCalledTimes(1);

    scheduler.stop();

    expect(stopTask).toHaveBeenCalledTimes(2);
  });
});
