import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { schedulePurge } from '../../app/purgeSchedule';
import { createLogger } from '../../logging';
import { purgeExpired } from '../../../scripts/purgeExpired';
import { testConfig } from '../support';

const logger = createLogger({ level: 'silent' });

describe('refresh token purge', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('purges on every interval until stopped', async () => {
    const purge = vi.fn().mockResolvedValue(3);
    const stop = schedulePurge({ purge, logger, intervalMs: 1_000 });

    await vi.advanceTimersByTimeAsync(2_500);
    expect(purge).toHaveBeenCalledTimes(2);

    stop();
    await vi.advanceTimersByTimeAsync(5_000);
    expect(purge).toHaveBeenCalledTimes(2);
  });

  it('logs a failed purge and keeps the schedule running', async () => {
    const error = vi.spyOn(logger, 'error');
    const purge = vi.fn().mockRejectedValueOnce(new Error('connection reset')).mockResolvedValue(0);
    const stop = schedulePurge({ purge, logger, intervalMs: 1_000 });

    await vi.advanceTimersByTimeAsync(2_000);
    stop();
    expect(purge).toHaveBeenCalledTimes(2);
    expect(error).toHaveBeenCalledWith({ err: expect.any(Error) }, 'refresh token purge failed');
  });
});

describe('purge script', () => {
  it('reports how many records it removed', async () => {
    await expect(purgeExpired(testConfig())).resolves.toBe(0);
  });
});
