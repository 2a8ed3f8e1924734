/**
 * Refresh Scheduler Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createManualClock } from '../../../core/host.deps.js';
import { EntropyCacheCoordinator } from '../entropy.coordinator.js';
import { EntropyRefreshScheduler } from '../entropy.scheduler.js';

const cronMocks = vi.hoisted(() => {
  const stop = vi.fn();
  return {
    stop,
    schedule: vi.fn((_expr: string, _fn: () => void, _opts?: object) => ({ stop })),
    validate: vi.fn((expr: string) => expr !== 'not a cron'),
  };
});

vi.mock('node-cron', () => ({ default: cronMocks }));

function createMockLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

// setImmediate stays real so pending refresh callbacks can drain
const flush = (): Promise<void> => new Promise(resolve => setImmediate(resolve));

describe('EntropyRefreshScheduler', () => {
  const clock = createManualClock(1_700_000_000_000);
  let coordinator: EntropyCacheCoordinator;
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(async () => {
    vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval'] });
    cronMocks.schedule.mockClear();
    cronMocks.stop.mockClear();
    logger = createMockLogger();
    coordinator = new EntropyCacheCoordinator({ clock, logger: createMockLogger() });
    const generation = await coordinator.refresh();
    vi.spyOn(coordinator, 'refresh').mockResolvedValue(generation);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('interval mode', () => {
    it('should refresh once per interval', async () => {
      const scheduler = new EntropyRefreshScheduler(coordinator, logger, { intervalMs: 1000 }, clock);
      scheduler.start();

      vi.advanceTimersByTime(3000);
      await flush();

      expect(coordinator.refresh).toHaveBeenCalledTimes(3);
      expect(scheduler.status()).toMatchObject({
        running: true,
        mode: 'interval',
        intervalMs: 1000,
        cron: null,
        ticks: 3,
        failures: 0,
        lastTickAt: 1_700_000_000_000,
      });
      scheduler.stop();
    });

    it('should stop ticking after stop()', () => {
      const scheduler = new EntropyRefreshScheduler(coordinator, logger, { intervalMs: 1000 }, clock);
      scheduler.start();
      vi.advanceTimersByTime(1000);
      scheduler.stop();
      vi.advanceTimersByTime(5000);

      expect(coordinator.refresh).toHaveBeenCalledTimes(1);
      expect(scheduler.isRunning()).toBe(false);
      expect(scheduler.status().mode).toBeNull();
    });

    it('should refresh immediately when runOnStart is set', () => {
      const scheduler = new EntropyRefreshScheduler(
        coordinator,
        logger,
        { intervalMs: 60_000, runOnStart: true },
        clock
      );
      scheduler.start();

      expect(coordinator.refresh).toHaveBeenCalledTimes(1);
      scheduler.stop();
    });

    it('should count and log failed refreshes and keep running', async () => {
      vi.mocked(coordinator.refresh).mockRejectedValue(new Error('collector down'));
      const scheduler = new EntropyRefreshScheduler(coordinator, logger, { intervalMs: 1000 }, clock);
      scheduler.start();

      vi.advanceTimersByTime(2000);
      await flush();

      expect(scheduler.status()).toMatchObject({
        running: true,
        ticks: 2,
        failures: 2,
        lastError: 'collector down',
      });
      expect(logger.error).toHaveBeenCalledWith(
        { error: 'collector down' },
        '[EntropyScheduler] Scheduled refresh failed'
      );
      scheduler.stop();
    });

    it('should warn when started twice', () => {
      const scheduler = new EntropyRefreshScheduler(coordinator, logger, { intervalMs: 1000 }, clock);
      scheduler.start();
      scheduler.start();

      expect(logger.warn).toHaveBeenCalledWith({}, '[EntropyScheduler] Already running');
      vi.advanceTimersByTime(1000);
      expect(coordinator.refresh).toHaveBeenCalledTimes(1);
      scheduler.stop();
    });
  });

  describe('cron mode', () => {
    it('should schedule on the cron expression', () => {
      const scheduler = new EntropyRefreshScheduler(
        coordinator,
        logger,
        { cron: '*/5 * * * *' },
        clock
      );
      scheduler.start();

      expect(cronMocks.schedule).toHaveBeenCalledTimes(1);
      const [expr, task, options] = cronMocks.schedule.mock.calls[0];
      expect(expr).toBe('*/5 * * * *');
      expect(options).toEqual({ timezone: 'UTC' });

      task();
      expect(coordinator.refresh).toHaveBeenCalledTimes(1);
      expect(scheduler.status()).toMatchObject({ mode: 'cron', cron: '*/5 * * * *', intervalMs: null, ticks: 1 });

      scheduler.stop();
      expect(cronMocks.stop).toHaveBeenCalledTimes(1);
      expect(scheduler.isRunning()).toBe(false);
    });

    it('should reject an invalid expression', () => {
      expect(() => new EntropyRefreshScheduler(coordinator, logger, { cron: 'not a cron' }, clock))
        .toThrow('[EntropyScheduler] Invalid cron expression: not a cron');
    });
  });
});
