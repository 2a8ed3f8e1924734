/**
 * ENTROPY MODULE — Refresh Scheduler
 * ===================================
 * Periodic refresh of the entropy cache. Runs on a fixed interval, or on a
 * cron expression when one is configured. Every tick goes through
 * coordinator.refresh(), so a tick that lands on a running build coalesces
 * with it instead of starting a second one.
 */

import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import { errorMessage } from '../../common/errors.js';
import type { Clock, Logger } from '../../core/host.deps.js';
import { defaultClock } from '../../core/host.deps.js';
import { ENTROPY_CONFIG } from './entropy.config.js';
import type { EntropyCacheCoordinator } from './entropy.coordinator.js';

export interface SchedulerConfig {
  intervalMs: number;         // Refresh interval, ignored when cron is set
  cron?: string;              // Cron expression, e.g. '*/5 * * * *'
  timezone: string;
  runOnStart: boolean;        // Refresh immediately on start
}

export interface SchedulerStatus {
  running: boolean;
  mode: 'interval' | 'cron' | null;
  intervalMs: number | null;
  cron: string | null;
  ticks: number;
  failures: number;
  lastTickAt: number | null;
  lastError: string | null;
}

const DEFAULT_CONFIG: SchedulerConfig = {
  intervalMs: ENTROPY_CONFIG.refreshIntervalMs,
  timezone: 'UTC',
  runOnStart: false,
};

export class EntropyRefreshScheduler {
  private readonly config: SchedulerConfig;
  private timer: NodeJS.Timeout | null = null;
  private cronJob: ScheduledTask | null = null;
  private ticks = 0;
  private failures = 0;
  private lastTickAt: number | null = null;
  private lastError: string | null = null;

  constructor(
    private readonly coordinator: EntropyCacheCoordinator,
    private readonly logger: Logger,
    config?: Partial<SchedulerConfig>,
    private readonly clock: Clock = defaultClock
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (this.config.cron !== undefined && !cron.validate(this.config.cron)) {
      throw new Error(`[EntropyScheduler] Invalid cron expression: ${this.config.cron}`);
    }
  }

  // ═══════════════════════════════════════════════════════════════
  // LIFECYCLE
  // ═══════════════════════════════════════════════════════════════

  start(): void {
    if (this.isRunning()) {
      this.logger.warn({}, '[EntropyScheduler] Already running');
      return;
    }

    if (this.config.cron !== undefined) {
      this.cronJob = cron.schedule(this.config.cron, () => this.tick(), {
        timezone: this.config.timezone,
      });
      this.logger.info({ cron: this.config.cron }, '[EntropyScheduler] Started (cron)');
    } else {
      this.timer = setInterval(() => this.tick(), this.config.intervalMs);
      this.logger.info(
        { intervalMs: this.config.intervalMs },
        `[EntropyScheduler] Started (interval: ${this.config.intervalMs / 1000}s)`
      );
    }

    if (this.config.runOnStart) {
      this.tick();
    }
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.cronJob) {
      this.cronJob.stop();
      this.cronJob = null;
    }
    this.logger.info({}, '[EntropyScheduler] Stopped');
  }

  isRunning(): boolean {
    return this.timer !== null || this.cronJob !== null;
  }

  status(): SchedulerStatus {
    const mode = this.cronJob ? 'cron' : this.timer ? 'interval' : null;
    return {
      running: this.isRunning(),
      mode,
      intervalMs: mode === 'interval' ? this.config.intervalMs : null,
      cron: mode === 'cron' ? this.config.cron ?? null : null,
      ticks: this.ticks,
      failures: this.failures,
      lastTickAt: this.lastTickAt,
      lastError: this.lastError,
    };
  }

  // ═══════════════════════════════════════════════════════════════
  // TICK
  // ═══════════════════════════════════════════════════════════════

  /**
   * Fire-and-forget: a failed refresh is logged and retried next tick.
   */
  private tick(): void {
    this.ticks++;
    this.lastTickAt = this.clock.now();

    void this.coordinator.refresh().then(
      (generation) => {
        this.lastError = null;
        this.logger.debug?.(
          { refreshCount: generation.refreshCount },
          '[EntropyScheduler] Scheduled refresh completed'
        );
      },
      (err: unknown) => {
        this.failures++;
        this.lastError = errorMessage(err);
        this.logger.error({ error: this.lastError }, '[EntropyScheduler] Scheduled refresh failed');
      }
    );
  }
}
