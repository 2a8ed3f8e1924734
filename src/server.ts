/**
 * Entropy Cache Service — entry point
 */

import 'dotenv/config';
import { buildApp } from './app.js';
import { loadEnv } from './config/env.js';
import { createLogger } from './core/host.deps.js';
import { EntropyCacheCoordinator } from './modules/entropy/entropy.coordinator.js';
import { EntropyRefreshScheduler } from './modules/entropy/entropy.scheduler.js';

async function main(): Promise<void> {
  const env = loadEnv();
  const logger = createLogger(env.LOG_LEVEL, 'entropy');

  const coordinator = new EntropyCacheCoordinator({
    settings: {
      sampleSize: env.ENTROPY_SAMPLE_SIZE,
      cacheSize: env.ENTROPY_CACHE_SIZE,
      staleAfterMs: env.ENTROPY_STALE_AFTER_MS,
    },
    logger,
  });

  const scheduler = new EntropyRefreshScheduler(coordinator, logger, {
    intervalMs: env.ENTROPY_REFRESH_INTERVAL_MS,
    cron: env.ENTROPY_REFRESH_CRON,
  });

  const app = buildApp({ env, coordinator, scheduler });

  if (env.ENTROPY_REFRESH_ON_START) {
    await coordinator.refresh();
  }
  scheduler.start();

  const shutdown = async (signal: string): Promise<void> => {
    app.log.info({ signal }, '[BOOT] Shutting down');
    scheduler.stop();
    await coordinator.waitForIdle();
    await app.close();
    process.exit(0);
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));

  await app.listen({ host: env.HOST, port: env.PORT });
  app.log.info(`[BOOT] Entropy Cache Service listening on ${env.HOST}:${env.PORT}`);
}

main().catch((err: unknown) => {
  console.error('[BOOT] Failed to start:', err);
  process.exit(1);
});
