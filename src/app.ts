import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { AppError } from './common/errors.js';
import type { Env } from './config/env.js';
import { toEpochSeconds } from './core/host.deps.js';
import { registerEntropyRoutes } from './modules/entropy/entropy.routes.js';
import type { EntropyCacheCoordinator } from './modules/entropy/entropy.coordinator.js';
import type { EntropyRefreshScheduler } from './modules/entropy/entropy.scheduler.js';
import { DERIVED_CACHES, ENTROPY_SOURCES } from './modules/entropy/entropy.types.js';

const SERVICE_NAME = 'Entropy Cache Service';

export interface BuildAppOptions {
  env: Pick<Env, 'LOG_LEVEL' | 'CORS_ORIGINS' | 'NODE_ENV'>;
  coordinator: EntropyCacheCoordinator;
  scheduler?: EntropyRefreshScheduler;
}

/**
 * Build Fastify Application
 */
export function buildApp(options: BuildAppOptions): FastifyInstance {
  const { env, coordinator, scheduler } = options;

  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL,
    },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(','),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof ZodError) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.issues.map(issue => `${issue.path.join('.') || 'query'}: ${issue.message}`).join('; '),
      });
    }

    if (err instanceof AppError) {
      if (err.statusCode >= 500) app.log.error(err);
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    // Fastify validation errors
    if (err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    app.log.error(err);

    // Unknown errors
    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  // Service info
  app.get('/', async () => {
    const pool = coordinator.livePool();
    return {
      service: SERVICE_NAME,
      status: 'active',
      entropy_sources: ENTROPY_SOURCES.length,
      cache_types: [...DERIVED_CACHES],
      last_refresh: toEpochSeconds(pool.lastRefresh),
      quality_metrics: coordinator.qualityReport(),
    };
  });

  app.get('/health', async () => {
    const health = coordinator.health();
    return {
      status: health.status,
      cache_populated: health.cachePopulated,
      entropy_fresh: health.entropyFresh,
      service: SERVICE_NAME,
      uptime_seconds: process.uptime(),
    };
  });

  app.register(async (fastify) => {
    await registerEntropyRoutes(fastify, { coordinator, scheduler });
  });

  return app;
}
