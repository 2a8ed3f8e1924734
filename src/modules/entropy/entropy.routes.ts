/**
 * ENTROPY ROUTES — HTTP Endpoints
 *
 * Derived-cache reads, mixed stream, quality and manual refresh.
 * Wire format is snake_case with epoch-second timestamps.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { toEpochSeconds } from '../../core/host.deps.js';
import { ENTROPY_CONFIG } from './entropy.config.js';
import type { EntropyCacheCoordinator } from './entropy.coordinator.js';
import type { EntropyRefreshScheduler } from './entropy.scheduler.js';
import { MixedQuery, countQuery } from './entropy.schemas.js';
import { DERIVED_CACHES, ENTROPY_SOURCES } from './entropy.types.js';
import type { DerivedCacheName } from './entropy.types.js';

export interface EntropyRouteDeps {
  coordinator: EntropyCacheCoordinator;
  scheduler?: EntropyRefreshScheduler;
}

interface CacheRoute {
  path: string;
  cache: DerivedCacheName;
  defaultCount: number;
}

const CACHE_ROUTES: CacheRoute[] = [
  { path: '/jitter', cache: 'stochastic_jitter', defaultCount: 10 },
  { path: '/clustering-weights', cache: 'clustering_weights', defaultCount: 5 },
  { path: '/temporal-variance', cache: 'temporal_variance', defaultCount: 10 },
  { path: '/similarity-thresholds', cache: 'similarity_thresholds', defaultCount: 10 },
  { path: '/exploration-paths', cache: 'exploration_paths', defaultCount: 50 },
  { path: '/content-seeds', cache: 'content_seeds', defaultCount: 10 },
];

// ═══════════════════════════════════════════════════════════════
// ROUTE REGISTRATION
// ═══════════════════════════════════════════════════════════════

export async function registerEntropyRoutes(app: FastifyInstance, deps: EntropyRouteDeps): Promise<void> {
  const prefix = ENTROPY_CONFIG.apiPrefix;
  const { coordinator, scheduler } = deps;

  /**
   * GET /entropy/<cache>?count=N
   *
   * First N values of a derived cache
   */
  for (const route of CACHE_ROUTES) {
    const query = countQuery(ENTROPY_CONFIG.readLimits[route.cache], route.defaultCount);

    app.get(`${prefix}${route.path}`, async (request: FastifyRequest) => {
      const { count } = query.parse(request.query);
      return coordinator.read(route.cache, count);
    });
  }

  /**
   * GET /entropy/mixed?count=N&sources=a,b
   *
   * Weighted mix over the published pool snapshot
   */
  app.get(`${prefix}/mixed`, async (request: FastifyRequest) => {
    const { count, sources } = MixedQuery.parse(request.query);
    const mixed = await coordinator.readMixed(count, sources);

    return {
      values: mixed.values,
      count: mixed.values.length,
      sources_used: mixed.sourcesUsed,
      quality: coordinator.qualityReport(),
      metadata: {
        generated_at: toEpochSeconds(mixed.generatedAt),
        refresh_count: mixed.refreshCount,
      },
    };
  });

  /**
   * GET /entropy/quality
   *
   * Per-source quality of the live pool plus derived cache statistics
   */
  app.get(`${prefix}/quality`, async () => {
    const quality = coordinator.qualityReport();
    const cacheStatistics: Record<string, { count: number; age_seconds: number; refresh_count: number }> = {};
    const statistics = coordinator.cacheStatistics();
    for (const cache of DERIVED_CACHES) {
      const stats = statistics[cache];
      if (!stats) continue;
      cacheStatistics[cache] = {
        count: stats.count,
        age_seconds: stats.ageSeconds,
        refresh_count: stats.refreshCount,
      };
    }

    return {
      entropy_quality: quality,
      cache_statistics: cacheStatistics,
      overall_quality: coordinator.overallQuality(quality),
      entropy_sources: [...ENTROPY_SOURCES],
    };
  });

  /**
   * POST /entropy/refresh
   *
   * Accepted immediately; the build runs in the background
   */
  app.post(`${prefix}/refresh`, async (_request, reply) => {
    const previous = coordinator.livePool();

    void coordinator.refresh().catch((err: unknown) => {
      app.log.error({ err }, '[Entropy] Manual refresh failed');
    });

    return reply.status(202).send({
      message: 'Entropy cache refresh initiated',
      previous_refresh: toEpochSeconds(previous.lastRefresh),
      refresh_count: previous.refreshCount,
    });
  });

  /**
   * GET /entropy/status
   *
   * Coordinator state and scheduler bookkeeping
   */
  app.get(`${prefix}/status`, async () => ({
    coordinator: coordinator.status(),
    scheduler: scheduler?.status() ?? null,
  }));

  app.log.info('[Entropy] Routes registered');
}
