/**
 * ENTROPY MODULE — Cache Coordinator
 *
 * Owns the published generation. A generation is built off to the side and
 * becomes visible through a single pointer assignment, so readers see either
 * the previous generation or the next one, never a partial build.
 *
 * Refresh requests coalesce: at most one build runs, and any number of
 * requests arriving during it collapse into one follow-up build.
 */

import { v4 as uuidv4 } from 'uuid';
import { InvalidArgumentError, NotReadyError, errorMessage } from '../../common/errors.js';
import type { Clock, Logger } from '../../core/host.deps.js';
import { createLogger, defaultClock } from '../../core/host.deps.js';
import { DEFAULT_ENTROPY_SETTINGS, ENTROPY_CONFIG } from './entropy.config.js';
import type { EntropySettings } from './entropy.config.js';
import { DerivedCacheBuilder, derivedCacheBuilder } from './entropy.derived.js';
import { mix, resolveSources } from './entropy.mixer.js';
import { QualityAnalyzer, qualityAnalyzer } from './entropy.quality.js';
import { SourceCollector } from './entropy.sources.js';
import { DERIVED_CACHES } from './entropy.types.js';
import type {
  CacheHealth,
  CacheStatistics,
  CoordinatorStatus,
  DerivedCache,
  DerivedCacheElementMap,
  DerivedCacheName,
  EntropyPoolSnapshot,
  Generation,
  MixedRead,
  QualityReport,
} from './entropy.types.js';

export interface CoordinatorOptions {
  settings?: Partial<EntropySettings>;
  collector?: SourceCollector;
  builder?: DerivedCacheBuilder;
  analyzer?: QualityAnalyzer;
  clock?: Clock;
  logger?: Logger;
}

const settle = (): undefined => undefined;

function assertCount(target: string, count: number, limit: number): void {
  if (!Number.isInteger(count) || count < 1 || count > limit) {
    throw new InvalidArgumentError(
      'count',
      `count for ${target} must be an integer between 1 and ${limit}, got ${count}`
    );
  }
}

// ═══════════════════════════════════════════════════════════════
// COORDINATOR
// ═══════════════════════════════════════════════════════════════

export class EntropyCacheCoordinator {
  readonly settings: EntropySettings;
  private readonly collector: SourceCollector;
  private readonly builder: DerivedCacheBuilder;
  private readonly analyzer: QualityAnalyzer;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private current: Generation | null = null;
  private inFlight: Promise<Generation> | null = null;
  private queued: Promise<Generation> | null = null;
  private lastBuildMs: number | null = null;
  private lastError: string | null = null;

  constructor(options: CoordinatorOptions = {}) {
    this.settings = { ...DEFAULT_ENTROPY_SETTINGS, ...options.settings };
    this.clock = options.clock ?? defaultClock;
    this.collector = options.collector ?? new SourceCollector(this.settings.sampleSize, this.clock);
    this.builder = options.builder ?? derivedCacheBuilder;
    this.analyzer = options.analyzer ?? qualityAnalyzer;
    this.logger = options.logger ?? createLogger('info', 'entropy');
  }

  // ═══════════════════════════════════════════════════════════════
  // READS
  // ═══════════════════════════════════════════════════════════════

  /**
   * First `count` values of a derived cache from the published generation.
   * Only an empty coordinator waits, for the first build.
   */
  async read<K extends DerivedCacheName>(cache: K, count: number): Promise<Array<DerivedCacheElementMap[K]>> {
    assertCount(cache, count, ENTROPY_CONFIG.readLimits[cache]);
    const generation = this.current ?? await this.firstGeneration();
    const derived: DerivedCache<DerivedCacheElementMap[K]> = generation.caches[cache];
    return derived.values.slice(0, count);
  }

  /**
   * Mixed stream over the published generation's pool snapshot.
   */
  async readMixed(count: number, sources?: readonly string[]): Promise<MixedRead> {
    assertCount('mixed', count, ENTROPY_CONFIG.mixedReadLimit);
    const generation = this.current ?? await this.firstGeneration();
    const sourcesUsed = resolveSources(sources);
    return {
      values: mix(generation.pool, count, sourcesUsed),
      sourcesUsed,
      generatedAt: generation.builtAt,
      refreshCount: generation.refreshCount,
    };
  }

  getGeneration(): Generation | null {
    return this.current;
  }

  private async firstGeneration(): Promise<Generation> {
    try {
      return await (this.inFlight ?? this.refresh());
    } catch (err) {
      throw new NotReadyError(`Entropy cache is not ready: ${errorMessage(err)}`);
    }
  }

  // ═══════════════════════════════════════════════════════════════
  // REFRESH
  // ═══════════════════════════════════════════════════════════════

  /**
   * Request a new generation. Resolves once a generation whose build started
   * after this call is published; rejects if that build fails.
   */
  refresh(): Promise<Generation> {
    if (this.queued) {
      return this.queued;
    }

    if (this.inFlight) {
      const queued = this.inFlight.then(settle, settle).then(() => {
        this.queued = null;
        return this.startBuild();
      });
      this.queued = queued;
      return queued;
    }

    return this.startBuild();
  }

  /**
   * Resolves when no build is running or queued.
   */
  async waitForIdle(): Promise<void> {
    let pending = this.queued ?? this.inFlight;
    while (pending) {
      await pending.then(settle, settle);
      pending = this.queued ?? this.inFlight;
    }
  }

  private startBuild(): Promise<Generation> {
    const run = this.buildGeneration().finally(() => {
      if (this.inFlight === run) {
        this.inFlight = null;
      }
    });
    this.inFlight = run;
    return run;
  }

  private async buildGeneration(): Promise<Generation> {
    // Let the requester return before the CPU-bound part starts
    await Promise.resolve();
    const startedAt = performance.now();

    try {
      const pool = this.collector.collect();
      const quality = this.analyzer.assess(pool);
      const builtAt = this.clock.now();
      const stream = mix(pool, this.settings.cacheSize);
      const caches = this.builder.build(stream, {
        generatedAt: builtAt,
        refreshCount: pool.refreshCount,
        quality,
      });

      const generation: Generation = Object.freeze({
        id: uuidv4(),
        refreshCount: pool.refreshCount,
        builtAt,
        pool,
        caches,
      });

      this.current = generation;
      this.lastBuildMs = Math.round((performance.now() - startedAt) * 100) / 100;
      this.lastError = null;

      this.logger.info(
        { generationId: generation.id, refreshCount: generation.refreshCount, buildMs: this.lastBuildMs },
        'Entropy generation published'
      );
      return generation;
    } catch (err) {
      this.lastError = errorMessage(err);
      this.logger.error(
        { error: this.lastError, generationId: this.current?.id ?? null },
        'Entropy refresh failed, keeping published generation'
      );
      throw err;
    }
  }

  // ═══════════════════════════════════════════════════════════════
  // MONITORING
  // ═══════════════════════════════════════════════════════════════

  /** Quality of the live pool, which may be newer than the published generation. */
  qualityReport(): QualityReport {
    return this.analyzer.assess(this.collector.snapshot());
  }

  overallQuality(report: QualityReport): number {
    return this.analyzer.overall(report);
  }

  livePool(): EntropyPoolSnapshot {
    return this.collector.snapshot();
  }

  health(): CacheHealth {
    const pool = this.collector.snapshot();
    const cachePopulated = this.current !== null;
    const entropyFresh = pool.refreshCount > 0
      && this.clock.now() - pool.lastRefresh < this.settings.staleAfterMs;

    return {
      status: cachePopulated && entropyFresh ? 'healthy' : 'degraded',
      cachePopulated,
      entropyFresh,
    };
  }

  cacheStatistics(): Partial<Record<DerivedCacheName, CacheStatistics>> {
    const generation = this.current;
    if (!generation) return {};

    const now = this.clock.now();
    const stats: Partial<Record<DerivedCacheName, CacheStatistics>> = {};
    for (const cache of DERIVED_CACHES) {
      const meta = generation.caches[cache].meta;
      stats[cache] = {
        count: meta.count,
        ageSeconds: (now - meta.generatedAt) / 1000,
        refreshCount: meta.refreshCount,
      };
    }
    return stats;
  }

  status(): CoordinatorStatus {
    return {
      state: this.inFlight ? 'REFRESHING' : this.current ? 'READY' : 'EMPTY',
      generationId: this.current?.id ?? null,
      refreshCount: this.current?.refreshCount ?? 0,
      refreshQueued: this.queued !== null,
      lastBuildMs: this.lastBuildMs,
      lastError: this.lastError,
    };
  }
}
