/**
 * ENTROPY MODULE — Types
 *
 * Pool, mixed stream, derived caches and generation contracts.
 */

// ═══════════════════════════════════════════════════════════════
// SOURCES
// ═══════════════════════════════════════════════════════════════

export const ENTROPY_SOURCES = [
  'system_time',
  'crypto_secure',
  'atmospheric',
  'mathematical',
  'quantum_sim',
  'content_hash',
  'temporal_drift',
] as const;

export type EntropySourceName = typeof ENTROPY_SOURCES[number];

export type SourceObservations = Record<EntropySourceName, readonly number[]>;

/**
 * Read-only view of the entropy pool at one collection cycle.
 */
export interface EntropyPoolSnapshot {
  sources: Readonly<SourceObservations>;
  lastRefresh: number;      // epoch ms, 0 before the first collection
  refreshCount: number;
}

export type QualityReport = Record<EntropySourceName, number>;

// ═══════════════════════════════════════════════════════════════
// DERIVED CACHES
// ═══════════════════════════════════════════════════════════════

export const DERIVED_CACHES = [
  'stochastic_jitter',
  'clustering_weights',
  'temporal_variance',
  'content_seeds',
  'similarity_thresholds',
  'exploration_paths',
] as const;

export type DerivedCacheName = typeof DERIVED_CACHES[number];

export type WeightVector = readonly number[];

export interface DerivedCacheElementMap {
  stochastic_jitter: number;
  clustering_weights: WeightVector;
  temporal_variance: number;
  content_seeds: number;
  similarity_thresholds: number;
  exploration_paths: number;
}

export interface DerivedCacheMeta {
  generatedAt: number;      // epoch ms
  count: number;
  quality: QualityReport;
  refreshCount: number;
}

export interface DerivedCache<T> {
  values: readonly T[];
  meta: DerivedCacheMeta;
}

export type DerivedCaches = {
  [K in DerivedCacheName]: DerivedCache<DerivedCacheElementMap[K]>;
};

export interface CacheWindow {
  cache: DerivedCacheName;
  start: number;
  length: number;
}

// ═══════════════════════════════════════════════════════════════
// GENERATION
// ═══════════════════════════════════════════════════════════════

export interface Generation {
  id: string;
  refreshCount: number;
  builtAt: number;          // epoch ms
  pool: EntropyPoolSnapshot;
  caches: DerivedCaches;
}

export interface MixedRead {
  values: number[];
  sourcesUsed: EntropySourceName[];
  generatedAt: number;
  refreshCount: number;
}

// ═══════════════════════════════════════════════════════════════
// COORDINATOR STATUS
// ═══════════════════════════════════════════════════════════════

export type CoordinatorState = 'EMPTY' | 'READY' | 'REFRESHING';

export interface CoordinatorStatus {
  state: CoordinatorState;
  generationId: string | null;
  refreshCount: number;
  refreshQueued: boolean;
  lastBuildMs: number | null;
  lastError: string | null;
}

export interface CacheHealth {
  status: 'healthy' | 'degraded';
  cachePopulated: boolean;
  entropyFresh: boolean;
}

export interface CacheStatistics {
  count: number;
  ageSeconds: number;
  refreshCount: number;
}
