/**
 * ENTROPY MODULE — Configuration
 *
 * Mixing weights, window proportions, read limits and refresh cadence.
 */

import { ENTROPY_SOURCES } from './entropy.types.js';
import type { DerivedCacheName, EntropySourceName } from './entropy.types.js';

export const ENTROPY_CONFIG = {
  apiPrefix: '/entropy',

  sampleSize: 100,
  cacheSize: 10_000,
  minCacheSize: 50,

  // Positional, aligned to the requested source list. Sums to 1.
  mixWeights: [0.2, 0.15, 0.15, 0.15, 0.1, 0.15, 0.1],

  // Share of the mixed stream per cache; exploration paths take the remainder
  windowShares: {
    stochastic_jitter: 0.2,
    clustering_weights: 0.1,
    temporal_variance: 0.2,
    content_seeds: 0.2,
    similarity_thresholds: 0.2,
  },
  clusteringDimensions: 5,

  readLimits: {
    stochastic_jitter: 1000,
    clustering_weights: 100,
    temporal_variance: 1000,
    content_seeds: 1000,
    similarity_thresholds: 1000,
    exploration_paths: 1000,
  } satisfies Record<DerivedCacheName, number>,
  mixedReadLimit: 5000,

  qualityBins: 10,

  refreshIntervalMs: 5 * 60 * 1000,   // 5 minutes
  staleAfterMs: 10 * 60 * 1000,       // 10 minutes
} as const;

export type WindowShareKey = keyof typeof ENTROPY_CONFIG.windowShares;

export interface EntropySettings {
  sampleSize: number;
  cacheSize: number;
  staleAfterMs: number;
}

export const DEFAULT_ENTROPY_SETTINGS: EntropySettings = {
  sampleSize: ENTROPY_CONFIG.sampleSize,
  cacheSize: ENTROPY_CONFIG.cacheSize,
  staleAfterMs: ENTROPY_CONFIG.staleAfterMs,
};

export function isEntropySource(name: string): name is EntropySourceName {
  return ENTROPY_SOURCES.some(source => source === name);
}
