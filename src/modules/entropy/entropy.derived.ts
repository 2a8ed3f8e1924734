/**
 * ENTROPY MODULE — Derived Cache Builder
 *
 * Splits a mixed stream into consecutive, non-overlapping windows and
 * shapes each one for its consumer. Ranges hold by construction of the
 * transform; nothing is clamped afterwards.
 */

import { ENTROPY_CONFIG } from './entropy.config.js';
import type { WindowShareKey } from './entropy.config.js';
import type {
  CacheWindow,
  DerivedCache,
  DerivedCacheMeta,
  DerivedCacheName,
  DerivedCaches,
  QualityReport,
  WeightVector,
} from './entropy.types.js';

const SEED_SCALE = 2 ** 31;

// ═══════════════════════════════════════════════════════════════
// WINDOW PLAN
// ═══════════════════════════════════════════════════════════════

const WINDOW_ORDER: WindowShareKey[] = [
  'stochastic_jitter',
  'clustering_weights',
  'temporal_variance',
  'content_seeds',
  'similarity_thresholds',
];

/**
 * Window layout for a stream of `total` values. The clustering window is cut
 * to whole vectors; exploration paths take whatever is left.
 */
export function planWindows(total: number): CacheWindow[] {
  const dims = ENTROPY_CONFIG.clusteringDimensions;
  const windows: CacheWindow[] = [];
  let start = 0;

  for (const cache of WINDOW_ORDER) {
    let length = Math.floor(total * ENTROPY_CONFIG.windowShares[cache]);
    if (cache === 'clustering_weights') {
      length -= length % dims;
    }
    windows.push({ cache, start, length });
    start += length;
  }

  windows.push({ cache: 'exploration_paths', start, length: Math.max(0, total - start) });
  return windows;
}

// ═══════════════════════════════════════════════════════════════
// TRANSFORMS
// ═══════════════════════════════════════════════════════════════

export const toJitter = (v: number): number => (v - 0.5) * 0.2;
export const toTemporalVariance = (v: number): number => 0.5 + v * 1.5;
export const toContentSeed = (v: number): number => Math.floor(v * SEED_SCALE);
export const toSimilarityThreshold = (v: number): number => 0.1 + v * 0.7;

/**
 * Consecutive groups of `dims` values normalised to sum 1.
 * A group summing to zero yields no vector; a trailing partial group is dropped.
 */
export function toWeightVectors(window: readonly number[], dims: number): WeightVector[] {
  const vectors: WeightVector[] = [];
  for (let i = 0; i + dims <= window.length; i += dims) {
    const group = window.slice(i, i + dims);
    const sum = group.reduce((a, b) => a + b, 0);
    if (sum > 0) {
      vectors.push(Object.freeze(group.map(w => w / sum)));
    }
  }
  return vectors;
}

// ═══════════════════════════════════════════════════════════════
// BUILDER
// ═══════════════════════════════════════════════════════════════

export interface BuildContext {
  generatedAt: number;
  refreshCount: number;
  quality: QualityReport;
}

export class DerivedCacheBuilder {
  build(stream: readonly number[], ctx: BuildContext): DerivedCaches {
    const slices = new Map<DerivedCacheName, readonly number[]>();
    for (const window of planWindows(stream.length)) {
      slices.set(window.cache, stream.slice(window.start, window.start + window.length));
    }
    const windowOf = (cache: DerivedCacheName): readonly number[] => slices.get(cache) ?? [];

    return Object.freeze({
      stochastic_jitter: this.pack(windowOf('stochastic_jitter').map(toJitter), ctx),
      clustering_weights: this.pack(
        toWeightVectors(windowOf('clustering_weights'), ENTROPY_CONFIG.clusteringDimensions),
        ctx
      ),
      temporal_variance: this.pack(windowOf('temporal_variance').map(toTemporalVariance), ctx),
      content_seeds: this.pack(windowOf('content_seeds').map(toContentSeed), ctx),
      similarity_thresholds: this.pack(windowOf('similarity_thresholds').map(toSimilarityThreshold), ctx),
      exploration_paths: this.pack([...windowOf('exploration_paths')], ctx),
    });
  }

  private pack<T>(values: T[], ctx: BuildContext): DerivedCache<T> {
    const meta: DerivedCacheMeta = Object.freeze({
      generatedAt: ctx.generatedAt,
      count: values.length,
      quality: ctx.quality,
      refreshCount: ctx.refreshCount,
    });
    return Object.freeze({ values: Object.freeze(values), meta });
  }
}

export const derivedCacheBuilder = new DerivedCacheBuilder();
