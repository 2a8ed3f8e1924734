/**
 * ENTROPY MODULE — Mixer
 *
 * Weighted combination of pool sources into a single stream in [0, 1).
 * Sources are cyclic: index i reads source[i mod length].
 */

import { ENTROPY_CONFIG, isEntropySource } from './entropy.config.js';
import { ENTROPY_SOURCES } from './entropy.types.js';
import type { EntropyPoolSnapshot, EntropySourceName } from './entropy.types.js';

/**
 * Resolve a caller's source list: unknown names and repeats are dropped,
 * order is kept. Nothing usable left means every source.
 */
export function resolveSources(requested?: readonly string[]): EntropySourceName[] {
  if (!requested) return [...ENTROPY_SOURCES];

  const resolved: EntropySourceName[] = [];
  for (const name of requested) {
    if (isEntropySource(name) && !resolved.includes(name)) {
      resolved.push(name);
    }
  }
  return resolved.length > 0 ? resolved : [...ENTROPY_SOURCES];
}

export function mix(
  pool: EntropyPoolSnapshot,
  count: number,
  sources: readonly EntropySourceName[] = ENTROPY_SOURCES
): number[] {
  const weights = ENTROPY_CONFIG.mixWeights;
  const active = sources.slice(0, weights.length);
  const mixed: number[] = new Array<number>(count);

  for (let i = 0; i < count; i++) {
    let value = 0;
    for (let j = 0; j < active.length; j++) {
      const observations = pool.sources[active[j]];
      if (observations.length === 0) continue;
      value += weights[j] * observations[i % observations.length];
    }
    mixed[i] = value % 1;
  }

  return mixed;
}
