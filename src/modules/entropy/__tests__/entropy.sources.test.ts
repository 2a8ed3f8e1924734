/**
 * Source Collector Tests
 */

import { describe, it, expect } from 'vitest';
import { createManualClock } from '../../../core/host.deps.js';
import { SourceCollector } from '../entropy.sources.js';
import { ksTwoSample } from '../entropy.stats.js';
import { ENTROPY_SOURCES } from '../entropy.types.js';

const START = 1_700_000_000_000;

const DETERMINISTIC_SOURCES = ENTROPY_SOURCES.filter(s => s !== 'crypto_secure');

describe('SourceCollector', () => {

  it('should start with an empty pool', () => {
    const collector = new SourceCollector(100, createManualClock(START));
    const pool = collector.snapshot();

    expect(pool.refreshCount).toBe(0);
    expect(pool.lastRefresh).toBe(0);
    for (const source of ENTROPY_SOURCES) {
      expect(pool.sources[source]).toEqual([]);
    }
  });

  it('should fill every source with sampleSize observations in [0, 1]', () => {
    const collector = new SourceCollector(100, createManualClock(START));
    const pool = collector.collect();

    expect(Object.keys(pool.sources).sort()).toEqual([...ENTROPY_SOURCES].sort());
    for (const source of ENTROPY_SOURCES) {
      const values = pool.sources[source];
      expect(values).toHaveLength(100);
      for (const v of values) {
        expect(v).toBeGreaterThanOrEqual(0);
        expect(v).toBeLessThanOrEqual(1);
      }
    }
  });

  it('should stamp the pool and count refreshes', () => {
    const clock = createManualClock(START);
    const collector = new SourceCollector(10, clock);

    expect(collector.collect().refreshCount).toBe(1);
    clock.advance(5000);
    const second = collector.collect();

    expect(second.refreshCount).toBe(2);
    expect(second.lastRefresh).toBe(START + 5000);
  });

  it('should differ between calls made at the same instant', () => {
    const collector = new SourceCollector(50, createManualClock(START));
    const first = collector.collect();
    const second = collector.collect();

    expect(second.sources.system_time).not.toEqual(first.sources.system_time);
    expect(second.sources.content_hash).not.toEqual(first.sources.content_hash);
    expect(second.sources.atmospheric).not.toEqual(first.sources.atmospheric);
  });

  it('should reproduce deterministic sources for the same clock and counter', () => {
    const a = new SourceCollector(50, createManualClock(START)).collect();
    const b = new SourceCollector(50, createManualClock(START)).collect();

    for (const source of DETERMINISTIC_SOURCES) {
      expect(a.sources[source]).toEqual(b.sources[source]);
    }
    expect(a.sources.crypto_secure).not.toEqual(b.sources.crypto_secure);
  });

  it('should replace observations wholesale and keep old snapshots intact', () => {
    const collector = new SourceCollector(20, createManualClock(START));
    const first = collector.collect();
    const copy = [...first.sources.content_hash];

    collector.collect();

    expect(first.sources.content_hash).toEqual(copy);
    expect(first.refreshCount).toBe(1);
    expect(Object.isFrozen(first.sources.content_hash)).toBe(true);
  });

  it('should keep sources statistically distinguishable', () => {
    const pool = new SourceCollector(500, createManualClock(START)).collect();

    let pairs = 0;
    let significant = 0;
    for (let i = 0; i < ENTROPY_SOURCES.length; i++) {
      for (let j = i + 1; j < ENTROPY_SOURCES.length; j++) {
        pairs++;
        const { pValue } = ksTwoSample(pool.sources[ENTROPY_SOURCES[i]], pool.sources[ENTROPY_SOURCES[j]]);
        if (pValue < 0.05) significant++;
      }
    }

    expect(pairs).toBe(21);
    expect(significant / pairs).toBeGreaterThanOrEqual(0.3);
  });
});
