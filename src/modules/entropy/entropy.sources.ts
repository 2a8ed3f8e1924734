/**
 * ENTROPY MODULE — Source Collector
 *
 * Seven formula families, each mapping into [0, 1]. All but crypto_secure are
 * deterministic in (clock time, draw counter, refresh count): the pool is
 * meant to give reproducible variety, not security-grade randomness.
 */

import { createHash, randomBytes } from 'crypto';
import type { Clock } from '../../core/host.deps.js';
import { defaultClock } from '../../core/host.deps.js';
import { ENTROPY_CONFIG } from './entropy.config.js';
import { ENTROPY_SOURCES } from './entropy.types.js';
import type { EntropyPoolSnapshot, EntropySourceName, SourceObservations } from './entropy.types.js';

const UINT32 = 2 ** 32;

// Weyl step for the time source; coprime with the modulus
const TIME_MODULUS = 10_000;
const TIME_STEP = 7919;

const LOGISTIC_STRIDE = 3;

export interface CollectionContext {
  now: number;          // epoch ms
  draw: number;         // counter value at the start of the cycle
  refreshCount: number; // count this cycle will publish
  sampleSize: number;
}

type SourceFormula = (ctx: CollectionContext) => number[];

// ═══════════════════════════════════════════════════════════════
// HASH HELPERS
// ═══════════════════════════════════════════════════════════════

function fnv1a32(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

// murmur3 finalizer; FNV alone barely moves the high bits for near-equal inputs
function avalanche32(h: number): number {
  let x = h;
  x ^= x >>> 16;
  x = Math.imul(x, 0x85ebca6b);
  x ^= x >>> 13;
  x = Math.imul(x, 0xc2b2ae35);
  x ^= x >>> 16;
  return x >>> 0;
}

function fract(x: number): number {
  return x - Math.floor(x);
}

// ═══════════════════════════════════════════════════════════════
// FORMULAS
// ═══════════════════════════════════════════════════════════════

const systemTime: SourceFormula = ({ now, draw, sampleSize }) => {
  const values: number[] = [];
  for (let i = 0; i < sampleSize; i++) {
    const tick = now * 1000 + (draw + i) * TIME_STEP;
    values.push((tick % TIME_MODULUS) / TIME_MODULUS);
  }
  return values;
};

const cryptoSecure: SourceFormula = ({ sampleSize }) => {
  const bytes = randomBytes(sampleSize * 4);
  const values: number[] = [];
  for (let i = 0; i < sampleSize; i++) {
    values.push(bytes.readUInt32BE(i * 4) / UINT32);
  }
  return values;
};

const atmospheric: SourceFormula = ({ now, draw, sampleSize }) => {
  const values: number[] = [];
  for (let i = 0; i < sampleSize; i++) {
    const reading = `${now + i * 0.001}:${draw + i}`;
    values.push(avalanche32(fnv1a32(reading)) / UINT32);
  }
  return values;
};

const mathematical: SourceFormula = ({ now, draw, sampleSize }) => {
  // r stays within [3.98, 4.0], so the orbit never leaves [0, 1]
  const r = 3.99 + 0.01 * Math.sin(now * 1e-4);
  let x = 0.1 + 0.8 * fract(now * 0.000618 + draw * 0.618034);
  const values: number[] = [];
  for (let i = 0; i < sampleSize; i++) {
    for (let step = 0; step < LOGISTIC_STRIDE; step++) {
      x = r * x * (1 - x);
    }
    values.push(x);
  }
  return values;
};

const quantumSim: SourceFormula = ({ now, draw, sampleSize }) => {
  const values: number[] = [];
  for (let i = 0; i < sampleSize; i++) {
    const phase = 2 * Math.PI * fract(Math.sin((now % 1e7) * 1e-3 + (draw + i) * 12.9898) * 43758.5453);
    values.push(Math.sin(phase) ** 2);
  }
  return values;
};

const contentHash: SourceFormula = ({ now, refreshCount, sampleSize }) => {
  const values: number[] = [];
  for (let i = 0; i < sampleSize; i++) {
    const digest = createHash('sha256').update(`entropy_${now}_${refreshCount}_${i}`).digest();
    values.push(digest.readUInt32BE(0) / UINT32);
  }
  return values;
};

const temporalDrift: SourceFormula = ({ now, draw, sampleSize }) => {
  const t = now / 1000;
  const values: number[] = [];
  for (let i = 0; i < sampleSize; i++) {
    const k = draw + i;
    const drift = Math.sin(t * 0.01 + k * 1.7) * Math.cos(t * 0.007 + k * 2.3);
    values.push((drift + 1) / 2);
  }
  return values;
};

export const SOURCE_FORMULAS: Record<EntropySourceName, SourceFormula> = {
  system_time: systemTime,
  crypto_secure: cryptoSecure,
  atmospheric,
  mathematical,
  quantum_sim: quantumSim,
  content_hash: contentHash,
  temporal_drift: temporalDrift,
};

// ═══════════════════════════════════════════════════════════════
// COLLECTOR
// ═══════════════════════════════════════════════════════════════

function emptySources(): SourceObservations {
  return {
    system_time: [],
    crypto_secure: [],
    atmospheric: [],
    mathematical: [],
    quantum_sim: [],
    content_hash: [],
    temporal_drift: [],
  };
}

export class SourceCollector {
  private sources: SourceObservations = emptySources();
  private lastRefresh = 0;
  private refreshCount = 0;
  private draw = 0;

  constructor(
    private readonly sampleSize: number = ENTROPY_CONFIG.sampleSize,
    private readonly clock: Clock = defaultClock
  ) {}

  /**
   * Regenerate every source and publish a new pool.
   */
  collect(): EntropyPoolSnapshot {
    const ctx: CollectionContext = {
      now: this.clock.now(),
      draw: this.draw,
      refreshCount: this.refreshCount + 1,
      sampleSize: this.sampleSize,
    };

    const next = emptySources();
    for (const source of ENTROPY_SOURCES) {
      next[source] = Object.freeze(SOURCE_FORMULAS[source](ctx));
    }

    this.sources = next;
    this.lastRefresh = ctx.now;
    this.refreshCount = ctx.refreshCount;
    this.draw += this.sampleSize;

    return this.snapshot();
  }

  /**
   * Current pool. Observation arrays are frozen and replaced wholesale,
   * so a snapshot stays valid after later collections.
   */
  snapshot(): EntropyPoolSnapshot {
    return Object.freeze({
      sources: Object.freeze({ ...this.sources }),
      lastRefresh: this.lastRefresh,
      refreshCount: this.refreshCount,
    });
  }
}
