/**
 * ENTROPY MODULE — Statistics
 *
 * Goodness-of-fit helpers: histogram, chi-square survival function,
 * Kolmogorov–Smirnov tests and the usual moments.
 */

// ═══════════════════════════════════════════════════════════════
// MOMENTS
// ═══════════════════════════════════════════════════════════════

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/** Population standard deviation. */
export function stdDev(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const m = mean(values);
  return Math.sqrt(values.reduce((a, b) => a + (b - m) ** 2, 0) / values.length);
}

export function pearson(xs: readonly number[], ys: readonly number[]): number {
  const n = Math.min(xs.length, ys.length);
  if (n < 2) return 0;

  const mx = mean(xs.slice(0, n));
  const my = mean(ys.slice(0, n));
  let cov = 0;
  let vx = 0;
  let vy = 0;
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - mx;
    const dy = ys[i] - my;
    cov += dx * dy;
    vx += dx * dx;
    vy += dy * dy;
  }
  if (vx === 0 || vy === 0) return 0;
  return cov / Math.sqrt(vx * vy);
}

// ═══════════════════════════════════════════════════════════════
// HISTOGRAM + CHI-SQUARE
// ═══════════════════════════════════════════════════════════════

/**
 * Equal-width bins over [0, 1]. The right edge is closed, so 1.0 lands in
 * the last bin; values outside the range are dropped.
 */
export function histogram(values: readonly number[], bins: number): number[] {
  const counts = new Array<number>(bins).fill(0);
  for (const v of values) {
    if (v < 0 || v > 1) continue;
    const idx = Math.min(bins - 1, Math.floor(v * bins));
    counts[idx]++;
  }
  return counts;
}

export function chiSquareUniform(values: readonly number[], bins: number): number {
  const expected = values.length / bins;
  if (expected === 0) return 0;
  return histogram(values, bins).reduce((sum, observed) => sum + (observed - expected) ** 2 / expected, 0);
}

const LANCZOS = [
  676.5203681218851,
  -1259.1392167224028,
  771.32342877765313,
  -176.61502916214059,
  12.507343278686905,
  -0.13857109526572012,
  9.9843695780195716e-6,
  1.5056327351493116e-7,
];

export function lnGamma(x: number): number {
  if (x < 0.5) {
    // Reflection
    return Math.log(Math.PI / Math.abs(Math.sin(Math.PI * x))) - lnGamma(1 - x);
  }
  const z = x - 1;
  let a = 0.99999999999980993;
  const t = z + 7.5;
  for (let i = 0; i < LANCZOS.length; i++) {
    a += LANCZOS[i] / (z + i + 1);
  }
  return 0.5 * Math.log(2 * Math.PI) + (z + 0.5) * Math.log(t) - t + Math.log(a);
}

const GAMMA_EPS = 1e-14;
const GAMMA_MAX_ITER = 500;

/** Regularized upper incomplete gamma Q(a, x). */
export function gammaQ(a: number, x: number): number {
  if (x <= 0) return 1;
  const logPrefix = -x + a * Math.log(x) - lnGamma(a);

  if (x < a + 1) {
    // Series for P(a, x)
    let term = 1 / a;
    let sum = term;
    for (let n = 1; n < GAMMA_MAX_ITER; n++) {
      term *= x / (a + n);
      sum += term;
      if (Math.abs(term) < Math.abs(sum) * GAMMA_EPS) break;
    }
    return Math.max(0, 1 - sum * Math.exp(logPrefix));
  }

  // Continued fraction for Q(a, x), modified Lentz
  const tiny = 1e-300;
  let b = x + 1 - a;
  let c = 1 / tiny;
  let d = 1 / b;
  let h = d;
  for (let i = 1; i < GAMMA_MAX_ITER; i++) {
    const an = -i * (i - a);
    b += 2;
    d = an * d + b;
    if (Math.abs(d) < tiny) d = tiny;
    c = b + an / c;
    if (Math.abs(c) < tiny) c = tiny;
    d = 1 / d;
    const delta = d * c;
    h *= delta;
    if (Math.abs(delta - 1) < GAMMA_EPS) break;
  }
  return Math.min(1, Math.exp(logPrefix) * h);
}

/** P(X >= stat) for X ~ chi-square(df). */
export function chiSquareSurvival(stat: number, df: number): number {
  return gammaQ(df / 2, stat / 2);
}

// ═══════════════════════════════════════════════════════════════
// KOLMOGOROV–SMIRNOV
// ═══════════════════════════════════════════════════════════════

export interface KsResult {
  statistic: number;
  pValue: number;
}

/** Asymptotic Kolmogorov distribution tail, Q_KS(lambda). */
export function kolmogorovTail(lambda: number): number {
  if (lambda < 1.18) {
    // The alternating series converges slowly here; use the dual form
    if (lambda <= 0) return 1;
    const y = Math.exp(-(Math.PI ** 2) / (8 * lambda ** 2));
    const sum = y + y ** 9 + y ** 25 + y ** 49;
    return Math.min(1, Math.max(0, 1 - (Math.sqrt(2 * Math.PI) / lambda) * sum));
  }
  let sum = 0;
  for (let k = 1; k <= 100; k++) {
    const term = 2 * (k % 2 === 1 ? 1 : -1) * Math.exp(-2 * k * k * lambda * lambda);
    sum += term;
    if (Math.abs(term) < 1e-12) break;
  }
  return Math.min(1, Math.max(0, sum));
}

function ksPValue(statistic: number, effectiveN: number): number {
  const sqrtN = Math.sqrt(effectiveN);
  return kolmogorovTail((sqrtN + 0.12 + 0.11 / sqrtN) * statistic);
}

/** One-sample test against Uniform(0, 1). */
export function ksUniform(values: readonly number[]): KsResult {
  const n = values.length;
  if (n === 0) return { statistic: 0, pValue: 1 };

  const sorted = [...values].sort((a, b) => a - b);
  let statistic = 0;
  for (let i = 0; i < n; i++) {
    const cdf = Math.min(1, Math.max(0, sorted[i]));
    statistic = Math.max(statistic, (i + 1) / n - cdf, cdf - i / n);
  }
  return { statistic, pValue: ksPValue(statistic, n) };
}

export function ksTwoSample(a: readonly number[], b: readonly number[]): KsResult {
  if (a.length === 0 || b.length === 0) return { statistic: 0, pValue: 1 };

  const xs = [...a].sort((p, q) => p - q);
  const ys = [...b].sort((p, q) => p - q);
  let i = 0;
  let j = 0;
  let statistic = 0;
  while (i < xs.length && j < ys.length) {
    const v = Math.min(xs[i], ys[j]);
    while (i < xs.length && xs[i] <= v) i++;
    while (j < ys.length && ys[j] <= v) j++;
    statistic = Math.max(statistic, Math.abs(i / xs.length - j / ys.length));
  }
  const effectiveN = (xs.length * ys.length) / (xs.length + ys.length);
  return { statistic, pValue: ksPValue(statistic, effectiveN) };
}
