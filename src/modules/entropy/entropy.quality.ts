/**
 * ENTROPY MODULE — Quality Analyzer
 *
 * Advisory only: a low score never blocks a refresh or a read.
 *
 * Score = min(1, 2p) where p is the chi-square(9) p-value of a 10-bin
 * uniformity test. The doubling is a display scaling, not a calibrated metric.
 */

import { ENTROPY_CONFIG } from './entropy.config.js';
import { chiSquareSurvival, chiSquareUniform, mean } from './entropy.stats.js';
import { ENTROPY_SOURCES } from './entropy.types.js';
import type { EntropyPoolSnapshot, QualityReport } from './entropy.types.js';

export function scoreObservations(values: readonly number[], bins: number = ENTROPY_CONFIG.qualityBins): number {
  if (values.length === 0) return 0;
  const stat = chiSquareUniform(values, bins);
  const pValue = chiSquareSurvival(stat, bins - 1);
  return Math.min(1, pValue * 2);
}

export function emptyQualityReport(): QualityReport {
  return {
    system_time: 0,
    crypto_secure: 0,
    atmospheric: 0,
    mathematical: 0,
    quantum_sim: 0,
    content_hash: 0,
    temporal_drift: 0,
  };
}

export class QualityAnalyzer {
  assess(pool: EntropyPoolSnapshot): QualityReport {
    const report = emptyQualityReport();
    for (const source of ENTROPY_SOURCES) {
      report[source] = scoreObservations(pool.sources[source]);
    }
    return report;
  }

  overall(report: QualityReport): number {
    return mean(Object.values(report));
  }
}

export const qualityAnalyzer = new QualityAnalyzer();
