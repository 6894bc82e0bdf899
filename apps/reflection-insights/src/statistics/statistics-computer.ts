/**
 * Statistics Computer
 * Mean, median, extremes and nearest-rank percentiles of a numeric array
 */

import { PercentileKey, StatisticsResult } from '../types';
import { PERCENTILE_RANKS } from '../utils/config';

/**
 * Zeroed result for empty input
 */
export function emptyStatistics(): StatisticsResult {
  return { mean: 0, median: 0, min: 0, max: 0, percentiles: {} };
}

/**
 * Ascending order; pairs that do not compare (NaN) are treated as equal
 */
function compareNumbers(a: number, b: number): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Value at rank p: sorted[round(p / 100 * (n - 1))], no interpolation
 */
export function nearestRank(sorted: readonly number[], p: number): number {
  const index = Math.round((p / 100) * (sorted.length - 1));
  return sorted[Math.min(index, sorted.length - 1)];
}

export function computeStatistics(values: readonly number[]): StatisticsResult {
  if (values.length === 0) {
    return emptyStatistics();
  }

  const sorted = [...values].sort(compareNumbers);
  const n = sorted.length;

  const mean = values.reduce((sum, v) => sum + v, 0) / n;
  const median = n % 2 === 0 ? (sorted[n / 2 - 1] + sorted[n / 2]) / 2 : sorted[Math.floor(n / 2)];

  const percentiles: Partial<Record<PercentileKey, number>> = {};
  for (const p of PERCENTILE_RANKS) {
    const key = `p${p}` as const;
    percentiles[key] = nearestRank(sorted, p);
  }

  return {
    mean,
    median,
    min: sorted[0],
    max: sorted[n - 1],
    percentiles,
  };
}
