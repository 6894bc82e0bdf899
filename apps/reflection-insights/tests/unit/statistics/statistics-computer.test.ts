/**
 * Statistics Computer Tests
 */

import { computeStatistics, emptyStatistics, nearestRank } from '../../../src/statistics/statistics-computer';
import { StatisticsResult } from '../../../src/types';

const ordered = (result: StatisticsResult): number[] => [
  result.min,
  result.percentiles.p10 ?? NaN,
  result.percentiles.p25 ?? NaN,
  result.median,
  result.percentiles.p75 ?? NaN,
  result.percentiles.p90 ?? NaN,
  result.percentiles.p95 ?? NaN,
  result.percentiles.p99 ?? NaN,
  result.max,
];

describe('computeStatistics', () => {
  it('should summarise 1..5', () => {
    expect(computeStatistics([1, 2, 3, 4, 5])).toEqual({
      mean: 3,
      median: 3,
      min: 1,
      max: 5,
      percentiles: { p10: 1, p25: 2, p50: 3, p75: 4, p90: 5, p95: 5, p99: 5 },
    });
  });

  it('should return the zeroed result for no values', () => {
    expect(computeStatistics([])).toEqual({ mean: 0, median: 0, min: 0, max: 0, percentiles: {} });
    expect(emptyStatistics()).toEqual(computeStatistics([]));
  });

  it('should average the two middle values for even lengths', () => {
    const result = computeStatistics([10, 2, 8, 4]);

    expect(result.median).toBe(6);
    expect(result.min).toBe(2);
    expect(result.max).toBe(10);
    expect(result.mean).toBe(6);
  });

  it('should use nearest-rank percentiles without interpolation', () => {
    const values = Array.from({ length: 11 }, (_, i) => i * 10);   // 0, 10, .. 100
    const result = computeStatistics(values);

    expect(result.percentiles).toEqual({
      p10: 10,
      p25: 30,     // round(2.5) = 3
      p50: 50,
      p75: 80,     // round(7.5) = 8
      p90: 90,
      p95: 100,    // round(9.5) = 10
      p99: 100,
    });
  });

  it('should emit percentile keys in ascending order', () => {
    expect(Object.keys(computeStatistics([4, 1]).percentiles)).toEqual([
      'p10',
      'p25',
      'p50',
      'p75',
      'p90',
      'p95',
      'p99',
    ]);
  });

  it('should handle a single value', () => {
    expect(computeStatistics([-2.5])).toEqual({
      mean: -2.5,
      median: -2.5,
      min: -2.5,
      max: -2.5,
      percentiles: { p10: -2.5, p25: -2.5, p50: -2.5, p75: -2.5, p90: -2.5, p95: -2.5, p99: -2.5 },
    });
  });

  it('should not reorder the caller array', () => {
    const values = [3, 1, 2];
    computeStatistics(values);
    expect(values).toEqual([3, 1, 2]);
  });

  it('should keep order statistics monotonic and the mean within range', () => {
    const samples = [
      [5, -1, 3.5, 3.5, 100, 0, 42],
      [1, 1, 1, 1],
      [9, 8, 7, 6, 5, 4, 3, 2, 1, 0, -1, -2],
      Array.from({ length: 57 }, (_, i) => ((i * 37) % 23) - 11),
    ];

    for (const values of samples) {
      const result = computeStatistics(values);
      const chain = ordered(result);

      for (let i = 1; i < chain.length; i++) {
        expect(chain[i - 1]).toBeLessThanOrEqual(chain[i]);
      }
      expect(result.mean).toBeGreaterThanOrEqual(result.min);
      expect(result.mean).toBeLessThanOrEqual(result.max);
    }
  });
});

describe('nearestRank', () => {
  it('should clamp to the last element', () => {
    expect(nearestRank([1, 2, 3], 100)).toBe(3);
    expect(nearestRank([1, 2, 3], 0)).toBe(1);
  });
});
