/**
 * Trend Aggregator
 *
 * Builds daily, weekly and monthly series from reflections, each point
 * carrying its single most frequent emotion.
 */

import { Reflection, TrendDataPoint, TrendsResult } from '../types';
import { BucketAccumulator, resolveEmotion } from '../aggregation/bucket-accumulator';
import { averageIntensity, compareStrings, topEmotion } from '../aggregation/ranking';
import { parseTimestamp } from '../time/timestamp-resolver';
import { dayKey, monthKey, weekKey } from '../time/calendar';

export class TrendAggregator {
  compute(reflections: readonly Reflection[]): TrendsResult {
    const daily = new BucketAccumulator();
    const weekly = new BucketAccumulator();
    const monthly = new BucketAccumulator();

    for (const reflection of reflections) {
      const timestamp = parseTimestamp(reflection.timestamp);
      if (!timestamp) continue;

      const { year, month, day } = timestamp;
      const emotion = resolveEmotion(reflection);

      daily.add(dayKey(year, month, day), emotion, reflection.intensity);
      weekly.add(weekKey(year, month, day), emotion, reflection.intensity);
      monthly.add(monthKey(year, month), emotion, reflection.intensity);
    }

    return {
      daily: this.format(daily),
      weekly: this.format(weekly),
      monthly: this.format(monthly),
    };
  }

  /**
   * Points in ascending label order. For week labels that is chronological
   * only within a year.
   */
  private format(buckets: BucketAccumulator): TrendDataPoint[] {
    return buckets
      .map((date, data) => ({
        date,
        count: data.count,
        averageIntensity: averageIntensity(data.intensities),
        topEmotion: topEmotion(data.emotions.values()),
      }))
      .sort((a, b) => compareStrings(a.date, b.date));
  }
}

export function computeTrends(reflections: readonly Reflection[]): TrendsResult {
  return new TrendAggregator().compute(reflections);
}
