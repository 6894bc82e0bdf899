/**
 * Time Pattern Aggregator
 *
 * Buckets reflections by day of week, time of day and calendar month.
 */

import { Reflection, TimePattern, TimePatternsResult } from '../types';
import { BucketAccumulator, resolveEmotion } from '../aggregation/bucket-accumulator';
import { averageIntensity, compareStrings, rankEmotions } from '../aggregation/ranking';
import { parseTimestamp } from '../time/timestamp-resolver';
import { DAY_NAMES, TIME_OF_DAY_NAMES, monthKey, timeOfDay } from '../time/calendar';
import { CONFIG } from '../utils/config';

export class TimePatternAggregator {
  constructor(private readonly topEmotionsLimit: number = CONFIG.analytics.topEmotionsLimit) {}

  /**
   * Compute all three pattern dimensions. Reflections whose timestamp
   * does not resolve are skipped.
   */
  compute(reflections: readonly Reflection[]): TimePatternsResult {
    const dayOfWeek = new BucketAccumulator();
    const timeOfDayBuckets = new BucketAccumulator();
    const month = new BucketAccumulator();

    for (const reflection of reflections) {
      const timestamp = parseTimestamp(reflection.timestamp);
      if (!timestamp) continue;

      const emotion = resolveEmotion(reflection);

      dayOfWeek.add(DAY_NAMES[timestamp.weekday], emotion, reflection.intensity);
      timeOfDayBuckets.add(timeOfDay(timestamp.hour), emotion, reflection.intensity);
      month.add(monthKey(timestamp.year, timestamp.month), emotion, reflection.intensity);
    }

    return {
      dayOfWeek: this.orderCanonically(this.format(dayOfWeek), DAY_NAMES),
      timeOfDay: this.orderCanonically(this.format(timeOfDayBuckets), TIME_OF_DAY_NAMES),
      month: this.format(month).sort(
        (a, b) => b.count - a.count || compareStrings(a.period, b.period)
      ),
    };
  }

  private format(buckets: BucketAccumulator): TimePattern[] {
    return buckets.map((period, data) => ({
      period,
      count: data.count,
      averageIntensity: averageIntensity(data.intensities),
      topEmotions: rankEmotions(data.emotions.values(), this.topEmotionsLimit),
    }));
  }

  /**
   * Sort by position in a fixed label list; labels missing from it go
   * last, by count descending
   */
  private orderCanonically(patterns: TimePattern[], order: readonly string[]): TimePattern[] {
    return patterns.sort((a, b) => {
      const aIndex = order.indexOf(a.period);
      const bIndex = order.indexOf(b.period);

      if (aIndex !== -1 && bIndex !== -1) return aIndex - bIndex;
      if (aIndex !== -1) return -1;
      if (bIndex !== -1) return 1;
      return b.count - a.count || compareStrings(a.period, b.period);
    });
  }
}

/**
 * Functional form of TimePatternAggregator.compute with default limits
 */
export function computeTimePatterns(reflections: readonly Reflection[]): TimePatternsResult {
  return new TimePatternAggregator().compute(reflections);
}
