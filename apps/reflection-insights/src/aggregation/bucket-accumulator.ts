/**
 * Bucket Accumulator
 *
 * Shared per-period accumulation for the time-based aggregators: record
 * count, present intensities and a tally of primary emotions.
 */

import { EmotionCount, Reflection } from '../types';
import { CONFIG } from '../utils/config';

export interface EmotionRef {
  emotionId: string;
  emotionName: string;
}

export interface BucketData {
  count: number;
  intensities: number[];
  emotions: Map<string, EmotionCount>;
}

/**
 * Primary emotion of a reflection, with "unknown"/"Unknown" standing in
 * for absent fields
 */
export function resolveEmotion(reflection: Reflection): EmotionRef {
  return {
    emotionId: reflection.emotionId ?? CONFIG.analytics.unknownEmotion.id,
    emotionName: reflection.emotionName ?? CONFIG.analytics.unknownEmotion.name,
  };
}

export class BucketAccumulator {
  private readonly buckets = new Map<string, BucketData>();

  /**
   * Count one reflection into a period bucket
   */
  add(period: string, emotion: EmotionRef, intensity?: number): void {
    let data = this.buckets.get(period);
    if (!data) {
      data = { count: 0, intensities: [], emotions: new Map() };
      this.buckets.set(period, data);
    }

    data.count += 1;
    if (intensity !== undefined) {
      data.intensities.push(intensity);
    }

    const tally = data.emotions.get(emotion.emotionId);
    if (tally) {
      tally.count += 1;
    } else {
      // First name seen for an id wins
      data.emotions.set(emotion.emotionId, {
        emotionId: emotion.emotionId,
        emotionName: emotion.emotionName,
        count: 1,
      });
    }
  }

  get size(): number {
    return this.buckets.size;
  }

  /**
   * Map every bucket through a formatter, in insertion order
   */
  map<T>(format: (period: string, data: BucketData) => T): T[] {
    return Array.from(this.buckets, ([period, data]) => format(period, data));
  }
}
