/**
 * Result shaping helpers shared by the aggregators
 */

import { EmotionCount } from '../types';

/**
 * Code-point string order, independent of locale. Agrees with UTF-8 byte
 * order, unlike `<` on code units once astral characters are involved.
 */
export function compareStrings(a: string, b: string): number {
  let i = 0;
  while (i < a.length && i < b.length) {
    const left = a.codePointAt(i) ?? 0;
    const right = b.codePointAt(i) ?? 0;
    if (left !== right) {
      return left < right ? -1 : 1;
    }
    i += left > 0xffff ? 2 : 1;
  }
  return Math.sign(a.length - b.length);
}

/**
 * Count descending, then emotionId ascending
 */
export function compareEmotionCounts(a: EmotionCount, b: EmotionCount): number {
  return b.count - a.count || compareStrings(a.emotionId, b.emotionId);
}

/**
 * Emotion tally ranked by count, optionally truncated
 */
export function rankEmotions(emotions: Iterable<EmotionCount>, limit?: number): EmotionCount[] {
  const ranked = Array.from(emotions).sort(compareEmotionCounts);
  return limit === undefined ? ranked : ranked.slice(0, limit);
}

/**
 * Single highest-count emotion, or null for an empty tally
 */
export function topEmotion(emotions: Iterable<EmotionCount>): EmotionCount | null {
  let best: EmotionCount | null = null;
  for (const emotion of emotions) {
    if (best === null || compareEmotionCounts(emotion, best) < 0) {
      best = emotion;
    }
  }
  return best;
}

/**
 * Arithmetic mean, or null when nothing was collected
 */
export function averageIntensity(intensities: readonly number[]): number | null {
  if (intensities.length === 0) return null;
  return intensities.reduce((sum, v) => sum + v, 0) / intensities.length;
}
