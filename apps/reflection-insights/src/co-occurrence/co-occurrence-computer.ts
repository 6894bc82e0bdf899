/**
 * Co-occurrence Computer
 *
 * Counts unordered emotion pairs that appear together within a single
 * reflection. Timestamps are ignored, so every reflection counts toward
 * the percentage denominator.
 */

import { CoOccurrence, Reflection } from '../types';
import { compareStrings } from '../aggregation/ranking';
import { CONFIG } from '../utils/config';

interface PairTally {
  pair: [string, string];
  count: number;
}

/**
 * Primary emotion followed by related emotions, duplicates kept
 */
export function emotionsOf(reflection: Reflection): string[] {
  const emotions: string[] = [];
  if (reflection.emotionId !== undefined) {
    emotions.push(reflection.emotionId);
  }
  if (reflection.relatedEmotions) {
    emotions.push(...reflection.relatedEmotions);
  }
  return emotions;
}

function sortedPair(a: string, b: string): [string, string] {
  return compareStrings(a, b) <= 0 ? [a, b] : [b, a];
}

export class CoOccurrenceComputer {
  constructor(private readonly limit: number = CONFIG.analytics.coOccurrenceLimit) {}

  compute(reflections: readonly Reflection[]): CoOccurrence[] {
    const total = reflections.length;
    // Keyed on the JSON form of the sorted pair so ids may contain any character
    const tallies = new Map<string, PairTally>();

    for (const reflection of reflections) {
      const emotions = emotionsOf(reflection);

      for (let i = 0; i < emotions.length; i++) {
        for (let j = i + 1; j < emotions.length; j++) {
          const pair = sortedPair(emotions[i], emotions[j]);
          const key = JSON.stringify(pair);
          const tally = tallies.get(key);
          if (tally) {
            tally.count += 1;
          } else {
            tallies.set(key, { pair, count: 1 });
          }
        }
      }
    }

    return Array.from(tallies.values())
      .sort(
        (a, b) =>
          b.count - a.count ||
          compareStrings(a.pair[0], b.pair[0]) ||
          compareStrings(a.pair[1], b.pair[1])
      )
      .slice(0, this.limit)
      .map(({ pair, count }) => ({
        emotionPair: pair,
        count,
        percentage: total > 0 ? (count / total) * 100 : 0,
      }));
  }
}

export function computeCoOccurrence(reflections: readonly Reflection[]): CoOccurrence[] {
  return new CoOccurrenceComputer().compute(reflections);
}
