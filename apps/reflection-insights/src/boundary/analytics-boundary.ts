/**
 * Encoded Analytics Boundary
 *
 * JSON text in, JSON text out. These operations never throw: bad input,
 * empty input and unexpected failures all produce the same hollow result.
 */

import { CoOccurrence, Reflection, StatisticsResult, TimePatternsResult, TrendsResult } from '../types';
import { DecodeResult, decodeReflections, decodeValues } from './codec';
import { getReflectionAnalytics } from '../services';
import { emptyStatistics } from '../statistics/statistics-computer';
import { handleError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('AnalyticsBoundary');

export const emptyTimePatterns = (): TimePatternsResult => ({ dayOfWeek: [], timeOfDay: [], month: [] });

export const emptyTrends = (): TrendsResult => ({ daily: [], weekly: [], monthly: [] });

export const emptyCoOccurrence = (): CoOccurrence[] => [];

/**
 * Resolve a decode result, compute, and encode. Any failure along the way
 * yields the encoded fallback.
 */
function respond<I, O>(
  operation: string,
  decoded: DecodeResult<I[]>,
  compute: (input: I[]) => O,
  empty: () => O
): string {
  if (decoded.kind === 'fallback') {
    logger.warn(`${operation}: input rejected`, decoded.error.toJSON());
    return JSON.stringify(empty());
  }

  if (decoded.value.length === 0) {
    return JSON.stringify(empty());
  }

  try {
    return JSON.stringify(compute(decoded.value));
  } catch (error) {
    logger.error(`${operation}: computation failed`, handleError(error));
    return JSON.stringify(empty());
  }
}

/**
 * Day-of-week, time-of-day and month patterns of an encoded reflection list
 */
export function calculateTimePatterns(reflectionsJson: string): string {
  return respond(
    'calculateTimePatterns',
    decodeReflections(reflectionsJson),
    (reflections: Reflection[]) => getReflectionAnalytics().timePatterns(reflections),
    emptyTimePatterns
  );
}

/**
 * Top emotion pairs of an encoded reflection list
 */
export function calculateCoOccurrence(reflectionsJson: string): string {
  return respond(
    'calculateCoOccurrence',
    decodeReflections(reflectionsJson),
    (reflections: Reflection[]) => getReflectionAnalytics().coOccurrence(reflections),
    emptyCoOccurrence
  );
}

/**
 * Daily, weekly and monthly series of an encoded reflection list
 */
export function calculateTrends(reflectionsJson: string): string {
  return respond(
    'calculateTrends',
    decodeReflections(reflectionsJson),
    (reflections: Reflection[]) => getReflectionAnalytics().trends(reflections),
    emptyTrends
  );
}

/**
 * Mean, median, extremes and percentiles of an encoded number list
 */
export function calculateStatistics(valuesJson: string): string {
  return respond(
    'calculateStatistics',
    decodeValues(valuesJson),
    (values: number[]): StatisticsResult => getReflectionAnalytics().statistics(values),
    emptyStatistics
  );
}
