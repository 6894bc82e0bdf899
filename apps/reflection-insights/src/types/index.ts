/**
 * Reflection Insights Core Type Definitions
 *
 * Shared interfaces for reflection records and the analytics results
 * computed over them.
 */

/**
 * Where a reflection was logged
 */
export interface Location {
  placeName?: string;
  city?: string;
  country?: string;
}

/**
 * Someone present during a reflection
 */
export interface Person {
  id?: string;
  name?: string;
}

/**
 * Reflection - one logged emotional event
 *
 * Only `timestamp`, the primary emotion, `intensity` and `relatedEmotions`
 * feed the aggregators; the rest is carried for the host.
 */
export interface Reflection {
  readonly timestamp: string;              // ISO-8601, UTC
  readonly emotionId?: string;
  readonly emotionName?: string;
  readonly intensity?: number;             // unconstrained range
  readonly relatedEmotions?: readonly string[];
  readonly location?: Location;
  readonly people?: readonly Person[];
  readonly copingStrategies?: readonly string[];
  readonly moodBefore?: number;
  readonly moodAfter?: number;
}

/**
 * EmotionCount - ranked tally entry
 */
export interface EmotionCount {
  emotionId: string;
  emotionName: string;
  count: number;
}

/**
 * TimePattern - one day-of-week, time-of-day or month bucket
 */
export interface TimePattern {
  period: string;
  count: number;
  averageIntensity: number | null;
  topEmotions: EmotionCount[];             // at most 5, count desc
}

/**
 * TrendDataPoint - one daily, weekly or monthly bucket
 */
export interface TrendDataPoint {
  date: string;                            // YYYY-MM-DD, YYYY-Www or YYYY-MM
  count: number;
  averageIntensity: number | null;
  topEmotion: EmotionCount | null;
}

/**
 * CoOccurrence - unordered emotion pair seen within single reflections
 */
export interface CoOccurrence {
  emotionPair: [string, string];           // lexicographically sorted
  count: number;
  percentage: number;                      // count / total reflections * 100
}

export type PercentileKey = 'p10' | 'p25' | 'p50' | 'p75' | 'p90' | 'p95' | 'p99';

/**
 * StatisticsResult - order statistics over a numeric array
 */
export interface StatisticsResult {
  mean: number;
  median: number;
  min: number;
  max: number;
  percentiles: Partial<Record<PercentileKey, number>>;
}

export interface TimePatternsResult {
  dayOfWeek: TimePattern[];
  timeOfDay: TimePattern[];
  month: TimePattern[];
}

export interface TrendsResult {
  daily: TrendDataPoint[];
  weekly: TrendDataPoint[];
  monthly: TrendDataPoint[];
}

/**
 * All reflection-based analyses for one input set
 */
export interface ReflectionSummary {
  totalReflections: number;
  timePatterns: TimePatternsResult;
  trends: TrendsResult;
  coOccurrence: CoOccurrence[];
}
