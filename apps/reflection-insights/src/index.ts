/**
 * Reflection Insights
 *
 * Descriptive analytics over logged emotional reflections: time patterns,
 * trends, emotion co-occurrence and numeric statistics.
 */

export type {
  Reflection,
  Location,
  Person,
  EmotionCount,
  TimePattern,
  TrendDataPoint,
  CoOccurrence,
  PercentileKey,
  StatisticsResult,
  TimePatternsResult,
  TrendsResult,
  ReflectionSummary,
} from './types';

// Core
export * from './time';
export { TimePatternAggregator, computeTimePatterns } from './patterns';
export { TrendAggregator, computeTrends } from './trends';
export { CoOccurrenceComputer, computeCoOccurrence } from './co-occurrence';
export { computeStatistics } from './statistics';

// Service
export { ReflectionAnalytics, getReflectionAnalytics, resetReflectionAnalytics } from './services';

// Boundary
export * from './boundary';

// Utilities
export { AnalyticsError, DecodeError, ConfigurationError, isAnalyticsError, handleError } from './utils/errors';
export { CONFIG, PERCENTILE_RANKS, getConfig, validateConfig } from './utils/config';
export type { AppConfig, PercentileRank } from './utils/config';
export { Logger, LogLevel, createLogger, parseLogLevel } from './utils/logger';
