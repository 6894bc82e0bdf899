/**
 * Reflection Analytics Service
 *
 * Typed entry point over the aggregators for hosts that already hold
 * in-memory reflections.
 */

import {
  CoOccurrence,
  Reflection,
  ReflectionSummary,
  StatisticsResult,
  TimePatternsResult,
  TrendsResult,
} from '../types';
import { TimePatternAggregator } from '../patterns/time-pattern-aggregator';
import { TrendAggregator } from '../trends/trend-aggregator';
import { CoOccurrenceComputer } from '../co-occurrence/co-occurrence-computer';
import { computeStatistics } from '../statistics/statistics-computer';
import { AppConfig, getConfig } from '../utils/config';
import { Logger, parseLogLevel } from '../utils/logger';

export class ReflectionAnalytics {
  private readonly logger: Logger;
  private readonly timePatternAggregator: TimePatternAggregator;
  private readonly trendAggregator: TrendAggregator;
  private readonly coOccurrenceComputer: CoOccurrenceComputer;

  constructor(config: AppConfig = getConfig()) {
    this.logger = new Logger(
      'ReflectionAnalytics',
      parseLogLevel(config.logging.level),
      config.logging.pretty
    );
    this.timePatternAggregator = new TimePatternAggregator(config.analytics.topEmotionsLimit);
    this.trendAggregator = new TrendAggregator();
    this.coOccurrenceComputer = new CoOccurrenceComputer(config.analytics.coOccurrenceLimit);
  }

  timePatterns(reflections: readonly Reflection[]): TimePatternsResult {
    const result = this.timePatternAggregator.compute(reflections);
    this.logger.debug('Computed time patterns', {
      reflections: reflections.length,
      dayOfWeek: result.dayOfWeek.length,
      timeOfDay: result.timeOfDay.length,
      month: result.month.length,
    });
    return result;
  }

  trends(reflections: readonly Reflection[]): TrendsResult {
    const result = this.trendAggregator.compute(reflections);
    this.logger.debug('Computed trends', {
      reflections: reflections.length,
      daily: result.daily.length,
      weekly: result.weekly.length,
      monthly: result.monthly.length,
    });
    return result;
  }

  coOccurrence(reflections: readonly Reflection[]): CoOccurrence[] {
    const result = this.coOccurrenceComputer.compute(reflections);
    this.logger.debug('Computed co-occurrence', { reflections: reflections.length, pairs: result.length });
    return result;
  }

  statistics(values: readonly number[]): StatisticsResult {
    return computeStatistics(values);
  }

  /**
   * Every reflection-based analysis at once, e.g. for a dashboard
   */
  summarize(reflections: readonly Reflection[]): ReflectionSummary {
    return {
      totalReflections: reflections.length,
      timePatterns: this.timePatterns(reflections),
      trends: this.trends(reflections),
      coOccurrence: this.coOccurrence(reflections),
    };
  }
}
