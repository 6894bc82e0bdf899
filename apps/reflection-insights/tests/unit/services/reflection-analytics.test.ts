/**
 * ReflectionAnalytics Service Tests
 */

import { ReflectionAnalytics } from '../../../src/services/reflection-analytics';
import { getReflectionAnalytics, resetReflectionAnalytics } from '../../../src/services';
import { computeTimePatterns } from '../../../src/patterns/time-pattern-aggregator';
import { computeTrends } from '../../../src/trends/trend-aggregator';
import { computeCoOccurrence } from '../../../src/co-occurrence/co-occurrence-computer';
import { getConfig } from '../../../src/utils/config';
import { reflection, weekOfReflections } from '../../fixtures/reflections';

describe('ReflectionAnalytics', () => {
  let analytics: ReflectionAnalytics;

  beforeEach(() => {
    analytics = new ReflectionAnalytics();
  });

  it('should match the standalone aggregators under default limits', () => {
    expect(analytics.timePatterns(weekOfReflections)).toEqual(computeTimePatterns(weekOfReflections));
    expect(analytics.trends(weekOfReflections)).toEqual(computeTrends(weekOfReflections));
    expect(analytics.coOccurrence(weekOfReflections)).toEqual(computeCoOccurrence(weekOfReflections));
  });

  it('should summarise every reflection analysis at once', () => {
    const reflections = [
      ...weekOfReflections,
      reflection('bad timestamp', 'joy', { relatedEmotions: ['calm'] }),
    ];

    const summary = analytics.summarize(reflections);

    expect(summary.totalReflections).toBe(7);
    expect(summary.timePatterns.month.map(p => p.count)).toEqual([6]);
    expect(summary.trends.daily).toHaveLength(5);
    expect(summary.coOccurrence).toEqual([
      { emotionPair: ['calm', 'joy'], count: 1, percentage: (1 / 7) * 100 },
    ]);
  });

  it('should apply configured limits', () => {
    const config = getConfig();
    const limited = new ReflectionAnalytics({
      ...config,
      analytics: { topEmotionsLimit: 2, coOccurrenceLimit: 1 },
    });

    const result = limited.timePatterns(weekOfReflections);
    const pairs = limited.coOccurrence([reflection('t', 'a', { relatedEmotions: ['b', 'c'] })]);

    expect(result.month[0].topEmotions.map(e => e.emotionId)).toEqual(['joy', 'anxiety']);
    expect(pairs.map(p => p.emotionPair)).toEqual([['a', 'b']]);
  });

  it('should compute statistics', () => {
    expect(analytics.statistics([2, 4]).mean).toBe(3);
  });

  describe('logging', () => {
    let consoleDebugSpy: jest.SpyInstance;

    beforeEach(() => {
      consoleDebugSpy = jest.spyOn(console, 'debug').mockImplementation();
    });

    afterEach(() => {
      consoleDebugSpy.mockRestore();
    });

    it('should log at the configured level and format', () => {
      const verbose = new ReflectionAnalytics({
        ...getConfig(),
        logging: { level: 'debug', pretty: false },
      });

      verbose.trends([reflection('2024-01-15T10:00:00Z', 'joy')]);

      expect(consoleDebugSpy).toHaveBeenCalledTimes(1);
      const entry = JSON.parse(String(consoleDebugSpy.mock.calls[0][0]));
      expect(entry).toMatchObject({
        level: 'DEBUG',
        message: 'Computed trends',
        context: 'ReflectionAnalytics',
        data: { reflections: 1, daily: 1, weekly: 1, monthly: 1 },
      });
    });

    it('should stay quiet above debug', () => {
      // tests/setup.ts sets LOG_LEVEL=error
      new ReflectionAnalytics(getConfig()).trends([reflection('2024-01-15T10:00:00Z', 'joy')]);

      expect(consoleDebugSpy).not.toHaveBeenCalled();
    });
  });
});

describe('getReflectionAnalytics', () => {
  afterEach(() => {
    resetReflectionAnalytics();
  });

  it('should return one shared instance until reset', () => {
    const first = getReflectionAnalytics();

    expect(getReflectionAnalytics()).toBe(first);

    resetReflectionAnalytics();
    expect(getReflectionAnalytics()).not.toBe(first);
  });
});
