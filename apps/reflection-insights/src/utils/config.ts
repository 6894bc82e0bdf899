/**
 * Reflection Insights Configuration
 *
 * Central configuration for ranking limits, percentile ranks and logging.
 */

import { ConfigurationError } from './errors';

export const PERCENTILE_RANKS = [10, 25, 50, 75, 90, 95, 99] as const;

export type PercentileRank = (typeof PERCENTILE_RANKS)[number];

/**
 * Main configuration object
 */
export const CONFIG = {
  /**
   * Aggregation limits and fallbacks
   */
  analytics: {
    topEmotionsLimit: 5,          // topEmotions per time pattern
    coOccurrenceLimit: 20,        // pairs returned by co-occurrence
    unknownEmotion: {
      id: 'unknown',
      name: 'Unknown',
    },
  },

  /**
   * Logging Configuration
   */
  logging: {
    level: process.env.LOG_LEVEL || 'info',         // debug, info, warn, error
    pretty: process.env.NODE_ENV !== 'production',  // Pretty print logs in dev
  },
} as const;

export interface AppConfig {
  analytics: {
    topEmotionsLimit: number;
    coOccurrenceLimit: number;
  };
  logging: {
    level: string;
    pretty: boolean;
  };
}

/**
 * Configuration with logging settings re-read from the environment
 */
export const getConfig = (): AppConfig => {
  const logging = {
    level: process.env.LOG_LEVEL || CONFIG.logging.level,
    pretty: process.env.NODE_ENV !== 'production',
  };

  return {
    ...CONFIG,
    logging,
  };
};

/**
 * Validate analytics limits. Unknown log levels fall back to info in the
 * logger and are not rejected here.
 */
export const validateConfig = (config: AppConfig): void => {
  const { analytics } = config;

  if (!Number.isInteger(analytics.topEmotionsLimit) || analytics.topEmotionsLimit < 1) {
    throw new ConfigurationError('topEmotionsLimit must be a positive integer', {
      topEmotionsLimit: analytics.topEmotionsLimit,
    });
  }
  if (!Number.isInteger(analytics.coOccurrenceLimit) || analytics.coOccurrenceLimit < 1) {
    throw new ConfigurationError('coOccurrenceLimit must be a positive integer', {
      coOccurrenceLimit: analytics.coOccurrenceLimit,
    });
  }
};

