export { TimePatternAggregator, computeTimePatterns } from './time-pattern-aggregator';
