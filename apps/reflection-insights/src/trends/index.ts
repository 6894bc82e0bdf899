export { TrendAggregator, computeTrends } from './trend-aggregator';
