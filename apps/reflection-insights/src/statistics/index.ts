export { computeStatistics, emptyStatistics, nearestRank } from './statistics-computer';
