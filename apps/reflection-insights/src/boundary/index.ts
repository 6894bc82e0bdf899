/**
 * Boundary Module
 * JSON-in / JSON-out operations and the decoders behind them
 */

export {
  calculateTimePatterns,
  calculateCoOccurrence,
  calculateTrends,
  calculateStatistics,
  emptyTimePatterns,
  emptyTrends,
  emptyCoOccurrence,
} from './analytics-boundary';

export { decodeReflections, decodeValues, reflectionSchema, ok, fallback } from './codec';
export type { DecodeResult } from './codec';
