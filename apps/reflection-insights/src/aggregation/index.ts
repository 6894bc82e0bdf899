export { BucketAccumulator, resolveEmotion } from './bucket-accumulator';
export type { BucketData, EmotionRef } from './bucket-accumulator';
export {
  compareStrings,
  compareEmotionCounts,
  rankEmotions,
  topEmotion,
  averageIntensity,
} from './ranking';
