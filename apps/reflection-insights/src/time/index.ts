/**
 * Time Module
 * Timestamp resolution and calendar period keys
 */

export { parseTimestamp, calculateWeekday } from './timestamp-resolver';
export type { ResolvedTimestamp } from './timestamp-resolver';

export {
  DAY_NAMES,
  TIME_OF_DAY_NAMES,
  DAYS_IN_MONTH,
  timeOfDay,
  isLeapYear,
  dayOfYear,
  weekOfYear,
  monthKey,
  dayKey,
  weekKey,
} from './calendar';
export type { DayName, TimeOfDay } from './calendar';
