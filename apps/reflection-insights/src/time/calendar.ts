/**
 * Calendar Tables and Period Keys
 * Fixed lookup tables plus the label formats used for bucketing
 */

export const DAY_NAMES = [
  'sunday',
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
] as const;

export type DayName = (typeof DAY_NAMES)[number];

export const TIME_OF_DAY_NAMES = ['morning', 'afternoon', 'evening', 'night'] as const;

export type TimeOfDay = (typeof TIME_OF_DAY_NAMES)[number];

/**
 * Days per month in a common year, January first
 */
export const DAYS_IN_MONTH: readonly number[] = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

/**
 * Hour bands: morning [5,12), afternoon [12,17), evening [17,22), night otherwise
 */
export function timeOfDay(hour: number): TimeOfDay {
  if (hour >= 5 && hour < 12) return 'morning';
  if (hour >= 12 && hour < 17) return 'afternoon';
  if (hour >= 17 && hour < 22) return 'evening';
  return 'night';
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * 1-based day of year. Months past December contribute only the twelve
 * known months; month 0 contributes none.
 */
export function dayOfYear(year: number, month: number, day: number): number {
  let total = day;
  const monthsBefore = Math.min(month - 1, DAYS_IN_MONTH.length);
  for (let i = 0; i < monthsBefore; i++) {
    total += DAYS_IN_MONTH[i];
  }

  if (isLeapYear(year) && month > 2) {
    total += 1;
  }

  return total;
}

/**
 * Simplified week number: ceil(dayOfYear / 7), not ISO-8601 weeks
 */
export function weekOfYear(year: number, month: number, day: number): number {
  return Math.ceil(dayOfYear(year, month, day) / 7);
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/** YYYY-MM */
export function monthKey(year: number, month: number): string {
  return `${pad(year, 4)}-${pad(month, 2)}`;
}

/** YYYY-MM-DD */
export function dayKey(year: number, month: number, day: number): string {
  return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
}

/**
 * YYYY-Www. String order matches chronological order only within one
 * year; callers sorting these labels inherit that limitation.
 */
export function weekKey(year: number, month: number, day: number): string {
  return `${pad(year, 4)}-W${pad(weekOfYear(year, month, day), 2)}`;
}
