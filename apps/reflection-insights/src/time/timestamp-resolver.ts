/**
 * Timestamp Resolver
 * Parses restricted ISO-8601 strings ("2024-01-15T10:00:00Z",
 * "2024-01-15T10:00:00.000Z") into calendar fields
 */

const U32_MAX = 4294967295;
const I32_MIN = -2147483648;
const I32_MAX = 2147483647;

const UNSIGNED_PATTERN = /^\+?\d+$/;
const SIGNED_PATTERN = /^[+-]?\d+$/;

/**
 * Calendar fields of a resolved timestamp. Month and day are not range
 * checked; out-of-range values propagate to the period keys.
 */
export interface ResolvedTimestamp {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  weekday: number;   // 0 = Sunday, 6 = Saturday
}

function parseUnsigned(text: string): number | null {
  if (!UNSIGNED_PATTERN.test(text)) return null;
  const value = Number(text);
  return value <= U32_MAX ? value : null;
}

function parseSigned(text: string): number | null {
  if (!SIGNED_PATTERN.test(text)) return null;
  const value = Number(text);
  return value >= I32_MIN && value <= I32_MAX ? value : null;
}

/**
 * Day of week via Zeller's congruence, 0 = Sunday .. 6 = Saturday
 */
export function calculateWeekday(year: number, month: number, day: number): number {
  let y = year;
  let m = month;
  if (m < 3) {
    m += 12;
    y -= 1;
  }

  const k = y % 100;
  const j = Math.trunc(y / 100);
  const h =
    (day + Math.trunc((13 * (m + 1)) / 5) + k + Math.trunc(k / 4) + Math.trunc(j / 4) - 2 * j) % 7;

  // Zeller counts from Saturday; shift to Sunday and fold negatives into 0..6
  return (((h + 6) % 7) + 7) % 7;
}

/**
 * Resolve a timestamp string, or null when it does not match the pattern
 */
export function parseTimestamp(timestamp: string): ResolvedTimestamp | null {
  const parts = timestamp.split('T');
  if (parts.length !== 2) {
    return null;
  }

  const dateParts = parts[0].split('-');
  if (dateParts.length !== 3) {
    return null;
  }

  const year = parseSigned(dateParts[0]);
  const month = parseUnsigned(dateParts[1]);
  const day = parseUnsigned(dateParts[2]);
  if (year === null || month === null || day === null) {
    return null;
  }

  const timeParts = parts[1].replace(/Z+$/, '').split(':');
  if (timeParts.length < 2) {
    return null;
  }

  const hour = parseUnsigned(timeParts[0]);
  const minute = parseUnsigned(timeParts[1]);
  if (hour === null || minute === null) {
    return null;
  }

  return {
    year,
    month,
    day,
    hour,
    minute,
    weekday: calculateWeekday(year, month, day),
  };
}
