/**
 * Conversion defaults and semester window resolution
 */

import { DateTime } from 'luxon';
import { SemesterConfigError } from '../errors.js';
import type { SemesterWindow } from '../types/index.js';

export const DEFAULT_TIMEZONE = 'Europe/Moscow';
export const DEFAULT_LESSON_MINUTES = 90;
export const DEFAULT_PRODUCT_ID = '-//timetable-ics//Schedule Converter//EN';

const DATE_FORMATS = ['d.M.yyyy', 'yyyy-MM-dd'];

/**
 * Read a calendar date (`DD.MM.YYYY` or `YYYY-MM-DD`) at midnight in `timezone`.
 */
export function parseSemesterDate(value: string, timezone: string): DateTime {
  const text = value.trim();
  for (const format of DATE_FORMATS) {
    const parsed = DateTime.fromFormat(text, format, { zone: timezone });
    if (parsed.isValid) {
      return parsed;
    }
    if (parsed.invalidReason === 'unsupported zone') {
      throw new SemesterConfigError(`Unknown timezone: ${timezone}`);
    }
  }
  throw new SemesterConfigError(`Invalid semester date "${value}" (expected DD.MM.YYYY or YYYY-MM-DD)`);
}

export interface SemesterOptions {
  start: string;
  end: string;
  timezone?: string;
}

/**
 * The end date is inclusive: the window closes at the last second of that day.
 */
export function resolveSemester(options: SemesterOptions): SemesterWindow {
  const timezone = options.timezone ?? DEFAULT_TIMEZONE;
  const start = parseSemesterDate(options.start, timezone).startOf('day');
  const end = parseSemesterDate(options.end, timezone).endOf('day').set({ millisecond: 0 });

  if (start.toMillis() >= end.toMillis()) {
    throw new SemesterConfigError(
      `Semester start (${start.toISODate()}) must be before its end (${end.toISODate()})`
    );
  }

  return { start, end };
}
