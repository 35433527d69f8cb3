/**
 * Date helpers for weekday and ISO week parity arithmetic
 */

import type { DateTime } from 'luxon';
import type { Weekday } from '../types/index.js';

export type WeekParity = 'even' | 'odd';

export function weekParity(date: DateTime): WeekParity {
  return date.weekNumber % 2 === 0 ? 'even' : 'odd';
}

/**
 * First date on or after `from` that falls on `weekday`.
 */
export function nextWeekday(from: DateTime, weekday: Weekday): DateTime {
  const day = from.startOf('day');
  // luxon numbers weekdays 1 (Monday) to 7 (Sunday)
  const shift = (weekday + 1 - day.weekday + 7) % 7;
  return day.plus({ days: shift });
}

/**
 * First date on or after `from` that falls on `weekday` within a week of
 * the requested parity. Moves forward one week when the nearest weekday
 * sits in a week of the other parity.
 */
export function firstOccurrence(from: DateTime, weekday: Weekday, parity: WeekParity): DateTime {
  const candidate = nextWeekday(from, weekday);
  return weekParity(candidate) === parity ? candidate : candidate.plus({ weeks: 1 });
}
