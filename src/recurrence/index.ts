/**
 * Recurrence Model
 *
 * Constructors for repeat rules and their RRULE serialization (RFC 5545).
 */

import type { DateTime } from 'luxon';
import { ValidationError } from '../errors.js';
import type {
  DailyRule,
  MonthlyRule,
  RepeatEnd,
  RepeatRule,
  WeeklyRule,
  Weekday,
  YearlyRule,
} from '../types/index.js';

export const WEEKDAY_CODES: Record<Weekday, string> = {
  0: 'MO',
  1: 'TU',
  2: 'WE',
  3: 'TH',
  4: 'FR',
  5: 'SA',
  6: 'SU',
};

// UNTIL keeps the wall-clock of the given timestamp, without a Z suffix
const UNTIL_FORMAT = "yyyyMMdd'T'HHmmss";

function checkInterval(interval: number): number {
  if (!Number.isInteger(interval) || interval < 1) {
    throw new ValidationError(`Interval must be an integer >= 1, got ${interval}`);
  }
  return interval;
}

export function endByDate(until: DateTime): RepeatEnd {
  if (!until.isValid) {
    throw new ValidationError(`Invalid UNTIL timestamp: ${until.invalidReason ?? 'unknown reason'}`);
  }
  return { kind: 'until', until };
}

export function endByCount(count: number): RepeatEnd {
  if (!Number.isInteger(count) || count < 1) {
    throw new ValidationError(`Count must be an integer >= 1, got ${count}`);
  }
  return { kind: 'count', count };
}

export function weeklyRule(weekdays: readonly Weekday[], interval = 1, end?: RepeatEnd): WeeklyRule {
  return { freq: 'weekly', weekdays: [...weekdays], interval: checkInterval(interval), end };
}

export function dailyRule(interval = 1, end?: RepeatEnd): DailyRule {
  return { freq: 'daily', interval: checkInterval(interval), end };
}

export function monthlyRule(dayOfMonth?: number, interval = 1, end?: RepeatEnd): MonthlyRule {
  if (dayOfMonth !== undefined && (!Number.isInteger(dayOfMonth) || dayOfMonth < 1 || dayOfMonth > 31)) {
    throw new ValidationError(`Day of month must be within 1-31, got ${dayOfMonth}`);
  }
  return { freq: 'monthly', dayOfMonth, interval: checkInterval(interval), end };
}

export function yearlyRule(interval = 1, end?: RepeatEnd): YearlyRule {
  return { freq: 'yearly', interval: checkInterval(interval), end };
}

/**
 * Frozen copy of a rule, so that each entry owns its rule.
 */
export function copyRule(rule: RepeatRule): RepeatRule {
  const end = rule.end && Object.freeze({ ...rule.end });
  if (rule.freq === 'weekly') {
    return Object.freeze({ ...rule, weekdays: Object.freeze([...rule.weekdays]), end });
  }
  return Object.freeze({ ...rule, end });
}

function formatEnd(end: RepeatEnd): string {
  switch (end.kind) {
    case 'until':
      return `UNTIL=${end.until.toFormat(UNTIL_FORMAT)}`;
    case 'count':
      return `COUNT=${end.count}`;
  }
}

function frequencyParts(rule: RepeatRule): string[] {
  switch (rule.freq) {
    case 'weekly': {
      const parts = ['FREQ=WEEKLY'];
      if (rule.weekdays.length > 0) {
        parts.push(`BYDAY=${rule.weekdays.map(d => WEEKDAY_CODES[d]).join(',')}`);
      }
      return parts;
    }
    case 'daily':
      return ['FREQ=DAILY'];
    case 'monthly':
      return rule.dayOfMonth !== undefined
        ? ['FREQ=MONTHLY', `BYMONTHDAY=${rule.dayOfMonth}`]
        : ['FREQ=MONTHLY'];
    case 'yearly':
      return ['FREQ=YEARLY'];
  }
}

/**
 * Render a rule as an RRULE value, e.g. `FREQ=WEEKLY;BYDAY=MO;INTERVAL=2;UNTIL=20251231T235959`.
 */
export function formatRepeatRule(rule: RepeatRule): string {
  const parts = frequencyParts(rule);
  parts.push(`INTERVAL=${rule.interval}`);
  if (rule.end) {
    parts.push(formatEnd(rule.end));
  }
  return parts.join(';');
}
