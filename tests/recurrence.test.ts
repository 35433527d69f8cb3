import { DateTime } from 'luxon';
import { describe, expect, it } from 'vitest';

import { ValidationError } from '../src/errors.js';
import {
  copyRule,
  dailyRule,
  endByCount,
  endByDate,
  formatRepeatRule,
  monthlyRule,
  weeklyRule,
  yearlyRule,
} from '../src/recurrence/index.js';
import { Weekday } from '../src/types/index.js';

describe('formatRepeatRule', () => {
  it('renders a biweekly rule ending at a local wall-clock timestamp', () => {
    const until = DateTime.fromObject(
      { year: 2025, month: 12, day: 31, hour: 23, minute: 59, second: 59 },
      { zone: 'Europe/Moscow' }
    );
    const rule = weeklyRule([Weekday.Monday], 2, endByDate(until));

    expect(formatRepeatRule(rule)).toBe('FREQ=WEEKLY;BYDAY=MO;INTERVAL=2;UNTIL=20251231T235959');
  });

  it('keeps weekdays in caller order', () => {
    const rule = weeklyRule([Weekday.Friday, Weekday.Monday, Weekday.Wednesday]);

    expect(formatRepeatRule(rule)).toBe('FREQ=WEEKLY;BYDAY=FR,MO,WE;INTERVAL=1');
  });

  it('omits BYDAY when no weekdays are given', () => {
    expect(formatRepeatRule(weeklyRule([]))).toBe('FREQ=WEEKLY;INTERVAL=1');
  });

  it('renders daily, monthly and yearly rules', () => {
    expect(formatRepeatRule(dailyRule(3, endByCount(10)))).toBe('FREQ=DAILY;INTERVAL=3;COUNT=10');
    expect(formatRepeatRule(monthlyRule(15))).toBe('FREQ=MONTHLY;BYMONTHDAY=15;INTERVAL=1');
    expect(formatRepeatRule(monthlyRule())).toBe('FREQ=MONTHLY;INTERVAL=1');
    expect(formatRepeatRule(yearlyRule())).toBe('FREQ=YEARLY;INTERVAL=1');
  });

  it('does not convert UNTIL to another zone', () => {
    const until = DateTime.fromObject({ year: 2025, month: 12, day: 31, hour: 9 }, { zone: 'Asia/Tokyo' });

    expect(formatRepeatRule(dailyRule(1, endByDate(until)))).toBe('FREQ=DAILY;INTERVAL=1;UNTIL=20251231T090000');
  });
});

describe('rule invariants', () => {
  it('rejects an interval below one', () => {
    expect(() => weeklyRule([Weekday.Monday], 0)).toThrow(ValidationError);
    expect(() => dailyRule(-1)).toThrow(ValidationError);
  });

  it('rejects a fractional interval', () => {
    expect(() => yearlyRule(1.5)).toThrow(ValidationError);
  });

  it('rejects a count below one', () => {
    expect(() => endByCount(0)).toThrow('Count must be an integer >= 1, got 0');
  });

  it('rejects a day of month outside 1-31', () => {
    expect(() => monthlyRule(32)).toThrow(ValidationError);
    expect(() => monthlyRule(0)).toThrow(ValidationError);
  });

  it('rejects an invalid UNTIL timestamp', () => {
    expect(() => endByDate(DateTime.invalid('test'))).toThrow(ValidationError);
  });

  it('copies the weekday list', () => {
    const weekdays: Weekday[] = [Weekday.Tuesday];
    const rule = weeklyRule(weekdays);
    weekdays.push(Weekday.Thursday);

    expect(rule.weekdays).toEqual([Weekday.Tuesday]);
  });
});

describe('copyRule', () => {
  it('returns a frozen copy with its own weekday list and end', () => {
    const rule = weeklyRule([Weekday.Monday, Weekday.Wednesday], 2, endByCount(10));
    const copy = copyRule(rule);

    expect(copy).toEqual(rule);
    expect(copy).not.toBe(rule);
    expect(Object.isFrozen(copy)).toBe(true);
    expect(copy.freq === 'weekly' && Object.isFrozen(copy.weekdays)).toBe(true);
    expect(copy.end).not.toBe(rule.end);
    expect(formatRepeatRule(copy)).toBe('FREQ=WEEKLY;BYDAY=MO,WE;INTERVAL=2;COUNT=10');
  });
});
