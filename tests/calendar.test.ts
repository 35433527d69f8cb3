import { DateTime } from 'luxon';
import { describe, expect, it } from 'vitest';

import {
  assembleCalendar,
  buildCalendar,
  entryUid,
  escapeText,
  foldLine,
  serializeEntry,
} from '../src/calendar/index.js';
import { resolveSemester } from '../src/config/index.js';
import { createScheduleEntry } from '../src/entry/index.js';
import { compactFormatter } from '../src/formatter/index.js';
import { parseTimetable } from '../src/parser/timetable-parser.js';
import { endByDate, weeklyRule } from '../src/recurrence/index.js';
import { Weekday } from '../src/types/index.js';

const zone = 'Europe/Moscow';
const stamp = DateTime.fromISO('2025-08-20T12:00:00Z');
const start = DateTime.fromObject({ year: 2025, month: 9, day: 1, hour: 9 }, { zone });
const until = DateTime.fromObject({ year: 2025, month: 12, day: 31, hour: 23, minute: 59, second: 59 }, { zone });

const details = {
  subject: 'Math',
  lessonType: 'лек',
  room: '101',
  building: '2',
  teacher: 'Ivanov',
  department: 'CS',
};

const biweekly = createScheduleEntry({
  ...details,
  start,
  end: start.plus({ minutes: 90 }),
  repeatRule: weeklyRule([Weekday.Monday], 2, endByDate(until)),
});

function unfold(text: string): string[] {
  return text.replace(/\r\n /g, '').split('\r\n');
}

describe('escapeText', () => {
  it('escapes backslashes, separators and newlines', () => {
    expect(escapeText('a,b;c\\d\ne')).toBe(String.raw`a\,b\;c\\d\ne`);
  });
});

describe('foldLine', () => {
  it('leaves short lines alone', () => {
    expect(foldLine('SUMMARY:short')).toBe('SUMMARY:short');
  });

  it('folds at 75 octets with a leading space on continuation lines', () => {
    const folded = foldLine('a'.repeat(200));

    expect(folded.split('\r\n').map(l => l.length)).toEqual([75, 75, 52]);
    expect(unfold(folded)).toEqual(['a'.repeat(200)]);
  });

  it('never splits a multi-byte character', () => {
    const folded = foldLine('ж'.repeat(50));

    expect(folded).toBe(`${'ж'.repeat(37)}\r\n ${'ж'.repeat(13)}`);
  });
});

describe('serializeEntry', () => {
  it('writes a VEVENT with recurrence', () => {
    const lines = unfold(serializeEntry(biweekly, { stamp }));

    expect(lines).toEqual([
      'BEGIN:VEVENT',
      expect.stringMatching(/^UID:[0-9a-f]{32}@timetable-ics$/),
      'DTSTAMP:20250820T120000Z',
      'SUMMARY:2 - 101 | лек - Math',
      'DTSTART;TZID=Europe/Moscow:20250901T090000',
      'DTEND;TZID=Europe/Moscow:20250901T103000',
      String.raw`LOCATION:2\, 101`,
      String.raw`DESCRIPTION:Дисциплина: Math\nВид занятия: лек\nЗдание: 2\nАудитория: 101\nПреподаватель: Ivanov\nКафедра: CS`,
      'RRULE:FREQ=WEEKLY;BYDAY=MO;INTERVAL=2;UNTIL=20251231T235959',
      'END:VEVENT',
    ]);
  });

  it('keeps every physical line within 75 octets', () => {
    const lines = serializeEntry(biweekly, { stamp }).split('\r\n');

    for (const line of lines) {
      expect(Buffer.byteLength(line, 'utf8')).toBeLessThanOrEqual(75);
    }
  });

  it('omits RRULE for a single occurrence', () => {
    const single = createScheduleEntry({ ...details, start, end: start.plus({ minutes: 90 }) });
    const lines = unfold(serializeEntry(single, { stamp }));

    expect(lines.some(l => l.startsWith('RRULE'))).toBe(false);
    expect(lines.at(-1)).toBe('END:VEVENT');
  });

  it('writes UTC timestamps for entries without a named zone', () => {
    const utcStart = DateTime.fromObject({ year: 2025, month: 9, day: 1, hour: 6 }, { zone: 'UTC' });
    const entry = createScheduleEntry({ ...details, start: utcStart, end: utcStart.plus({ minutes: 90 }) });
    const lines = unfold(serializeEntry(entry, { stamp }));

    expect(lines).toContain('DTSTART:20250901T060000Z');
    expect(lines).toContain('DTEND:20250901T073000Z');
  });

  it('uses the supplied formatter', () => {
    const lines = unfold(serializeEntry(biweekly, { stamp, formatter: compactFormatter }));

    expect(lines).toContain('SUMMARY:Math (лек)');
    expect(lines).toContain(String.raw`DESCRIPTION:Ivanov\nCS`);
  });
});

describe('entryUid', () => {
  it('is stable for the same lesson and time', () => {
    const copy = createScheduleEntry({ ...biweekly });

    expect(entryUid(copy)).toBe(entryUid(biweekly));
  });

  it('changes with the start time', () => {
    const moved = createScheduleEntry({ ...biweekly, start: start.plus({ days: 7 }), end: start.plus({ days: 7, minutes: 90 }) });

    expect(entryUid(moved)).not.toBe(entryUid(biweekly));
  });
});

describe('assembleCalendar', () => {
  it('wraps blocks in a VCALENDAR', () => {
    expect(assembleCalendar(['X', 'Y'])).toBe(
      'BEGIN:VCALENDAR\r\n' +
      'VERSION:2.0\r\n' +
      'PRODID:-//timetable-ics//Schedule Converter//EN\r\n' +
      'X\r\n' +
      'Y\r\n' +
      'END:VCALENDAR'
    );
  });

  it('passes blocks through unchecked', () => {
    const doc = assembleCalendar(['not an event'], { productId: '-//test//EN' });

    expect(doc.split('\r\n')).toEqual(['BEGIN:VCALENDAR', 'VERSION:2.0', 'PRODID:-//test//EN', 'not an event', 'END:VCALENDAR']);
  });

  it('wraps an empty list', () => {
    expect(assembleCalendar([]).split('\r\n')).toHaveLength(4);
  });
});

describe('buildCalendar', () => {
  it('holds one wrapper and one event per parsed entry', () => {
    const semester = resolveSemester({ start: '01.09.2025', end: '31.12.2025' });
    const lesson = {
      disciplName: 'Math',
      disciplType: 'лек',
      audNum: '101',
      buildNum: '2',
      prepodName: 'Ivanov',
      orgUnitName: 'CS',
      dayTime: '09:00-10:30',
    };
    const json = JSON.stringify({
      '1': [{ ...lesson, dayDate: 'чет' }, { ...lesson, dayDate: '' }],
      '5': [{ ...lesson, dayDate: '05.09 12.09 19.09' }],
    });

    const entries = parseTimetable(json, { semester });
    const lines = unfold(buildCalendar(entries, { stamp }));
    const count = (line: string) => lines.filter(l => l === line).length;

    expect(entries).toHaveLength(5);
    expect(lines[0]).toBe('BEGIN:VCALENDAR');
    expect(lines.at(-1)).toBe('END:VCALENDAR');
    expect(count('BEGIN:VCALENDAR')).toBe(1);
    expect(count('END:VCALENDAR')).toBe(1);
    expect(count('BEGIN:VEVENT')).toBe(5);
    expect(count('END:VEVENT')).toBe(5);
    expect(lines.filter(l => l.startsWith('RRULE:'))).toEqual([
      'RRULE:FREQ=WEEKLY;BYDAY=MO;INTERVAL=2;UNTIL=20251231T235959',
      'RRULE:FREQ=WEEKLY;BYDAY=MO;INTERVAL=1;UNTIL=20251231T235959',
    ]);
    expect(count('DTSTAMP:20250820T120000Z')).toBe(5);
  });
});
