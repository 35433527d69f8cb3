/**
 * Timetable parser
 *
 * Reads the weekday-keyed timetable JSON and resolves each lesson's
 * date/parity field into schedule entries within a semester window.
 */

import { DateTime, type Zone } from 'luxon';
import { z } from 'zod';

import { DEFAULT_LESSON_MINUTES } from '../config/index.js';
import { silentDiagnostics } from '../diagnostics/index.js';
import { createScheduleEntry } from '../entry/index.js';
import { MalformedValueError, TimetableFormatError } from '../errors.js';
import { endByDate, weeklyRule } from '../recurrence/index.js';
import type {
  Diagnostics,
  LessonDetails,
  ScheduleEntry,
  SemesterWindow,
  WeeklyAnchor,
  Weekday,
} from '../types/index.js';
import { firstOccurrence, nextWeekday, weekParity, type WeekParity } from './week-dates.js';

const WEEKDAY_KEYS = new Map<string, Weekday>([
  ['1', 0],
  ['2', 1],
  ['3', 2],
  ['4', 3],
  ['5', 4],
  ['6', 5],
  ['7', 6],
]);

const PARITY_TOKENS = new Map<string, WeekParity>([
  ['чет', 'even'],
  ['неч', 'odd'],
]);

// Source field name for each lesson attribute
const DETAIL_FIELDS: Record<keyof LessonDetails, keyof RawLesson> = {
  subject: 'disciplName',
  lessonType: 'disciplType',
  room: 'audNum',
  building: 'buildNum',
  teacher: 'prepodName',
  department: 'orgUnitName',
};

const TIME_PATTERN = /^([01]?\d|2[0-3]):([0-5]\d)$/;
const DATE_FRAGMENT_PATTERN = /^(\d{1,2})\.(\d{1,2})$/;

// Absent fields read as empty text; numbers as their decimal form
const textField = z
  .union([z.string(), z.number()])
  .nullish()
  .transform(value => (value == null ? '' : String(value).trim()));

const rawLessonSchema = z.object({
  disciplName: textField,
  disciplType: textField,
  audNum: textField,
  buildNum: textField,
  prepodName: textField,
  orgUnitName: textField,
  dayTime: textField,
  dayDate: textField,
});

const lessonListSchema = z.array(rawLessonSchema);

// Values are checked per weekday, so a key that is not a weekday never fails the run
const rawTimetableSchema = z.record(z.string(), z.unknown());

export type RawLesson = z.infer<typeof rawLessonSchema>;
export type RawTimetable = z.infer<typeof rawTimetableSchema>;

export interface TimetableParserOptions {
  semester: SemesterWindow;
  /** Year for `DD.MM` fragments; defaults to the semester start year */
  year?: number;
  lessonMinutes?: number;
  weeklyAnchor?: WeeklyAnchor;
  diagnostics?: Diagnostics;
}

function describeIssues(error: z.ZodError, prefix: string[] = []): string {
  return error.issues
    .map(issue => `${[...prefix, ...issue.path].join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Parse the timetable document and check that it is a keyed object.
 */
export function readTimetable(json: string): RawTimetable {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new TimetableFormatError(`Timetable is not valid JSON: ${reason}`, { cause: err });
  }

  const result = rawTimetableSchema.safeParse(data);
  if (!result.success) {
    throw new TimetableFormatError(
      `Unexpected timetable structure: ${describeIssues(result.error)}`,
      { cause: result.error }
    );
  }
  return result.data;
}

/**
 * Shape-check the lesson list under one weekday key.
 */
export function readLessons(dayKey: string, value: unknown): RawLesson[] {
  const result = lessonListSchema.safeParse(value);
  if (!result.success) {
    throw new TimetableFormatError(
      `Unexpected timetable structure: ${describeIssues(result.error, [dayKey])}`,
      { cause: result.error }
    );
  }
  return result.data;
}

function parseLessonTime(dayTime: string, weekday: string): { hour: number; minute: number } {
  // "09:00-10:30": only the start is used
  const [startText = ''] = dayTime.split('-');
  const match = TIME_PATTERN.exec(startText.trim());
  if (!match) {
    throw new MalformedValueError('time', dayTime, weekday);
  }
  return { hour: Number(match[1]), minute: Number(match[2]) };
}

function parseLessonDates(dayDate: string, year: number, zone: Zone, weekday: string): DateTime[] {
  return dayDate.split(/\s+/).filter(Boolean).map(fragment => {
    const match = DATE_FRAGMENT_PATTERN.exec(fragment);
    if (!match) {
      throw new MalformedValueError('date', fragment, weekday);
    }
    const date = DateTime.fromObject(
      { year, month: Number(match[2]), day: Number(match[1]) },
      { zone }
    );
    if (!date.isValid) {
      throw new MalformedValueError('date', fragment, weekday);
    }
    return date;
  });
}

function missingFields(lesson: RawLesson): string[] {
  const required: (keyof RawLesson)[] = [...Object.values(DETAIL_FIELDS), 'dayTime'];
  return required.filter(field => lesson[field] === '');
}

function lessonDetails(lesson: RawLesson): LessonDetails {
  return {
    subject: lesson[DETAIL_FIELDS.subject],
    lessonType: lesson[DETAIL_FIELDS.lessonType],
    room: lesson[DETAIL_FIELDS.room],
    building: lesson[DETAIL_FIELDS.building],
    teacher: lesson[DETAIL_FIELDS.teacher],
    department: lesson[DETAIL_FIELDS.department],
  };
}

/**
 * Resolve a shape-checked timetable into schedule entries.
 *
 * Entries come out in weekday key order, then source order. Missing fields
 * and unknown weekdays are reported to `diagnostics` and skipped; a malformed
 * time or date, or a lesson list of the wrong shape, throws.
 */
export function resolveTimetable(raw: RawTimetable, options: TimetableParserOptions): ScheduleEntry[] {
  const {
    semester,
    year = semester.start.year,
    lessonMinutes = DEFAULT_LESSON_MINUTES,
    weeklyAnchor = 'semester-parity',
    diagnostics = silentDiagnostics,
  } = options;

  const zone = semester.start.zone;
  const until = endByDate(semester.end);
  const entries: ScheduleEntry[] = [];

  // Integer-like keys ("1".."7") iterate in ascending order, not document order
  for (const [dayKey, value] of Object.entries(raw)) {
    const weekday = WEEKDAY_KEYS.get(dayKey);
    if (weekday === undefined) {
      const skipped = Array.isArray(value) ? value.length : 0;
      diagnostics.warn({
        code: 'unknown-weekday',
        message: `Unknown weekday "${dayKey}", ${skipped} lesson(s) skipped`,
        weekday: dayKey,
      });
      continue;
    }
    const lessons = readLessons(dayKey, value);
    diagnostics.info(`Weekday ${dayKey}: ${lessons.length} lesson(s)`);

    lessons.forEach((lesson, index) => {
      const missing = missingFields(lesson);
      if (missing.length > 0) {
        diagnostics.warn({
          code: 'missing-fields',
          message: `Lesson #${index + 1} on weekday ${dayKey} skipped, missing ${missing.join(', ')}`,
          weekday: dayKey,
          index,
          missingFields: missing,
        });
        return;
      }

      const details = lessonDetails(lesson);
      const time = parseLessonTime(lesson.dayTime, dayKey);

      const at = (date: DateTime): { start: DateTime; end: DateTime } => {
        const start = DateTime.fromObject(
          { year: date.year, month: date.month, day: date.day, hour: time.hour, minute: time.minute },
          { zone }
        );
        return { start, end: start.plus({ minutes: lessonMinutes }) };
      };

      const parity = PARITY_TOKENS.get(lesson.dayDate);
      if (parity) {
        const first = firstOccurrence(semester.start, weekday, parity);
        entries.push(createScheduleEntry({
          ...details,
          ...at(first),
          repeatRule: weeklyRule([weekday], 2, until),
        }));
      } else if (lesson.dayDate) {
        for (const date of parseLessonDates(lesson.dayDate, year, zone, dayKey)) {
          entries.push(createScheduleEntry({ ...details, ...at(date) }));
        }
      } else {
        const first = weeklyAnchor === 'semester-parity'
          ? firstOccurrence(semester.start, weekday, weekParity(semester.start))
          : nextWeekday(semester.start, weekday);
        entries.push(createScheduleEntry({
          ...details,
          ...at(first),
          repeatRule: weeklyRule([weekday], 1, until),
        }));
      }
    });
  }

  return entries;
}

export function parseTimetable(json: string, options: TimetableParserOptions): ScheduleEntry[] {
  return resolveTimetable(readTimetable(json), options);
}
