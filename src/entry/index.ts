/**
 * Schedule entries: one lesson occurrence or one recurring lesson slot.
 */

import type { DateTime, Duration } from 'luxon';
import { ValidationError } from '../errors.js';
import { copyRule } from '../recurrence/index.js';
import type { LessonDetails, RepeatRule, ScheduleEntry } from '../types/index.js';

export interface ScheduleEntryInit extends LessonDetails {
  start: DateTime;
  end: DateTime;
  repeatRule?: RepeatRule;
}

function checkTimes(start: DateTime, end: DateTime): void {
  if (!start.isValid || !end.isValid) {
    throw new ValidationError('Entry timestamps must be valid dates');
  }
  if (start.toMillis() >= end.toMillis()) {
    throw new ValidationError(`Entry start (${start.toISO()}) must be before its end (${end.toISO()})`);
  }
}

export function createScheduleEntry(init: ScheduleEntryInit): ScheduleEntry {
  checkTimes(init.start, init.end);

  const entry: ScheduleEntry = {
    start: init.start,
    end: init.end,
    subject: init.subject,
    lessonType: init.lessonType,
    room: init.room,
    building: init.building,
    teacher: init.teacher,
    department: init.department,
  };
  if (init.repeatRule) {
    return Object.freeze({ ...entry, repeatRule: copyRule(init.repeatRule) });
  }
  return Object.freeze(entry);
}

/**
 * Derive an entry with new start and/or end, checked again.
 */
export function withTimes(
  entry: ScheduleEntry,
  times: { start?: DateTime; end?: DateTime }
): ScheduleEntry {
  return createScheduleEntry({
    ...entry,
    start: times.start ?? entry.start,
    end: times.end ?? entry.end,
  });
}

export function entryDuration(entry: ScheduleEntry): Duration {
  return entry.end.diff(entry.start, ['hours', 'minutes']);
}
