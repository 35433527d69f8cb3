/**
 * Entry formatters
 *
 * Turn a schedule entry into the title and body text of a calendar event.
 * Callers pick a strategy; parsing and serialization do not depend on it.
 */

import type { ScheduleEntry } from '../types/index.js';

export interface EntryFormatter {
  formatHeader(entry: ScheduleEntry): string;
  formatDescription(entry: ScheduleEntry): string;
}

export interface FormattedEntry {
  header: string;
  description: string;
}

export const defaultFormatter: EntryFormatter = {
  formatHeader(entry) {
    return `${entry.building} - ${entry.room} | ${entry.lessonType} - ${entry.subject}`;
  },

  formatDescription(entry) {
    return [
      `Дисциплина: ${entry.subject}`,
      `Вид занятия: ${entry.lessonType}`,
      `Здание: ${entry.building}`,
      `Аудитория: ${entry.room}`,
      `Преподаватель: ${entry.teacher}`,
      `Кафедра: ${entry.department}`,
    ].join('\n');
  },
};

export const compactFormatter: EntryFormatter = {
  formatHeader(entry) {
    return `${entry.subject} (${entry.lessonType})`;
  },

  formatDescription(entry) {
    return `${entry.teacher}\n${entry.department}`;
  },
};

export const FORMATTERS = {
  default: defaultFormatter,
  compact: compactFormatter,
} satisfies Record<string, EntryFormatter>;

export type FormatterName = keyof typeof FORMATTERS;

export function isFormatterName(name: string): name is FormatterName {
  return Object.hasOwn(FORMATTERS, name);
}

export function formatEntry(formatter: EntryFormatter, entry: ScheduleEntry): FormattedEntry {
  return {
    header: formatter.formatHeader(entry),
    description: formatter.formatDescription(entry),
  };
}
