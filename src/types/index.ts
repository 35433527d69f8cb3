/**
 * Core domain types for timetable conversion
 */

import type { DateTime } from 'luxon';

// Weekdays, Monday first
export const Weekday = {
  Monday: 0,
  Tuesday: 1,
  Wednesday: 2,
  Thursday: 3,
  Friday: 4,
  Saturday: 5,
  Sunday: 6,
} as const;

export type Weekday = (typeof Weekday)[keyof typeof Weekday];

// Repeat rules
export type RepeatEnd =
  | { readonly kind: 'until'; readonly until: DateTime }
  | { readonly kind: 'count'; readonly count: number };

export interface WeeklyRule {
  readonly freq: 'weekly';
  readonly weekdays: readonly Weekday[];
  readonly interval: number;
  readonly end?: RepeatEnd;
}

export interface DailyRule {
  readonly freq: 'daily';
  readonly interval: number;
  readonly end?: RepeatEnd;
}

export interface MonthlyRule {
  readonly freq: 'monthly';
  readonly dayOfMonth?: number; // 1-31
  readonly interval: number;
  readonly end?: RepeatEnd;
}

export interface YearlyRule {
  readonly freq: 'yearly';
  readonly interval: number;
  readonly end?: RepeatEnd;
}

export type RepeatRule = WeeklyRule | DailyRule | MonthlyRule | YearlyRule;

// Schedule entries
export interface LessonDetails {
  subject: string;
  lessonType: string;   // лек, пр, л.р. ...
  room: string;
  building: string;
  teacher: string;
  department: string;
}

export interface ScheduleEntry extends LessonDetails {
  readonly start: DateTime;
  readonly end: DateTime;
  readonly repeatRule?: RepeatRule;
}

export interface SemesterWindow {
  start: DateTime;
  end: DateTime; // inclusive
}

/**
 * How an every-week lesson picks its first date.
 *
 * - `semester-parity`: first matching weekday whose ISO week has the same
 *   parity as the semester start's week
 * - `first-occurrence`: first matching weekday on or after semester start
 */
export type WeeklyAnchor = 'semester-parity' | 'first-occurrence';

// Diagnostics
export type ParseWarningCode = 'unknown-weekday' | 'missing-fields';

export interface ParseWarning {
  code: ParseWarningCode;
  message: string;
  weekday: string;
  index?: number;             // position of the record under its weekday
  missingFields?: string[];   // source field names
}

export interface Diagnostics {
  info(message: string): void;
  warn(warning: ParseWarning): void;
}
