/**
 * Conversion Report Generator
 *
 * Summarizes the entries produced from a timetable, in human-readable and
 * machine-readable forms.
 */

import chalk from 'chalk';
import type { ParseWarning, ScheduleEntry, SemesterWindow } from '../types/index.js';

const DAYS = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'];

export type EntryKind = 'weekly' | 'biweekly-even' | 'biweekly-odd' | 'single' | 'other';

export interface LessonLine {
  day: string;
  time: string;        // HH:mm-HH:mm
  kind: EntryKind;
  subject: string;
  lessonType: string;
  firstDate: string;   // yyyy-MM-dd
}

export interface ConversionSummary {
  semester: {
    start: string;
    end: string;
    timezone: string;
  };
  totalEntries: number;
  byKind: Record<EntryKind, number>;
  byWeekday: { day: string; entries: number }[];
  lessons: LessonLine[];
  warnings: ParseWarning[];
}

export interface ReportOptions {
  format: 'text' | 'json' | 'markdown';
  colorOutput?: boolean;
}

export function entryKind(entry: ScheduleEntry): EntryKind {
  const rule = entry.repeatRule;
  if (!rule) {
    return 'single';
  }
  if (rule.freq !== 'weekly') {
    return 'other';
  }
  if (rule.interval === 1) {
    return 'weekly';
  }
  if (rule.interval === 2) {
    return entry.start.weekNumber % 2 === 0 ? 'biweekly-even' : 'biweekly-odd';
  }
  return 'other';
}

export function summarizeConversion(
  entries: readonly ScheduleEntry[],
  warnings: readonly ParseWarning[],
  semester: SemesterWindow
): ConversionSummary {
  const byKind: Record<EntryKind, number> = {
    'weekly': 0,
    'biweekly-even': 0,
    'biweekly-odd': 0,
    'single': 0,
    'other': 0,
  };
  const perDay = DAYS.map(() => 0);
  const lessons: LessonLine[] = [];

  for (const entry of entries) {
    const kind = entryKind(entry);
    const dayIndex = entry.start.weekday - 1;
    byKind[kind]++;
    perDay[dayIndex]++;
    lessons.push({
      day: DAYS[dayIndex],
      time: `${entry.start.toFormat('HH:mm')}-${entry.end.toFormat('HH:mm')}`,
      kind,
      subject: entry.subject,
      lessonType: entry.lessonType,
      firstDate: entry.start.toFormat('yyyy-MM-dd'),
    });
  }

  return {
    semester: {
      start: semester.start.toFormat('yyyy-MM-dd'),
      end: semester.end.toFormat('yyyy-MM-dd'),
      timezone: semester.start.zone.name,
    },
    totalEntries: entries.length,
    byKind,
    byWeekday: DAYS
      .map((day, i) => ({ day, entries: perDay[i] }))
      .filter(d => d.entries > 0),
    lessons,
    warnings: [...warnings],
  };
}

export function generateReport(summary: ConversionSummary, options: ReportOptions): string {
  switch (options.format) {
    case 'json':
      return JSON.stringify(summary, null, 2);
    case 'markdown':
      return generateMarkdownReport(summary);
    case 'text':
    default:
      return generateTextReport(summary, options);
  }
}

function generateMarkdownReport(summary: ConversionSummary): string {
  const lines: string[] = [];

  lines.push('# Timetable Conversion Report');
  lines.push('');
  lines.push(`Semester: ${summary.semester.start} – ${summary.semester.end} (${summary.semester.timezone})`);
  lines.push('');

  lines.push('## Summary');
  lines.push('');
  lines.push('| Metric | Value |');
  lines.push('|--------|-------|');
  lines.push(`| Events | ${summary.totalEntries} |`);
  lines.push(`| Weekly | ${summary.byKind.weekly} |`);
  lines.push(`| Even weeks | ${summary.byKind['biweekly-even']} |`);
  lines.push(`| Odd weeks | ${summary.byKind['biweekly-odd']} |`);
  lines.push(`| Single dates | ${summary.byKind.single} |`);
  lines.push(`| Skipped | ${summary.warnings.length} |`);
  lines.push('');

  if (summary.lessons.length > 0) {
    lines.push('## Lessons');
    lines.push('');
    lines.push('| Day | Time | Repeats | Lesson | First date |');
    lines.push('|-----|------|---------|--------|------------|');
    for (const l of summary.lessons) {
      lines.push(`| ${l.day} | ${l.time} | ${l.kind} | ${l.lessonType} - ${l.subject} | ${l.firstDate} |`);
    }
    lines.push('');
  }

  if (summary.warnings.length > 0) {
    lines.push('## Warnings');
    lines.push('');
    for (const w of summary.warnings) {
      lines.push(`- **${w.code}**: ${w.message}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

function generateTextReport(summary: ConversionSummary, options: ReportOptions): string {
  const lines: string[] = [];
  const c = options.colorOutput ? chalk : {
    bold: (s: string) => s,
    yellow: (s: string) => s,
    cyan: (s: string) => s,
  };

  lines.push(c.bold('═'.repeat(60)));
  lines.push(c.bold('TIMETABLE CONVERSION REPORT'));
  lines.push(c.bold('═'.repeat(60)));
  lines.push(`Semester: ${summary.semester.start} – ${summary.semester.end} (${summary.semester.timezone})`);
  lines.push('');

  lines.push(`  Events:        ${summary.totalEntries}`);
  lines.push(`  Weekly:        ${summary.byKind.weekly}`);
  lines.push(`  Even weeks:    ${summary.byKind['biweekly-even']}`);
  lines.push(`  Odd weeks:     ${summary.byKind['biweekly-odd']}`);
  lines.push(`  Single dates:  ${summary.byKind.single}`);
  lines.push(`  Skipped:       ${summary.warnings.length}`);
  lines.push('');

  for (const { day } of summary.byWeekday) {
    lines.push(c.cyan(day));
    for (const l of summary.lessons.filter(x => x.day === day)) {
      lines.push(`  ${l.time}  ${l.kind.padEnd(14)}${l.lessonType} - ${l.subject} (from ${l.firstDate})`);
    }
  }

  if (summary.warnings.length > 0) {
    lines.push('');
    lines.push(c.yellow('WARNINGS:'));
    for (const w of summary.warnings) {
      lines.push(c.yellow(`  • ${w.message}`));
    }
  }

  return lines.join('\n');
}
