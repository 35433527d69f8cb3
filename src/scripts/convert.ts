#!/usr/bin/env node
/**
 * Timetable Conversion CLI
 *
 * Convert a weekday-keyed timetable JSON file into an ICS calendar.
 *
 * Usage:
 *   npm run convert -- --input ./timetable.json --start 01.09.2025 --end 31.12.2025
 *   npm run convert -- -i ./timetable.json -o ./out/schedule.ics --start 2026-02-02 --end 2026-05-31 --report text
 */

import { Command, Option } from 'commander';
import { dirname, resolve } from 'path';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import chalk from 'chalk';

import { buildCalendar } from '../calendar/index.js';
import { DEFAULT_LESSON_MINUTES, DEFAULT_TIMEZONE, resolveSemester } from '../config/index.js';
import { createCollectingDiagnostics, createConsoleDiagnostics } from '../diagnostics/index.js';
import { FORMATTERS, type FormatterName } from '../formatter/index.js';
import { parseTimetable } from '../parser/timetable-parser.js';
import { generateReport, summarizeConversion, type ReportOptions } from '../reporter/index.js';
import type { WeeklyAnchor } from '../types/index.js';

interface ConvertOptions {
  input: string;
  output: string;
  start: string;
  end: string;
  timezone: string;
  year?: string;
  lessonMinutes: string;
  anchor: WeeklyAnchor;
  formatter: FormatterName;
  report?: ReportOptions['format'];
  dryRun?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

const program = new Command();

program
  .name('timetable-ics')
  .description('Convert a weekly timetable JSON file into an ICS calendar')
  .requiredOption('-i, --input <file>', 'Timetable JSON file')
  .option('-o, --output <file>', 'ICS output file', './schedule.ics')
  .requiredOption('--start <date>', 'Semester start (DD.MM.YYYY or YYYY-MM-DD)')
  .requiredOption('--end <date>', 'Semester end, inclusive (DD.MM.YYYY or YYYY-MM-DD)')
  .option('--timezone <zone>', 'IANA timezone of the timetable', DEFAULT_TIMEZONE)
  .option('--year <n>', 'Year for DD.MM dates (default: semester start year)')
  .option('--lesson-minutes <n>', 'Lesson length in minutes', String(DEFAULT_LESSON_MINUTES))
  .addOption(
    new Option('--anchor <mode>', 'First week of every-week lessons')
      .choices(['semester-parity', 'first-occurrence'])
      .default('semester-parity')
  )
  .addOption(
    new Option('--formatter <name>', 'Event title/description style')
      .choices(Object.keys(FORMATTERS))
      .default('default')
  )
  .addOption(
    new Option('--report <format>', 'Print a conversion report')
      .choices(['text', 'json', 'markdown'])
  )
  .option('--dry-run', 'Parse and report without writing the ICS file')
  .option('--quiet', 'Suppress progress output')
  .option('--verbose', 'Show per-weekday parsing details')
  .parse(process.argv);

const opts = program.opts<ConvertOptions>();

function parsePositiveInt(value: string, name: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

async function main() {
  const inputPath = resolve(opts.input);
  const outputPath = resolve(opts.output);

  if (!existsSync(inputPath)) {
    console.error(chalk.red(`Error: Timetable file not found: ${inputPath}`));
    process.exit(1);
  }

  const semester = resolveSemester({ start: opts.start, end: opts.end, timezone: opts.timezone });
  const year = opts.year === undefined ? undefined : parsePositiveInt(opts.year, '--year');
  const lessonMinutes = parsePositiveInt(opts.lessonMinutes, '--lesson-minutes');

  if (!opts.quiet) {
    console.log(chalk.cyan(
      `Converting ${inputPath} for ${semester.start.toFormat('dd.MM.yyyy')} – ${semester.end.toFormat('dd.MM.yyyy')}`
    ));
  }

  const json = await readFile(inputPath, 'utf-8');
  const diagnostics = createCollectingDiagnostics(
    createConsoleDiagnostics({ verbose: opts.verbose, quiet: opts.quiet })
  );

  const entries = parseTimetable(json, {
    semester,
    year,
    lessonMinutes,
    weeklyAnchor: opts.anchor,
    diagnostics,
  });
  const calendar = buildCalendar(entries, { formatter: FORMATTERS[opts.formatter] });

  if (!opts.quiet) {
    const skipped = diagnostics.warnings.length;
    console.log(chalk.green(`  ${entries.length} events generated`) + (skipped ? chalk.yellow(`, ${skipped} skipped`) : ''));
  }

  if (opts.report) {
    const summary = summarizeConversion(entries, diagnostics.warnings, semester);
    console.log(generateReport(summary, { format: opts.report, colorOutput: opts.report === 'text' }));
  }

  if (opts.dryRun) {
    return;
  }

  const outputDir = dirname(outputPath);
  if (!existsSync(outputDir)) {
    await mkdir(outputDir, { recursive: true });
  }
  await writeFile(outputPath, calendar, 'utf-8');

  if (!opts.quiet) {
    console.log(chalk.gray(`  Saved: ${outputPath}`));
  }
}

main().catch((err) => {
  console.error(chalk.red('Error:'), err instanceof Error ? err.message : err);
  process.exit(1);
});
