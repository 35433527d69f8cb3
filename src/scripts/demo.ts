#!/usr/bin/env tsx
/**
 * Demo Script - Full Conversion Pipeline
 *
 * Runs the complete conversion using demo data:
 * 1. Load timetable
 * 2. Resolve entries for the autumn semester
 * 3. Build the calendar
 * 4. Print a report
 */

import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import chalk from 'chalk';

import { buildCalendar } from '../calendar/index.js';
import { resolveSemester } from '../config/index.js';
import { createCollectingDiagnostics } from '../diagnostics/index.js';
import { parseTimetable } from '../parser/timetable-parser.js';
import { generateReport, summarizeConversion } from '../reporter/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const rootDir = resolve(__dirname, '../..');

async function main() {
  console.log(chalk.bold.cyan('\n═══════════════════════════════════════════════════════════════'));
  console.log(chalk.bold.cyan('           TIMETABLE TO ICS - DEMO RUN'));
  console.log(chalk.bold.cyan('═══════════════════════════════════════════════════════════════\n'));

  const inputPath = resolve(rootDir, 'data/demo/timetable.json');
  const outputDir = resolve(rootDir, 'output');

  if (!existsSync(outputDir)) {
    await mkdir(outputDir, { recursive: true });
    console.log(chalk.gray(`Created output directory: ${outputDir}`));
  }

  const semester = resolveSemester({ start: '01.09.2025', end: '31.12.2025' });
  const diagnostics = createCollectingDiagnostics();

  console.log(chalk.yellow('Step 1: Parsing timetable...'));
  const entries = parseTimetable(await readFile(inputPath, 'utf-8'), { semester, diagnostics });
  console.log(chalk.green(`  ✓ ${entries.length} entries, ${diagnostics.warnings.length} skipped\n`));

  console.log(chalk.yellow('Step 2: Building calendar...'));
  const outputPath = resolve(outputDir, 'demo-schedule.ics');
  await writeFile(outputPath, buildCalendar(entries), 'utf-8');
  console.log(chalk.green(`  ✓ Saved ${outputPath}\n`));

  console.log(generateReport(
    summarizeConversion(entries, diagnostics.warnings, semester),
    { format: 'text', colorOutput: true }
  ));
}

main().catch((err) => {
  console.error(chalk.red('Error:'), err instanceof Error ? err.message : err);
  process.exit(1);
});
