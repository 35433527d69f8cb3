/**
 * Calendar assembly
 */

import { DateTime } from 'luxon';

import { DEFAULT_PRODUCT_ID } from '../config/index.js';
import type { ScheduleEntry } from '../types/index.js';
import { serializeEntry, type SerializeOptions } from './event.js';

export interface CalendarOptions {
  productId?: string;
}

/**
 * Wrap pre-serialized VEVENT blocks in a VCALENDAR document.
 * Blocks are passed through as given.
 */
export function assembleCalendar(events: readonly string[], options: CalendarOptions = {}): string {
  const { productId = DEFAULT_PRODUCT_ID } = options;
  return [
    'BEGIN:VCALENDAR',
    'VERSION:2.0',
    `PRODID:${productId}`,
    ...events,
    'END:VCALENDAR',
  ].join('\r\n');
}

export function buildCalendar(
  entries: readonly ScheduleEntry[],
  options: CalendarOptions & SerializeOptions = {}
): string {
  const serializeOptions = { ...options, stamp: options.stamp ?? DateTime.utc() };
  const events = entries.map(entry => serializeEntry(entry, serializeOptions));
  return assembleCalendar(events, options);
}

export { escapeText, foldLine, entryUid, serializeEntry, type SerializeOptions } from './event.js';
