/**
 * VEVENT serialization for schedule entries (RFC 5545)
 */

import { createHash } from 'crypto';
import { DateTime } from 'luxon';

import { defaultFormatter, formatEntry, type EntryFormatter } from '../formatter/index.js';
import { formatRepeatRule } from '../recurrence/index.js';
import type { ScheduleEntry } from '../types/index.js';

export interface SerializeOptions {
  formatter?: EntryFormatter;
  /** DTSTAMP value; defaults to the current time */
  stamp?: DateTime;
}

const LOCAL_FORMAT = "yyyyMMdd'T'HHmmss";
const UTC_FORMAT = "yyyyMMdd'T'HHmmss'Z'";
const MAX_LINE_OCTETS = 75;

export function escapeText(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\r?\n/g, '\\n');
}

/**
 * Split a content line into chunks of at most 75 octets, continuation
 * lines starting with a single space. Never splits a UTF-8 sequence.
 */
export function foldLine(line: string): string {
  if (Buffer.byteLength(line, 'utf8') <= MAX_LINE_OCTETS) {
    return line;
  }

  const chunks: string[] = [];
  let chunk = '';
  let size = 0;
  let limit = MAX_LINE_OCTETS;

  for (const char of line) {
    const octets = Buffer.byteLength(char, 'utf8');
    if (size + octets > limit) {
      chunks.push(chunk);
      chunk = '';
      size = 0;
      limit = MAX_LINE_OCTETS - 1; // leading space
    }
    chunk += char;
    size += octets;
  }
  chunks.push(chunk);

  return chunks.join('\r\n ');
}

function dateTimeProperty(name: string, value: DateTime): string {
  if (value.zone.type === 'iana' && !value.zone.isUniversal) {
    return `${name};TZID=${value.zoneName}:${value.toFormat(LOCAL_FORMAT)}`;
  }
  return `${name}:${value.toUTC().toFormat(UTC_FORMAT)}`;
}

/**
 * Stable identifier: the same lesson at the same time always gets the same UID.
 */
export function entryUid(entry: ScheduleEntry): string {
  const hash = createHash('sha256')
    .update(JSON.stringify({
      start: entry.start.toISO(),
      end: entry.end.toISO(),
      subject: entry.subject,
      lessonType: entry.lessonType,
      room: entry.room,
      building: entry.building,
      teacher: entry.teacher,
    }))
    .digest('hex');
  return `${hash.slice(0, 32)}@timetable-ics`;
}

/**
 * One VEVENT block, CRLF separated, without the VCALENDAR wrapper.
 */
export function serializeEntry(entry: ScheduleEntry, options: SerializeOptions = {}): string {
  const { formatter = defaultFormatter, stamp = DateTime.utc() } = options;
  const { header, description } = formatEntry(formatter, entry);

  const lines = [
    'BEGIN:VEVENT',
    `UID:${entryUid(entry)}`,
    `DTSTAMP:${stamp.toUTC().toFormat(UTC_FORMAT)}`,
    `SUMMARY:${escapeText(header)}`,
    dateTimeProperty('DTSTART', entry.start),
    dateTimeProperty('DTEND', entry.end),
    `LOCATION:${escapeText(`${entry.building}, ${entry.room}`)}`,
    `DESCRIPTION:${escapeText(description)}`,
  ];

  if (entry.repeatRule) {
    lines.push(`RRULE:${formatRepeatRule(entry.repeatRule)}`);
  }

  lines.push('END:VEVENT');

  return lines.map(foldLine).join('\r\n');
}
