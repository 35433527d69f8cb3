export * from './types/index.js';
export * from './errors.js';
export * from './recurrence/index.js';
export * from './entry/index.js';
export * from './formatter/index.js';
export * from './parser/timetable-parser.js';
export { firstOccurrence, nextWeekday, weekParity, type WeekParity } from './parser/week-dates.js';
export * from './calendar/index.js';
export * from './config/index.js';
export * from './diagnostics/index.js';
export * from './reporter/index.js';
