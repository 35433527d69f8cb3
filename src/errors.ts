/**
 * Failure types raised by the conversion pipeline
 */

export class TimetableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The input document is not JSON, or not an object of weekday arrays. */
export class TimetableFormatError extends TimetableError {}

/** A time or date token could not be read. Aborts the run. */
export class MalformedValueError extends TimetableError {
  constructor(
    public readonly field: 'time' | 'date',
    public readonly value: string,
    public readonly weekday: string
  ) {
    super(`Malformed ${field} "${value}" under weekday ${weekday}`);
  }
}

/** An entry or repeat rule broke one of its invariants. */
export class ValidationError extends TimetableError {}

export class SemesterConfigError extends TimetableError {}
