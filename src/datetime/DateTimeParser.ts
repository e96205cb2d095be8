/**
 * Parsers and formatters for date/time values:
 *
 *   DTM  YYYY[MM[DD[HH[MM[SS[.S[S[S[S]]]]]]]]][+/-ZZZZ]
 *   DT   YYYY[MM[DD]]
 *   TM   HH[MM[SS[.S[S[S[S]]]]]][+/-ZZZZ]
 *
 * Each run is a fixed number of digits. The offset may follow any precision.
 */

import { DateTimeParseError } from './DateTimeParseError.js';
import type { DateTimeStage } from './DateTimeParseError.js';
import { getDefaultDateTimeParseOptions } from './TimeStamp.js';
import type {
  DateOnly,
  DateTimeParseOptions,
  TimeOfDay,
  TimeStamp,
  TimeStampOffset,
} from './TimeStamp.js';

const FRACTION_MAX_DIGITS = 4;
const OFFSET_DIGITS = 4;

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

/**
 * Left-to-right reader over one value. In lenient mode the first run that
 * does not fit ends the value and the rest of the text is ignored.
 */
class DateTimeReader {
  private pos = 0;
  private stopped = false;

  constructor(
    private readonly text: string,
    private readonly lenient: boolean
  ) {}

  required(width: number, stage: DateTimeStage): number {
    const value = this.run(width, stage, true);
    if (value === null) {
      throw new DateTimeParseError('WRONG_DIGIT_COUNT', stage, this.pos, this.text);
    }
    return value;
  }

  /**
   * Next run, read only when the coarser part before it is present.
   */
  optional(width: number, stage: DateTimeStage, previous: number | null): number | null {
    return previous === null ? null : this.run(width, stage, false);
  }

  fraction(second: number | null): number | null {
    if (this.stopped || this.text.charAt(this.pos) !== '.') {
      return null;
    }
    if (second === null) {
      return this.fail('INVALID_CHARACTER', 'fraction', this.pos);
    }

    const start = this.pos + 1;
    const end = this.digitsEnd(start, FRACTION_MAX_DIGITS);
    const count = end - start;
    if (count === 0) {
      return this.fail('WRONG_DIGIT_COUNT', 'fraction', start);
    }
    if (!this.lenient && isDigit(this.text.charAt(end))) {
      throw new DateTimeParseError('WRONG_DIGIT_COUNT', 'fraction', start, this.text);
    }

    this.pos = end;
    return Number(this.text.substring(start, end)) * 10 ** (6 - count);
  }

  offset(): TimeStampOffset | null {
    const signChar = this.text.charAt(this.pos);
    if (this.stopped || (signChar !== '+' && signChar !== '-')) {
      return null;
    }

    const start = this.pos + 1;
    const end = this.digitsEnd(start, OFFSET_DIGITS);
    if (end - start < OFFSET_DIGITS || (!this.lenient && isDigit(this.text.charAt(end)))) {
      return this.fail('MALFORMED_OFFSET', 'offset', this.pos);
    }

    const sign = signChar === '-' ? -1 : 1;
    this.pos = end;
    return {
      hours: sign * Number(this.text.substring(start, start + 2)) || 0,
      minutes: sign * Number(this.text.substring(start + 2, end)) || 0,
    };
  }

  finish(): void {
    if (!this.lenient && this.pos < this.text.length) {
      throw new DateTimeParseError('INVALID_CHARACTER', 'trailing', this.pos, this.text);
    }
  }

  private run(width: number, stage: DateTimeStage, required: boolean): number | null {
    if (this.stopped) {
      return null;
    }

    const start = this.pos;
    const end = this.digitsEnd(start, width);
    const count = end - start;
    if (count === 0 && !required) {
      return null;
    }

    if (count < width) {
      if (this.lenient && !required) {
        this.stopped = true;
        return null;
      }
      const next = this.text.charAt(end);
      if (next === '' || next === '.' || next === '+' || next === '-') {
        throw new DateTimeParseError('WRONG_DIGIT_COUNT', stage, start, this.text);
      }
      throw new DateTimeParseError('INVALID_CHARACTER', stage, end, this.text);
    }

    this.pos = end;
    return Number(this.text.substring(start, end));
  }

  private digitsEnd(start: number, max: number): number {
    let end = start;
    while (end - start < max && isDigit(this.text.charAt(end))) {
      end++;
    }
    return end;
  }

  private fail(
    kind: DateTimeParseError['kind'],
    stage: DateTimeStage,
    position: number
  ): null {
    if (this.lenient) {
      this.stopped = true;
      return null;
    }
    throw new DateTimeParseError(kind, stage, position, this.text);
  }
}

function readerFor(text: string, options?: Partial<DateTimeParseOptions>): DateTimeReader {
  const { lenientTrailingChars } = { ...getDefaultDateTimeParseOptions(), ...options };
  return new DateTimeReader(text, lenientTrailingChars);
}

/**
 * Parse a date/time value such as `20230312195905.1234-0700`.
 * @throws DateTimeParseError
 */
export function parseTimeStamp(text: string, options?: Partial<DateTimeParseOptions>): TimeStamp {
  const reader = readerFor(text, options);

  const year = reader.required(4, 'year');
  const month = reader.optional(2, 'month', year);
  const day = reader.optional(2, 'day', month);
  const hour = reader.optional(2, 'hour', day);
  const minute = reader.optional(2, 'minute', hour);
  const second = reader.optional(2, 'second', minute);
  const microsecond = reader.fraction(second);
  const offset = reader.offset();
  reader.finish();

  return { year, month, day, hour, minute, second, microsecond, offset };
}

/**
 * Parse a date value such as `20230312`.
 * @throws DateTimeParseError
 */
export function parseDate(text: string, options?: Partial<DateTimeParseOptions>): DateOnly {
  const reader = readerFor(text, options);

  const year = reader.required(4, 'year');
  const month = reader.optional(2, 'month', year);
  const day = reader.optional(2, 'day', month);
  reader.finish();

  return { year, month, day };
}

/**
 * Parse a time value such as `195905.1234-0700`.
 * @throws DateTimeParseError
 */
export function parseTime(text: string, options?: Partial<DateTimeParseOptions>): TimeOfDay {
  const reader = readerFor(text, options);

  const hour = reader.required(2, 'hour');
  const minute = reader.optional(2, 'minute', hour);
  const second = reader.optional(2, 'second', minute);
  const microsecond = reader.fraction(second);
  const offset = reader.offset();
  reader.finish();

  return { hour, minute, second, microsecond, offset };
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

function formatOffset(offset: TimeStampOffset | null): string {
  if (!offset) {
    return '';
  }
  const sign = offset.hours < 0 || offset.minutes < 0 ? '-' : '+';
  return sign + pad(Math.abs(offset.hours), 2) + pad(Math.abs(offset.minutes), 2);
}

/**
 * Time-of-day digits from the hour down, stopping at the first absent part.
 */
function formatClock(
  hour: number | null,
  minute: number | null,
  second: number | null,
  microsecond: number | null
): string {
  if (hour === null) return '';
  let result = pad(hour, 2);
  if (minute === null) return result;
  result += pad(minute, 2);
  if (second === null) return result;
  result += pad(second, 2);
  if (microsecond === null) return result;
  return result + '.' + pad(microsecond, 6).substring(0, FRACTION_MAX_DIGITS);
}

export function formatDate(date: DateOnly): string {
  let result = pad(date.year, 4);
  if (date.month === null) return result;
  result += pad(date.month, 2);
  if (date.day === null) return result;
  return result + pad(date.day, 2);
}

export function formatTime(time: TimeOfDay): string {
  return formatClock(time.hour, time.minute, time.second, time.microsecond) + formatOffset(time.offset);
}

/**
 * Render a timestamp at the precision it carries, e.g. `20230312195905.1234-0700`.
 */
export function formatTimeStamp(timestamp: TimeStamp): string {
  let result = formatDate(timestamp);
  if (timestamp.month !== null && timestamp.day !== null) {
    result += formatClock(timestamp.hour, timestamp.minute, timestamp.second, timestamp.microsecond);
  }
  return result + formatOffset(timestamp.offset);
}
