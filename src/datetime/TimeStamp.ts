/**
 * Date/time values as written in messages (DT, TM and DTM/TS data types).
 *
 * Precision is carried by which parts are present: a null part means the
 * value was not given, not zero. A part is only present when every coarser
 * part is. Values are not calendar-checked.
 */

/**
 * Offset from UTC. Both parts carry the sign, so -0730 is { hours: -7, minutes: -30 }.
 */
export interface TimeStampOffset {
  readonly hours: number;
  readonly minutes: number;
}

export interface TimeStamp {
  readonly year: number;
  readonly month: number | null;
  readonly day: number | null;
  readonly hour: number | null;
  readonly minute: number | null;
  readonly second: number | null;
  /** 0-999999; four fraction digits are kept, so the last two are always 0 */
  readonly microsecond: number | null;
  readonly offset: TimeStampOffset | null;
}

export interface DateOnly {
  readonly year: number;
  readonly month: number | null;
  readonly day: number | null;
}

export interface TimeOfDay {
  readonly hour: number;
  readonly minute: number | null;
  readonly second: number | null;
  readonly microsecond: number | null;
  readonly offset: TimeStampOffset | null;
}

export interface DateTimeParseOptions {
  /** Stop at the first character that does not fit instead of failing */
  lenientTrailingChars: boolean;
}

export function getDefaultDateTimeParseOptions(): DateTimeParseOptions {
  return {
    lenientTrailingChars: false,
  };
}
