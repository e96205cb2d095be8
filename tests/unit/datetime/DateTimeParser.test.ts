import { describe, it, expect } from '@jest/globals';
import {
  formatDate,
  formatTime,
  formatTimeStamp,
  parseDate,
  parseTime,
  parseTimeStamp,
} from '../../../src/datetime/DateTimeParser.js';
import { DateTimeParseError } from '../../../src/datetime/DateTimeParseError.js';
import type { TimeStamp } from '../../../src/datetime/TimeStamp.js';

function parseFailure(parse: () => unknown): DateTimeParseError {
  try {
    parse();
  } catch (err) {
    if (err instanceof DateTimeParseError) return err;
    throw err;
  }
  throw new Error('expected a DateTimeParseError');
}

const lenient = { lenientTrailingChars: true };

describe('DateTimeParser', () => {
  describe('parseTimeStamp()', () => {
    it('should parse a full timestamp', () => {
      expect(parseTimeStamp('20230312195905.1234-0700')).toEqual({
        year: 2023,
        month: 3,
        day: 12,
        hour: 19,
        minute: 59,
        second: 5,
        microsecond: 123400,
        offset: { hours: -7, minutes: 0 },
      });
    });

    it('should keep the precision that was given', () => {
      expect(parseTimeStamp('2023')).toEqual({
        year: 2023,
        month: null,
        day: null,
        hour: null,
        minute: null,
        second: null,
        microsecond: null,
        offset: null,
      });
      expect(parseTimeStamp('202303121959')).toMatchObject({ hour: 19, minute: 59, second: null });
      expect(parseTimeStamp('20230312195905.5').microsecond).toBe(500000);
    });

    it('should allow an offset after any precision', () => {
      expect(parseTimeStamp('2023+0530')).toMatchObject({ month: null, offset: { hours: 5, minutes: 30 } });
      expect(parseTimeStamp('20230312-0730').offset).toEqual({ hours: -7, minutes: -30 });
    });

    it('should normalize a negative zero offset', () => {
      const offset = parseTimeStamp('20230312-0000').offset;
      expect(offset).toEqual({ hours: 0, minutes: 0 });
      expect(Object.is(offset?.hours, -0)).toBe(false);
    });

    it.each([
      ['', 'WRONG_DIGIT_COUNT', 'year', 0],
      ['202', 'WRONG_DIGIT_COUNT', 'year', 0],
      ['20a3', 'INVALID_CHARACTER', 'year', 2],
      ['2023031', 'WRONG_DIGIT_COUNT', 'day', 6],
      ['2023031X', 'INVALID_CHARACTER', 'day', 7],
      ['202303121959.5', 'INVALID_CHARACTER', 'fraction', 12],
      ['20230312195905.', 'WRONG_DIGIT_COUNT', 'fraction', 15],
      ['20230312195905.12345', 'WRONG_DIGIT_COUNT', 'fraction', 15],
      ['2023+07', 'MALFORMED_OFFSET', 'offset', 4],
      ['20230312+07000', 'MALFORMED_OFFSET', 'offset', 8],
      ['20230312T', 'INVALID_CHARACTER', 'trailing', 8],
    ])('should reject %j (%s in %s at %d)', (text, kind, stage, position) => {
      const error = parseFailure(() => parseTimeStamp(text));
      expect(error.kind).toBe(kind);
      expect(error.stage).toBe(stage);
      expect(error.position).toBe(position);
      expect(error.text).toBe(text);
    });

    it('should describe the failure in the message', () => {
      expect(parseFailure(() => parseTimeStamp('20a3')).message).toBe(
        'Cannot parse "20a3": invalid character in year at position 2'
      );
    });

    describe('lenient trailing characters', () => {
      it('should stop at the first run that does not fit', () => {
        expect(parseTimeStamp('20230312T1200', lenient)).toMatchObject({
          year: 2023,
          month: 3,
          day: 12,
          hour: null,
        });
        expect(parseTimeStamp('2023031', lenient)).toMatchObject({ month: 3, day: null });
        expect(parseTimeStamp('2023+07', lenient)).toMatchObject({ month: null, offset: null });
      });

      it('should ignore extra fraction digits', () => {
        const timestamp = parseTimeStamp('20230312195905.12345', lenient);
        expect(timestamp.microsecond).toBe(123400);
        expect(timestamp.offset).toBeNull();
      });

      it('should still require a year', () => {
        expect(parseFailure(() => parseTimeStamp('202', lenient)).stage).toBe('year');
      });
    });
  });

  describe('parseDate()', () => {
    it('should parse dates', () => {
      expect(parseDate('20230312')).toEqual({ year: 2023, month: 3, day: 12 });
      expect(parseDate('2023')).toEqual({ year: 2023, month: null, day: null });
    });

    it('should reject time digits unless lenient', () => {
      const error = parseFailure(() => parseDate('20230312120000'));
      expect(error.stage).toBe('trailing');
      expect(error.position).toBe(8);
      expect(parseDate('20230312120000', lenient)).toEqual({ year: 2023, month: 3, day: 12 });
    });
  });

  describe('parseTime()', () => {
    it('should parse times', () => {
      expect(parseTime('195905.1234-0700')).toEqual({
        hour: 19,
        minute: 59,
        second: 5,
        microsecond: 123400,
        offset: { hours: -7, minutes: 0 },
      });
      expect(parseTime('1200+0530')).toEqual({
        hour: 12,
        minute: 0,
        second: null,
        microsecond: null,
        offset: { hours: 5, minutes: 30 },
      });
    });

    it('should require a two-digit hour', () => {
      const error = parseFailure(() => parseTime('1'));
      expect(error.kind).toBe('WRONG_DIGIT_COUNT');
      expect(error.stage).toBe('hour');
    });
  });

  describe('formatting', () => {
    const base: TimeStamp = {
      year: 2023,
      month: 3,
      day: 12,
      hour: 19,
      minute: 59,
      second: 5,
      microsecond: 5000,
      offset: null,
    };

    it('should format a parsed timestamp back to its text', () => {
      expect(formatTimeStamp(parseTimeStamp('20230312195905.1234-0700'))).toBe('20230312195905.1234-0700');
    });

    it('should pad each part', () => {
      expect(formatTimeStamp(base)).toBe('20230312195905.0050');
      expect(formatDate({ year: 2023, month: 1, day: 2 })).toBe('20230102');
    });

    it('should stop at the first absent part', () => {
      expect(formatTimeStamp({ ...base, day: null })).toBe('202303');
      expect(formatTimeStamp({ ...base, minute: null })).toBe('2023031219');
    });

    it('should format offsets with a single sign', () => {
      expect(formatTimeStamp({ ...base, second: null, offset: { hours: 0, minutes: -30 } })).toBe('202303121959-0030');
      expect(formatTimeStamp(parseTimeStamp('20230312-0000'))).toBe('20230312+0000');
      expect(
        formatTime({ hour: 7, minute: null, second: null, microsecond: null, offset: { hours: 5, minutes: 30 } })
      ).toBe('07+0530');
    });
  });
});
