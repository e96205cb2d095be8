export type DateTimeParseErrorKind = 'WRONG_DIGIT_COUNT' | 'INVALID_CHARACTER' | 'MALFORMED_OFFSET';

export type DateTimeStage =
  | 'year'
  | 'month'
  | 'day'
  | 'hour'
  | 'minute'
  | 'second'
  | 'fraction'
  | 'offset'
  | 'trailing';

export class DateTimeParseError extends Error {
  constructor(
    readonly kind: DateTimeParseErrorKind,
    readonly stage: DateTimeStage,
    readonly position: number,
    readonly text: string
  ) {
    super(`Cannot parse "${text}": ${describe(kind, stage)} at position ${position}`);
    this.name = 'DateTimeParseError';
  }
}

function describe(kind: DateTimeParseErrorKind, stage: DateTimeStage): string {
  switch (kind) {
    case 'WRONG_DIGIT_COUNT':
      return `wrong number of digits for ${stage}`;
    case 'INVALID_CHARACTER':
      return stage === 'trailing' ? 'unexpected trailing character' : `invalid character in ${stage}`;
    case 'MALFORMED_OFFSET':
      return 'offset must be + or - followed by four digits';
  }
}
