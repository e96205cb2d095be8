/**
 * Structural parse failures. Each kind is reported on its own and never
 * folded into another.
 */
export type ParseErrorKind =
  | 'EMPTY_INPUT'
  | 'MISSING_HEADER'
  | 'INCOMPLETE_HEADER'
  | 'INVALID_SEPARATORS'
  | 'MISSING_SEGMENT_TERMINATOR';

export class ParseError extends Error {
  constructor(
    readonly kind: ParseErrorKind,
    message: string,
    /** Character offset in the source where parsing stopped */
    readonly position: number = 0
  ) {
    super(message);
    this.name = 'ParseError';
  }
}
