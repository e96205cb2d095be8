export type QueryParseErrorKind =
  | 'EMPTY_SEGMENT_NAME'
  | 'INVALID_SEGMENT_NAME'
  | 'INVALID_INDEX'
  | 'MISSING_INDEX'
  | 'UNCLOSED_BRACKET'
  | 'UNEXPECTED_CHARACTER';

/**
 * Thrown when a location path is not syntactically valid.
 * `position` is the character index in the path where parsing stopped.
 */
export class QueryParseError extends Error {
  constructor(
    readonly kind: QueryParseErrorKind,
    readonly path: string,
    readonly position: number,
    detail: string
  ) {
    super(`Invalid location query "${path}" at position ${position}: ${detail}`);
    this.name = 'QueryParseError';
  }
}
