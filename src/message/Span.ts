/**
 * Half-open character range [start, end) into a message's source text.
 */
export interface Span {
  readonly start: number;
  readonly end: number;
}

export function createSpan(start: number, end: number): Span {
  return Object.freeze({ start, end });
}

/**
 * True when `offset` lies inside the span or on its end, so an empty span
 * still matches the offset where it sits.
 */
export function spanIncludes(span: Span, offset: number): boolean {
  return offset >= span.start && offset <= span.end;
}

/**
 * Split [start, end) of `source` on a single-character delimiter, preserving
 * empty pieces. Always yields at least one span.
 */
export function splitSpan(source: string, start: number, end: number, delimiter: string): Span[] {
  const result: Span[] = [];
  let pieceStart = start;

  let next = source.indexOf(delimiter, pieceStart);
  while (next !== -1 && next < end) {
    result.push(createSpan(pieceStart, next));
    pieceStart = next + delimiter.length;
    next = source.indexOf(delimiter, pieceStart);
  }
  result.push(createSpan(pieceStart, end));

  return result;
}
