import { decode } from './escaping.js';
import type { Separators } from './Separators.js';
import type { Span } from './Span.js';

/**
 * Base for every parsed node. A node holds the message source and its own
 * offsets; text is sliced out of the source only when asked for.
 */
export abstract class SourceNode {
  protected constructor(
    protected readonly source: string,
    readonly range: Span
  ) {}

  /**
   * The text as it appears in the message, escape sequences included.
   */
  rawValue(): string {
    return this.source.substring(this.range.start, this.range.end);
  }

  /**
   * The text with escape sequences decoded using the given separators.
   */
  decodedValue(separators: Separators): string {
    return decode(this.rawValue(), separators);
  }

  isEmpty(): boolean {
    return this.range.start === this.range.end;
  }

  abstract toJSON(): object;
}

/**
 * Look up a 1-based position. Zero, negative and fractional indexes are absent.
 */
export function oneBased<T>(items: readonly T[], index: number): T | null {
  if (!Number.isInteger(index) || index < 1) {
    return null;
  }
  return items[index - 1] ?? null;
}
