/**
 * A parsed message: the source text plus a structural index into it.
 *
 * Every node in the tree refers back to `source` by offset, so nothing below
 * the message copies text until rawValue() or decodedValue() is called. The
 * tree is frozen once built.
 */

import { MessageParser } from '../parser/MessageParser.js';
import type { ParserProperties } from '../parser/ParserProperties.js';
import { locateCursor } from '../query/CursorLocator.js';
import type { CursorLocation } from '../query/CursorLocator.js';
import type { LocationQuery } from '../query/LocationQuery.js';
import { query } from '../query/QueryEngine.js';
import type { QueryResult } from '../query/QueryEngine.js';
import { oneBased } from './SourceNode.js';
import type { Segment, SegmentJSON } from './Segment.js';
import type { Separators } from './Separators.js';

export interface MessageJSON {
  separators: Separators;
  lenientNewlines: boolean;
  segments: SegmentJSON[];
}

export class Message {
  readonly segments: readonly Segment[];

  constructor(
    readonly source: string,
    readonly separators: Separators,
    segments: Segment[],
    readonly lenientNewlines: boolean = false
  ) {
    this.segments = Object.freeze(segments);
  }

  /**
   * Parse ER7 text into a message.
   * @throws ParseError when the input is empty or the header segment is unusable
   */
  static parse(source: string, properties?: Partial<ParserProperties>): Message {
    return new MessageParser(properties).parse(source);
  }

  /**
   * First segment with the given name, or null.
   */
  segment(name: string): Segment | null {
    return this.segments.find((s) => s.name === name) ?? null;
  }

  /**
   * All segments with the given name, in source order. The returned iterable
   * can be iterated any number of times.
   */
  segmentsNamed(name: string): Iterable<Segment> {
    const segments = this.segments;
    return {
      *[Symbol.iterator]() {
        for (const segment of segments) {
          if (segment.name === name) {
            yield segment;
          }
        }
      },
    };
  }

  /**
   * The nth (1-based) segment with the given name, or null.
   */
  segmentN(name: string, occurrence: number): Segment | null {
    return oneBased(Array.from(this.segmentsNamed(name)), occurrence);
  }

  segmentCount(name: string): number {
    let count = 0;
    for (const segment of this.segments) {
      if (segment.name === name) count++;
    }
    return count;
  }

  /**
   * The full source text the message was parsed from.
   */
  rawValue(): string {
    return this.source;
  }

  /**
   * Resolve a location path such as `PID.5.1` or `OBX[2].5`.
   * @throws QueryParseError when the path is malformed
   */
  query(path: string | LocationQuery): QueryResult | null {
    return query(this, path);
  }

  /**
   * Resolve a location path to its decoded text, or null when nothing matches.
   * @throws QueryParseError when the path is malformed
   */
  queryValue(path: string | LocationQuery): string | null {
    const result = query(this, path);
    return result ? result.node.decodedValue(this.separators) : null;
  }

  /**
   * Find the structural path enclosing a character offset.
   */
  locateCursor(offset: number): CursorLocation | null {
    return locateCursor(this, offset);
  }

  toJSON(): MessageJSON {
    return {
      separators: { ...this.separators },
      lenientNewlines: this.lenientNewlines,
      segments: this.segments.map((s) => s.toJSON()),
    };
  }
}
