/**
 * ER7 structural parser.
 *
 * Key behaviors:
 * - Extract encoding characters from the MSH/FHS/BHS header segment
 * - Split segments on the segment terminator (`\r`, or `\n` / `\r\n` when lenient)
 * - Index fields, repetitions, components and subcomponents as offsets
 * - Handle the special header fields 1 (field separator) and 2 (encoding characters)
 *
 * No escape decoding happens here; splitting works on raw text.
 */

import { getLogger } from '../logging/index.js';
import { Component } from '../message/Component.js';
import { Field } from '../message/Field.js';
import { Message } from '../message/Message.js';
import { Repetition } from '../message/Repetition.js';
import { Segment } from '../message/Segment.js';
import { HEADER_SEGMENT_NAMES, HL7V2_DEFAULTS, validateSeparators } from '../message/Separators.js';
import type { Separators } from '../message/Separators.js';
import { createSpan, splitSpan } from '../message/Span.js';
import type { Span } from '../message/Span.js';
import { Subcomponent } from '../message/Subcomponent.js';
import { ParseError } from './ParseError.js';
import { getDefaultParserProperties } from './ParserProperties.js';
import type { ParserProperties } from './ParserProperties.js';

const logger = getLogger('parser');

const CR = HL7V2_DEFAULTS.SEGMENT_DELIMITER;
const LF = '\n';

/** Header name, field separator and four encoding characters */
const MIN_HEADER_LENGTH = 8;

export class MessageParser {
  private properties: ParserProperties;

  constructor(properties?: Partial<ParserProperties>) {
    this.properties = {
      ...getDefaultParserProperties(),
      ...properties,
    };
  }

  /**
   * Parse ER7 text into a structural index.
   * @throws ParseError
   */
  parse(source: string): Message {
    const separators = this.readHeader(source);

    const segments: Segment[] = [];
    for (const span of this.segmentSpans(source)) {
      segments.push(parseSegment(source, span, separators));
    }

    if (logger.isDebugEnabled()) {
      logger.debug(`Parsed ${segments.length} segment(s)`, {
        length: source.length,
        lenientNewlines: this.properties.lenientNewlines,
      });
    }

    return new Message(source, separators, segments, this.properties.lenientNewlines);
  }

  /**
   * Read the separators declared by the header segment.
   */
  private readHeader(source: string): Separators {
    if (source.length === 0) {
      throw new ParseError('EMPTY_INPUT', 'Unable to parse message: input is empty');
    }

    const name = source.substring(0, 3);
    if (!HEADER_SEGMENT_NAMES.includes(name)) {
      if (source.length < 3 && HEADER_SEGMENT_NAMES.some((h) => h.startsWith(source))) {
        throw new ParseError(
          'INCOMPLETE_HEADER',
          `Header segment is truncated: "${source}"`,
          source.length
        );
      }
      throw new ParseError(
        'MISSING_HEADER',
        `Message must start with one of ${HEADER_SEGMENT_NAMES.join(', ')}, found "${name}"`
      );
    }

    for (let i = 3; i < MIN_HEADER_LENGTH; i++) {
      const ch = source.charAt(i);
      if (ch === '' || ch === CR || ch === LF) {
        throw new ParseError(
          'INCOMPLETE_HEADER',
          `Header segment ends at position ${i} before its encoding characters are complete`,
          i
        );
      }
    }

    const separators: Separators = Object.freeze({
      field: source.charAt(3),
      component: source.charAt(4),
      repetition: source.charAt(5),
      escape: source.charAt(6),
      subcomponent: source.charAt(7),
    });

    const problem = validateSeparators(separators);
    if (problem) {
      throw new ParseError('INVALID_SEPARATORS', problem, 3);
    }

    const after = source.charAt(MIN_HEADER_LENGTH);
    const delimited =
      after === '' ||
      after === separators.field ||
      after === CR ||
      (this.properties.lenientNewlines && after === LF);
    if (!delimited) {
      throw new ParseError(
        'MISSING_SEGMENT_TERMINATOR',
        `Expected a field separator or segment terminator after the encoding characters, found "${after}"`,
        MIN_HEADER_LENGTH
      );
    }

    return separators;
  }

  /**
   * Spans of the non-empty segments, terminators excluded.
   */
  private segmentSpans(source: string): Span[] {
    const lenient = this.properties.lenientNewlines;
    const spans: Span[] = [];
    let start = 0;
    let i = 0;

    while (i < source.length) {
      const ch = source.charAt(i);
      let terminatorLength = 0;
      if (ch === CR) {
        terminatorLength = lenient && source.charAt(i + 1) === LF ? 2 : 1;
      } else if (lenient && ch === LF) {
        terminatorLength = 1;
      }

      if (terminatorLength === 0) {
        i++;
        continue;
      }

      if (i > start) {
        spans.push(createSpan(start, i));
      }
      i += terminatorLength;
      start = i;
    }

    if (source.length > start) {
      spans.push(createSpan(start, source.length));
    }

    return spans;
  }
}

/**
 * Index one segment. The segment name runs up to the first field separator.
 */
export function parseSegment(source: string, span: Span, separators: Separators): Segment {
  const { start, end } = span;
  const nameEnd = indexWithin(source, separators.field, start, end);
  if (nameEnd === -1) {
    return new Segment(source, span, source.substring(start, end), []);
  }

  const name = source.substring(start, nameEnd);
  const fields: Field[] = [];
  let fieldStart = nameEnd + 1;
  let index = 1;

  if (HEADER_SEGMENT_NAMES.includes(name)) {
    // MSH-1 is the field separator itself, MSH-2 the encoding characters
    fields.push(leafField(source, createSpan(nameEnd, nameEnd + 1), 1));
    const encodingEnd = indexWithin(source, separators.field, nameEnd + 1, end);
    fields.push(leafField(source, createSpan(nameEnd + 1, encodingEnd === -1 ? end : encodingEnd), 2));
    if (encodingEnd === -1) {
      return new Segment(source, span, name, fields);
    }
    fieldStart = encodingEnd + 1;
    index = 3;
  }

  for (const fieldSpan of splitSpan(source, fieldStart, end, separators.field)) {
    fields.push(parseField(source, fieldSpan, index, separators));
    index++;
  }

  return new Segment(source, span, name, fields);
}

/**
 * Index a field, handling repetitions, components and subcomponents.
 */
export function parseField(
  source: string,
  span: Span,
  index: number,
  separators: Separators
): Field {
  const repetitions = splitSpan(source, span.start, span.end, separators.repetition).map(
    (repSpan) => {
      const components = splitSpan(source, repSpan.start, repSpan.end, separators.component).map(
        (compSpan) => {
          const subcomponents = splitSpan(
            source,
            compSpan.start,
            compSpan.end,
            separators.subcomponent
          ).map((subSpan) => new Subcomponent(source, subSpan));
          return new Component(source, compSpan, subcomponents);
        }
      );
      return new Repetition(source, repSpan, components);
    }
  );

  return new Field(source, span, index, repetitions);
}

/**
 * A field that is never split (the header's separator and encoding-character fields).
 */
function leafField(source: string, span: Span, index: number): Field {
  const component = new Component(source, span, [new Subcomponent(source, span)]);
  return new Field(source, span, index, [new Repetition(source, span, [component])]);
}

function indexWithin(source: string, search: string, from: number, end: number): number {
  const found = source.indexOf(search, from);
  return found === -1 || found >= end ? -1 : found;
}

/**
 * Parse ER7 text into a message (convenience function)
 */
export function parseMessage(source: string, properties?: Partial<ParserProperties>): Message {
  const parser = new MessageParser(properties);
  return parser.parse(source);
}
