/**
 * Assembles a message from structured values and renders it as ER7 text.
 *
 *   new MessageBuilder()
 *     .withSegment(
 *       new SegmentBuilder('MSH').withField(9, new FieldBuilder().withComponent(1, 'ADT').withComponent(2, 'A01'))
 *     )
 *     .withSegment(
 *       new SegmentBuilder('PID')
 *         .withFieldValue(3, '123456')
 *         .withField(5, new FieldBuilder().withComponent(1, 'Doe').withComponent(2, 'John'))
 *     )
 *     .render();
 *
 * Every value is escaped on output, so '^' inside a value renders as \S\.
 */

import { getLogger } from '../logging/index.js';
import type { Message } from '../message/Message.js';
import {
  DEFAULT_SEPARATORS,
  HL7V2_DEFAULTS,
  escapeSegmentDelimiter,
  unescapeSegmentDelimiter,
} from '../message/Separators.js';
import type { Separators } from '../message/Separators.js';
import { SegmentBuilder } from './SegmentBuilder.js';

const logger = getLogger('builder');

export interface RenderProperties {
  /** Segment terminator; the escaped forms "\\r", "\\n" and "\\r\\n" are accepted */
  segmentDelimiter: string;
}

export function getDefaultRenderProperties(): RenderProperties {
  return {
    segmentDelimiter: HL7V2_DEFAULTS.SEGMENT_DELIMITER,
  };
}

export class MessageBuilder {
  private segments: SegmentBuilder[] = [];

  constructor(readonly separators: Separators = DEFAULT_SEPARATORS) {}

  /**
   * Builder holding the raw values of a parsed message, with its separators.
   * Rendering it gives back text with the same content at every level.
   */
  static fromMessage(message: Message): MessageBuilder {
    const builder = new MessageBuilder(message.separators);
    for (const segment of message.segments) {
      builder.withSegment(SegmentBuilder.fromSegment(segment));
    }
    return builder;
  }

  withSegment(segment: SegmentBuilder): this {
    this.segments.push(segment);
    return this;
  }

  /**
   * Start a new segment, appended to the message.
   */
  addSegment(name: string): SegmentBuilder {
    const segment = new SegmentBuilder(name);
    this.segments.push(segment);
    return segment;
  }

  getSegments(): readonly SegmentBuilder[] {
    return this.segments;
  }

  segment(name: string): SegmentBuilder | null {
    return this.segments.find((s) => s.name === name) ?? null;
  }

  /**
   * The nth (1-based) segment with the given name, or null.
   */
  segmentN(name: string, occurrence: number): SegmentBuilder | null {
    if (!Number.isInteger(occurrence) || occurrence < 1) {
      return null;
    }
    return this.segments.filter((s) => s.name === name)[occurrence - 1] ?? null;
  }

  /**
   * Remove the nth (1-based, default first) segment with the given name.
   * Returns the removed segment, or null when there is none.
   */
  removeSegment(name: string, occurrence = 1): SegmentBuilder | null {
    const target = this.segmentN(name, occurrence);
    if (!target) {
      return null;
    }
    this.segments.splice(this.segments.indexOf(target), 1);
    return target;
  }

  isEmpty(): boolean {
    return this.segments.length === 0;
  }

  render(properties?: Partial<RenderProperties>): string {
    const { segmentDelimiter } = { ...getDefaultRenderProperties(), ...properties };
    const delimiter = unescapeSegmentDelimiter(segmentDelimiter);

    const text = this.segments.map((s) => s.render(this.separators)).join(delimiter);

    if (logger.isDebugEnabled()) {
      logger.debug(`Rendered ${this.segments.length} segment(s)`, {
        length: text.length,
        segmentDelimiter: escapeSegmentDelimiter(delimiter),
      });
    }

    return text;
  }

  toString(): string {
    return this.render();
  }
}
