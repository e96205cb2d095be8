import type { Component } from '../message/Component.js';
import type { Field } from '../message/Field.js';
import type { Repetition } from '../message/Repetition.js';
import type { Segment } from '../message/Segment.js';
import { HEADER_SEGMENT_NAMES, encodingCharacters } from '../message/Separators.js';
import type { Separators } from '../message/Separators.js';
import { formatTimeStamp } from '../datetime/DateTimeParser.js';
import type { TimeStamp } from '../datetime/TimeStamp.js';
import { ComponentBuilder } from './ComponentBuilder.js';
import { FieldBuilder } from './FieldBuilder.js';
import { RepetitionBuilder } from './RepetitionBuilder.js';
import { assertIndex, joinIndexed, maxIndex } from './indexed.js';

/**
 * A segment: a name plus fields by 1-based index.
 *
 * For MSH, FHS and BHS fields 1 and 2 always render as the field separator and
 * the encoding characters of the message; values set at those indexes are
 * ignored.
 */
export class SegmentBuilder {
  private fields = new Map<number, FieldBuilder>();

  constructor(readonly name: string) {}

  /**
   * Rebuild a parsed segment. Leaves keep their raw text, escape sequences
   * included; `encode` passes those through, so they render as they were parsed.
   */
  static fromSegment(segment: Segment): SegmentBuilder {
    const builder = new SegmentBuilder(segment.name);
    const skip = builder.isHeader() ? 2 : 0;
    for (const field of segment.fields) {
      if (field.index > skip) {
        builder.withField(field.index, fieldFromParsed(field));
      }
    }
    return builder;
  }

  withField(index: number, field: string | FieldBuilder): this {
    assertIndex(index, 'Field');
    this.fields.set(index, typeof field === 'string' ? new FieldBuilder(field) : field);
    return this;
  }

  withFieldValue(index: number, value: string): this {
    return this.withField(index, value);
  }

  /**
   * Set a field to a timestamp at the precision the value carries.
   */
  withFieldTimestamp(index: number, timestamp: TimeStamp): this {
    return this.withField(index, formatTimeStamp(timestamp));
  }

  setField(index: number, field: string | FieldBuilder): void {
    this.withField(index, field);
  }

  /**
   * Remove a field, returning it, or null when it was not set.
   */
  removeField(index: number): FieldBuilder | null {
    const field = this.fields.get(index) ?? null;
    this.fields.delete(index);
    return field;
  }

  field(index: number): FieldBuilder | null {
    return this.fields.get(index) ?? null;
  }

  /**
   * Highest field index set, 0 when none is.
   */
  fieldCount(): number {
    return maxIndex(this.fields);
  }

  isHeader(): boolean {
    return HEADER_SEGMENT_NAMES.includes(this.name);
  }

  render(separators: Separators): string {
    const render = (field: FieldBuilder): string => field.render(separators);

    if (this.isHeader()) {
      const rest = maxIndex(this.fields) >= 3 ? joinIndexed(this.fields, separators.field, render, 3) : null;
      const header = this.name + separators.field + encodingCharacters(separators);
      return rest === null ? header : header + separators.field + rest;
    }

    if (this.fields.size === 0) {
      return this.name;
    }
    return this.name + separators.field + joinIndexed(this.fields, separators.field, render);
  }
}

function componentFromParsed(component: Component): ComponentBuilder {
  const builder = new ComponentBuilder();
  if (component.subcomponents.length === 1) {
    return builder.withValue(component.rawValue());
  }
  component.subcomponents.forEach((sub, i) => {
    builder.withSubcomponent(i + 1, sub.rawValue());
  });
  return builder;
}

function isPlainRepetition(repetition: Repetition): boolean {
  return repetition.components.length === 1 && !repetition.components[0]?.hasSubcomponents();
}

function repetitionFromParsed(repetition: Repetition): RepetitionBuilder {
  const builder = new RepetitionBuilder();
  if (isPlainRepetition(repetition)) {
    return builder.withValue(repetition.rawValue());
  }
  repetition.components.forEach((component, i) => {
    builder.withComponent(i + 1, componentFromParsed(component));
  });
  return builder;
}

function fieldFromParsed(field: Field): FieldBuilder {
  const [first] = field.repetitions;
  if (field.repetitions.length === 1 && first && isPlainRepetition(first)) {
    return new FieldBuilder(field.rawValue());
  }
  const builder = new FieldBuilder();
  for (const repetition of field.repetitions) {
    builder.withRepetition(repetitionFromParsed(repetition));
  }
  return builder;
}
