import type { Field, FieldJSON } from './Field.js';
import { SourceNode, oneBased } from './SourceNode.js';
import type { Span } from './Span.js';

export interface SegmentJSON {
  name: string;
  range: Span;
  fields: FieldJSON[];
}

/**
 * A segment: its name followed by fields. The range excludes the segment terminator.
 */
export class Segment extends SourceNode {
  readonly fields: readonly Field[];

  constructor(
    source: string,
    range: Span,
    readonly name: string,
    fields: Field[]
  ) {
    super(source, range);
    this.fields = Object.freeze(fields);
  }

  /**
   * Get the field at the 1-based index, or null when out of range.
   * For header segments field 1 is the field separator and field 2 the encoding characters.
   */
  field(index: number): Field | null {
    return oneBased(this.fields, index);
  }

  fieldCount(): number {
    return this.fields.length;
  }

  toJSON(): SegmentJSON {
    return {
      name: this.name,
      range: this.range,
      fields: this.fields.map((f) => f.toJSON()),
    };
  }
}
