import type { Component } from './Component.js';
import type { Repetition, RepetitionJSON } from './Repetition.js';
import { SourceNode, oneBased } from './SourceNode.js';
import type { Span } from './Span.js';

export interface FieldJSON {
  index: number;
  range: Span;
  value: string;
  repetitions: RepetitionJSON[];
}

/**
 * A field of a segment. A field without repetition separators still has one
 * implicit repetition, so repetitions is never empty.
 */
export class Field extends SourceNode {
  readonly repetitions: readonly Repetition[];

  constructor(
    source: string,
    range: Span,
    /** 1-based position within the segment */
    readonly index: number,
    repetitions: Repetition[]
  ) {
    super(source, range);
    this.repetitions = Object.freeze(repetitions);
  }

  /**
   * Get the repetition at the 1-based index, or null when out of range.
   */
  repetition(index: number): Repetition | null {
    return oneBased(this.repetitions, index);
  }

  /**
   * Component of the first repetition. Covers the common non-repeating case.
   */
  component(index: number): Component | null {
    return this.repetitions[0]?.component(index) ?? null;
  }

  hasRepetitions(): boolean {
    return this.repetitions.length > 1;
  }

  toJSON(): FieldJSON {
    return {
      index: this.index,
      range: this.range,
      value: this.rawValue(),
      repetitions: this.repetitions.map((r) => r.toJSON()),
    };
  }
}
