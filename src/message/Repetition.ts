import type { Component, ComponentJSON } from './Component.js';
import { SourceNode, oneBased } from './SourceNode.js';
import type { Span } from './Span.js';

export interface RepetitionJSON {
  range: Span;
  value: string;
  components: ComponentJSON[];
}

/**
 * One occurrence of a (possibly repeating) field value.
 */
export class Repetition extends SourceNode {
  readonly components: readonly Component[];

  constructor(source: string, range: Span, components: Component[]) {
    super(source, range);
    this.components = Object.freeze(components);
  }

  /**
   * Get the component at the 1-based index, or null when out of range.
   */
  component(index: number): Component | null {
    return oneBased(this.components, index);
  }

  hasComponents(): boolean {
    return this.components.length > 1;
  }

  toJSON(): RepetitionJSON {
    return {
      range: this.range,
      value: this.rawValue(),
      components: this.components.map((c) => c.toJSON()),
    };
  }
}
