import { SourceNode, oneBased } from './SourceNode.js';
import type { Span } from './Span.js';
import type { Subcomponent, SubcomponentJSON } from './Subcomponent.js';

export interface ComponentJSON {
  range: Span;
  value: string;
  subcomponents: SubcomponentJSON[];
}

/**
 * A component of a repetition, split on the subcomponent separator.
 */
export class Component extends SourceNode {
  readonly subcomponents: readonly Subcomponent[];

  constructor(source: string, range: Span, subcomponents: Subcomponent[]) {
    super(source, range);
    this.subcomponents = Object.freeze(subcomponents);
  }

  /**
   * Get the subcomponent at the 1-based index, or null when out of range.
   */
  subcomponent(index: number): Subcomponent | null {
    return oneBased(this.subcomponents, index);
  }

  hasSubcomponents(): boolean {
    return this.subcomponents.length > 1;
  }

  toJSON(): ComponentJSON {
    return {
      range: this.range,
      value: this.rawValue(),
      subcomponents: this.subcomponents.map((s) => s.toJSON()),
    };
  }
}
