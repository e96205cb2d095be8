import { SourceNode } from './SourceNode.js';
import type { Span } from './Span.js';

export interface SubcomponentJSON {
  range: Span;
  value: string;
}

/**
 * The smallest unit of a message: raw text that may contain escape sequences.
 * Escapes are decoded on demand via decodedValue().
 */
export class Subcomponent extends SourceNode {
  constructor(source: string, range: Span) {
    super(source, range);
  }

  toJSON(): SubcomponentJSON {
    return { range: this.range, value: this.rawValue() };
  }
}
