import { encode } from '../message/escaping.js';
import type { Separators } from '../message/Separators.js';
import { ComponentBuilder } from './ComponentBuilder.js';
import { assertIndex, joinIndexed } from './indexed.js';

/**
 * One repetition of a field: a single value or components by 1-based index.
 */
export class RepetitionBuilder {
  private components: Map<number, ComponentBuilder> | null = null;

  constructor(private value = '') {}

  withValue(value: string): this {
    this.value = value;
    this.components = null;
    return this;
  }

  withComponent(index: number, component: string | ComponentBuilder): this {
    assertIndex(index, 'Component');
    if (!this.components) {
      this.components = new Map();
    }
    this.components.set(
      index,
      typeof component === 'string' ? new ComponentBuilder(component) : component
    );
    return this;
  }

  getValue(): string | null {
    return this.components ? null : this.value;
  }

  component(index: number): ComponentBuilder | null {
    return this.components?.get(index) ?? null;
  }

  hasComponents(): boolean {
    return this.components !== null;
  }

  render(separators: Separators): string {
    if (this.components) {
      return joinIndexed(this.components, separators.component, (c) => c.render(separators));
    }
    return encode(this.value, separators);
  }
}
