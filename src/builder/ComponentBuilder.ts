import { encode } from '../message/escaping.js';
import type { Separators } from '../message/Separators.js';
import { assertIndex, joinIndexed } from './indexed.js';

/**
 * A component: either a single value or subcomponents by 1-based index.
 */
export class ComponentBuilder {
  private subcomponents: Map<number, string> | null = null;

  constructor(private value = '') {}

  withValue(value: string): this {
    this.value = value;
    this.subcomponents = null;
    return this;
  }

  withSubcomponent(index: number, value: string): this {
    assertIndex(index, 'Subcomponent');
    if (!this.subcomponents) {
      this.subcomponents = new Map();
    }
    this.subcomponents.set(index, value);
    return this;
  }

  /**
   * The plain value, or null when the component is split into subcomponents.
   */
  getValue(): string | null {
    return this.subcomponents ? null : this.value;
  }

  subcomponent(index: number): string | null {
    return this.subcomponents?.get(index) ?? null;
  }

  hasSubcomponents(): boolean {
    return this.subcomponents !== null;
  }

  isEmpty(): boolean {
    return this.subcomponents ? this.subcomponents.size === 0 : this.value === '';
  }

  render(separators: Separators): string {
    if (this.subcomponents) {
      return joinIndexed(this.subcomponents, separators.subcomponent, (v) => encode(v, separators));
    }
    return encode(this.value, separators);
  }
}
