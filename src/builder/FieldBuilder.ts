import { encode } from '../message/escaping.js';
import type { Separators } from '../message/Separators.js';
import type { ComponentBuilder } from './ComponentBuilder.js';
import { RepetitionBuilder } from './RepetitionBuilder.js';

/**
 * A field: a single value, or an ordered list of repetitions.
 *
 *   new FieldBuilder().withComponent(1, 'Doe').withComponent(2, 'John')   // Doe^John
 */
export class FieldBuilder {
  private repetitions: RepetitionBuilder[] | null = null;

  constructor(private value = '') {}

  withValue(value: string): this {
    this.value = value;
    this.repetitions = null;
    return this;
  }

  withRepetition(repetition: string | RepetitionBuilder): this {
    if (!this.repetitions) {
      this.repetitions = [];
    }
    this.repetitions.push(
      typeof repetition === 'string' ? new RepetitionBuilder(repetition) : repetition
    );
    return this;
  }

  /**
   * Set a component of the first repetition, creating it when needed.
   */
  withComponent(index: number, component: string | ComponentBuilder): this {
    const first = this.repetitions?.[0];
    if (first) {
      first.withComponent(index, component);
    } else {
      this.withRepetition(new RepetitionBuilder().withComponent(index, component));
    }
    return this;
  }

  getValue(): string | null {
    return this.repetitions ? null : this.value;
  }

  /**
   * Repetition by 1-based index, or null.
   */
  repetition(index: number): RepetitionBuilder | null {
    return this.repetitions?.[index - 1] ?? null;
  }

  repetitionCount(): number {
    return this.repetitions ? this.repetitions.length : 1;
  }

  hasRepetitions(): boolean {
    return this.repetitions !== null && this.repetitions.length > 1;
  }

  render(separators: Separators): string {
    if (this.repetitions) {
      return this.repetitions.map((r) => r.render(separators)).join(separators.repetition);
    }
    return encode(this.value, separators);
  }
}
