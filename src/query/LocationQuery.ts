/**
 * Location paths such as `PID.5.1`, `OBX[2].5` or `PID.3[2].1.1`.
 *
 * Grammar:
 *   NAME [ '[' n ']' ] [ SEP field [ '[' rep ']' ] [ SEP component [ SEP subcomponent ] ] ]
 *
 * NAME is 2-3 ASCII letters or digits, SEP is one of `.`, `-` or a space and
 * every index is a positive integer. All indexes are one-based.
 */

import { QueryParseError } from './QueryParseError.js';

export interface LocationQuery {
  readonly segment: string;
  /** Occurrence among segments with the same name; null means the first */
  readonly segmentIndex: number | null;
  readonly field: number | null;
  readonly repetition: number | null;
  readonly component: number | null;
  readonly subcomponent: number | null;
}

const NAME_CHAR = /[A-Za-z0-9]/;
const SEGMENT_NAME = /^[A-Za-z0-9]{2,3}$/;
const LEVEL_SEPARATORS = '.- ';

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

/**
 * Single-pass reader over a path string.
 */
class PathReader {
  private pos = 0;

  constructor(private readonly path: string) {}

  parse(): LocationQuery {
    const segment = this.readName();
    const segmentIndex = this.peek() === '[' ? this.readBracketIndex() : null;

    let field: number | null = null;
    let repetition: number | null = null;
    let component: number | null = null;
    let subcomponent: number | null = null;

    if (this.atLevelSeparator()) {
      field = this.readSeparatedIndex();
      if (this.peek() === '[') {
        repetition = this.readBracketIndex();
      }
      if (this.atLevelSeparator()) {
        component = this.readSeparatedIndex();
        if (this.atLevelSeparator()) {
          subcomponent = this.readSeparatedIndex();
        }
      }
    }

    if (this.pos < this.path.length) {
      throw this.error(
        'UNEXPECTED_CHARACTER',
        this.pos,
        `unexpected "${this.path.charAt(this.pos)}"`
      );
    }

    return Object.freeze({ segment, segmentIndex, field, repetition, component, subcomponent });
  }

  private peek(): string {
    return this.path.charAt(this.pos);
  }

  private atLevelSeparator(): boolean {
    const ch = this.peek();
    return ch !== '' && LEVEL_SEPARATORS.includes(ch);
  }

  private readName(): string {
    const start = this.pos;
    while (NAME_CHAR.test(this.peek())) {
      this.pos++;
    }
    const name = this.path.substring(start, this.pos);
    if (name.length === 0) {
      throw this.error('EMPTY_SEGMENT_NAME', start, 'expected a segment name');
    }
    if (!SEGMENT_NAME.test(name)) {
      throw this.error(
        'INVALID_SEGMENT_NAME',
        start,
        `segment names are 2-3 letters or digits, got "${name}"`
      );
    }
    return name;
  }

  private readSeparatedIndex(): number {
    this.pos++;
    return this.readIndex();
  }

  private readBracketIndex(): number {
    const open = this.pos;
    this.pos++;
    const index = this.readIndex();
    if (this.peek() !== ']') {
      throw this.error('UNCLOSED_BRACKET', this.pos, `"[" at position ${open} is not closed`);
    }
    this.pos++;
    return index;
  }

  private readIndex(): number {
    const start = this.pos;
    while (isDigit(this.peek())) {
      this.pos++;
    }

    if (this.pos === start) {
      const ch = this.peek();
      if (ch === '' || ch === ']' || LEVEL_SEPARATORS.includes(ch)) {
        throw this.error('MISSING_INDEX', start, 'expected an index');
      }
      throw this.error('INVALID_INDEX', start, `"${ch}" is not a positive integer`);
    }

    const value = Number(this.path.substring(start, this.pos));
    if (value === 0 || !Number.isSafeInteger(value)) {
      throw this.error(
        'INVALID_INDEX',
        start,
        `indexes are positive integers, got ${this.path.substring(start, this.pos)}`
      );
    }
    return value;
  }

  private error(kind: QueryParseError['kind'], position: number, detail: string): QueryParseError {
    return new QueryParseError(kind, this.path, position, detail);
  }
}

/**
 * Parse a location path.
 * @throws QueryParseError
 */
export function parseLocationQuery(path: string): LocationQuery {
  return new PathReader(path).parse();
}

/**
 * Canonical text of a query, e.g. `MSH[1].2[3].4.5`. Levels below a missing
 * field or component are not printed.
 */
export function formatLocationQuery(query: LocationQuery): string {
  let result = query.segment;
  if (query.segmentIndex !== null) {
    result += `[${query.segmentIndex}]`;
  }
  if (query.field === null) {
    return result;
  }
  result += `.${query.field}`;
  if (query.repetition !== null) {
    result += `[${query.repetition}]`;
  }
  if (query.component === null) {
    return result;
  }
  result += `.${query.component}`;
  if (query.subcomponent !== null) {
    result += `.${query.subcomponent}`;
  }
  return result;
}

export type LocationQueryBuildErrorKind =
  | 'MISSING_SEGMENT'
  | 'INVALID_SEGMENT_NAME'
  | 'INVALID_INDEX'
  | 'MISSING_PARENT_INDEX';

export class LocationQueryBuildError extends Error {
  constructor(
    readonly kind: LocationQueryBuildErrorKind,
    message: string
  ) {
    super(message);
    this.name = 'LocationQueryBuildError';
  }
}

type IndexName = 'segmentIndex' | 'field' | 'repetition' | 'component' | 'subcomponent';

/**
 * Fluent construction of a LocationQuery, validated on build().
 *
 *   new LocationQueryBuilder().segment('PID').field(5).component(1).build()
 */
export class LocationQueryBuilder {
  private segmentName: string | null = null;
  private indexes: Record<IndexName, number | null> = {
    segmentIndex: null,
    field: null,
    repetition: null,
    component: null,
    subcomponent: null,
  };

  segment(name: string): this {
    this.segmentName = name;
    return this;
  }

  segmentIndex(index: number): this {
    this.indexes.segmentIndex = index;
    return this;
  }

  field(index: number): this {
    this.indexes.field = index;
    return this;
  }

  repetition(index: number): this {
    this.indexes.repetition = index;
    return this;
  }

  component(index: number): this {
    this.indexes.component = index;
    return this;
  }

  subcomponent(index: number): this {
    this.indexes.subcomponent = index;
    return this;
  }

  /**
   * @throws LocationQueryBuildError
   */
  build(): LocationQuery {
    if (this.segmentName === null) {
      throw new LocationQueryBuildError('MISSING_SEGMENT', 'A segment name is required');
    }
    if (!SEGMENT_NAME.test(this.segmentName)) {
      throw new LocationQueryBuildError(
        'INVALID_SEGMENT_NAME',
        `Segment names are 2-3 letters or digits, got "${this.segmentName}"`
      );
    }

    for (const [name, value] of Object.entries(this.indexes)) {
      if (value !== null && (!Number.isSafeInteger(value) || value < 1)) {
        throw new LocationQueryBuildError(
          'INVALID_INDEX',
          `The ${name} index must be a positive integer, got ${value}`
        );
      }
    }

    const { segmentIndex, field, repetition, component, subcomponent } = this.indexes;
    if (field === null && (repetition !== null || component !== null)) {
      throw new LocationQueryBuildError(
        'MISSING_PARENT_INDEX',
        'A repetition or component index needs a field index'
      );
    }
    if (component === null && subcomponent !== null) {
      throw new LocationQueryBuildError(
        'MISSING_PARENT_INDEX',
        'A subcomponent index needs a component index'
      );
    }

    return Object.freeze({
      segment: this.segmentName,
      segmentIndex,
      field,
      repetition,
      component,
      subcomponent,
    });
  }
}
