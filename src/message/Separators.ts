/**
 * Separator model for ER7 (pipe-delimited) messages.
 *
 * The five delimiter characters are declared by the header segment
 * (MSH-1 and MSH-2) and default to the conventional `|^~\&` set.
 */

/**
 * Default HL7v2 delimiters
 */
export const HL7V2_DEFAULTS = {
  FIELD_SEPARATOR: '|',
  COMPONENT_SEPARATOR: '^',
  REPETITION_SEPARATOR: '~',
  ESCAPE_CHARACTER: '\\',
  SUBCOMPONENT_SEPARATOR: '&',
  SEGMENT_DELIMITER: '\r',
} as const;

/**
 * Segment names whose first two fields carry the encoding characters.
 */
export const HEADER_SEGMENT_NAMES: readonly string[] = ['MSH', 'FHS', 'BHS'];

export interface Separators {
  readonly field: string;
  readonly component: string;
  readonly repetition: string;
  readonly escape: string;
  readonly subcomponent: string;
}

export const DEFAULT_SEPARATORS: Separators = Object.freeze({
  field: HL7V2_DEFAULTS.FIELD_SEPARATOR,
  component: HL7V2_DEFAULTS.COMPONENT_SEPARATOR,
  repetition: HL7V2_DEFAULTS.REPETITION_SEPARATOR,
  escape: HL7V2_DEFAULTS.ESCAPE_CHARACTER,
  subcomponent: HL7V2_DEFAULTS.SUBCOMPONENT_SEPARATOR,
});

/**
 * Thrown when a separator set violates the single-character / distinctness rules.
 */
export class SeparatorError extends Error {
  readonly kind = 'INVALID_SEPARATORS';

  constructor(message: string) {
    super(message);
    this.name = 'SeparatorError';
  }
}

/**
 * Check a separator set. Returns a description of the first problem found,
 * or null when the set is usable.
 */
export function validateSeparators(separators: Separators): string | null {
  const entries: Array<[string, string]> = [
    ['field', separators.field],
    ['component', separators.component],
    ['repetition', separators.repetition],
    ['escape', separators.escape],
    ['subcomponent', separators.subcomponent],
  ];

  for (const [name, value] of entries) {
    if (value.length !== 1) {
      return `The ${name} separator must be a single character, got "${value}"`;
    }
    if (value === '\r' || value === '\n') {
      return `The ${name} separator cannot be a line break`;
    }
  }

  const seen = new Map<string, string>();
  for (const [name, value] of entries) {
    const other = seen.get(value);
    if (other) {
      return `The ${name} and ${other} separators are both "${value}"`;
    }
    seen.set(value, name);
  }

  return null;
}

/**
 * Build a separator set from the defaults plus overrides.
 * @throws SeparatorError if the resulting set is invalid
 */
export function createSeparators(overrides?: Partial<Separators>): Separators {
  const separators: Separators = { ...DEFAULT_SEPARATORS, ...overrides };
  const problem = validateSeparators(separators);
  if (problem) {
    throw new SeparatorError(problem);
  }
  return Object.freeze(separators);
}

/**
 * The MSH-2 encoding characters string: component, repetition, escape, subcomponent.
 */
export function encodingCharacters(separators: Separators): string {
  return (
    separators.component + separators.repetition + separators.escape + separators.subcomponent
  );
}

/**
 * Convert escape sequences in a configured segment delimiter ("\\r\\n") to the real characters
 */
export function unescapeSegmentDelimiter(delimiter: string): string {
  return delimiter.replace(/\\r/g, '\r').replace(/\\n/g, '\n').replace(/\\t/g, '\t');
}

/**
 * Convert a segment delimiter to its escaped representation
 */
export function escapeSegmentDelimiter(delimiter: string): string {
  return delimiter.replace(/\r/g, '\\r').replace(/\n/g, '\\n').replace(/\t/g, '\\t');
}
