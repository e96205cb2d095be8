/**
 * HL7v2 escape sequence handling.
 *
 * Handles the standard escape sequences:
 *   \F\ = field separator       \S\ = component separator
 *   \R\ = repetition separator  \T\ = subcomponent separator
 *   \E\ = escape character      \Xhh..\ = hex-encoded bytes
 *   \.br\ = line break
 *
 * Both directions are plain functions parameterised by the separator set, so
 * messages with different delimiters never share state.
 */

import type { Separators } from './Separators.js';

const patternCache = new Map<string, RegExp>();

/** Escape regex special characters in a string for use in RegExp. */
function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Matches a single well-formed escape sequence for the given escape character.
 * Sticky, so it can be anchored at an arbitrary position.
 */
function sequencePattern(escape: string): RegExp {
  let pattern = patternCache.get(escape);
  if (!pattern) {
    const e = escapeRegex(escape);
    pattern = new RegExp(`${e}(F|S|R|T|E|X(?:[0-9A-Fa-f]{2})+|\\.br)${e}`, 'y');
    patternCache.set(escape, pattern);
  }
  return pattern;
}

function decodeHex(hex: string): string {
  return Buffer.from(hex, 'hex').toString('latin1');
}

/**
 * Unescape HL7 escape sequences back to their literal characters.
 * E.g. "A\F\B" -> "A|B" (with default delimiters).
 * Unknown or unterminated sequences are left as-is.
 */
export function decode(text: string, separators: Separators): string {
  const escape = separators.escape;
  if (!text.includes(escape)) {
    return text;
  }

  const pattern = sequencePattern(escape);
  let result = '';
  let i = 0;

  while (i < text.length) {
    const next = text.indexOf(escape, i);
    if (next === -1) {
      result += text.substring(i);
      break;
    }
    result += text.substring(i, next);

    pattern.lastIndex = next;
    const match = pattern.exec(text);
    if (!match || match[1] === undefined) {
      result += escape;
      i = next + 1;
      continue;
    }

    const code = match[1];
    switch (code) {
      case 'F':
        result += separators.field;
        break;
      case 'S':
        result += separators.component;
        break;
      case 'R':
        result += separators.repetition;
        break;
      case 'T':
        result += separators.subcomponent;
        break;
      case 'E':
        result += escape;
        break;
      case '.br':
        result += '\r';
        break;
      default:
        result += decodeHex(code.substring(1));
    }
    i = next + match[0].length;
  }

  return result;
}

/**
 * Escape special HL7 characters in text to their escape sequences.
 * E.g. "A|B" -> "A\F\B" (with default delimiters).
 *
 * An escape character that already begins a well-formed sequence is copied
 * through, so encoding an encoded value does not double-escape it.
 */
export function encode(text: string, separators: Separators): string {
  const e = separators.escape;
  const pattern = sequencePattern(e);
  let result = '';
  let i = 0;

  while (i < text.length) {
    const ch = text.charAt(i);

    if (ch === e) {
      pattern.lastIndex = i;
      const match = pattern.exec(text);
      if (match) {
        result += match[0];
        i += match[0].length;
        continue;
      }
      result += `${e}E${e}`;
    } else if (ch === separators.field) {
      result += `${e}F${e}`;
    } else if (ch === separators.component) {
      result += `${e}S${e}`;
    } else if (ch === separators.repetition) {
      result += `${e}R${e}`;
    } else if (ch === separators.subcomponent) {
      result += `${e}T${e}`;
    } else if (ch === '\r') {
      result += `${e}X0D${e}`;
    } else if (ch === '\n') {
      result += `${e}X0A${e}`;
    } else {
      result += ch;
    }
    i++;
  }

  return result;
}
