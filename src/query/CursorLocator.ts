/**
 * Maps a character offset in the message source back to the structure
 * enclosing it.
 *
 * Boundary rules:
 * - offsets outside [0, source.length) have no location
 * - a segment owns its own characters and the terminator characters after it;
 *   the first character of the next segment belongs to the next segment
 * - a field, repetition, component or subcomponent matches offsets from its
 *   start up to and including its end, and the first match wins; the
 *   separator after a node therefore belongs to that node, and an empty node
 *   matches the offset where it sits
 * - offsets before the first field (the segment name) have no field
 */

import type { Component } from '../message/Component.js';
import type { Field } from '../message/Field.js';
import type { Message } from '../message/Message.js';
import type { Repetition } from '../message/Repetition.js';
import type { Segment } from '../message/Segment.js';
import { spanIncludes } from '../message/Span.js';
import type { Span } from '../message/Span.js';
import type { Subcomponent } from '../message/Subcomponent.js';
import { formatLocationQuery } from './LocationQuery.js';
import type { LocationQuery } from './LocationQuery.js';

export interface CursorSegment {
  readonly name: string;
  /** 1-based occurrence among segments with the same name */
  readonly occurrence: number;
  /** 0-based position among all segments */
  readonly position: number;
  readonly node: Segment;
  readonly range: Span;
}

export interface CursorLevel<T> {
  /** 1-based index within the parent */
  readonly index: number;
  readonly node: T;
  readonly range: Span;
}

export interface CursorLocation {
  readonly offset: number;
  readonly segment: CursorSegment;
  readonly field: CursorLevel<Field> | null;
  readonly repetition: CursorLevel<Repetition> | null;
  readonly component: CursorLevel<Component> | null;
  readonly subcomponent: CursorLevel<Subcomponent> | null;
}

interface RangedNode {
  readonly range: Span;
}

function findContaining<T extends RangedNode>(
  nodes: readonly T[] | undefined,
  offset: number
): CursorLevel<T> | null {
  if (!nodes) {
    return null;
  }
  const i = nodes.findIndex((node) => spanIncludes(node.range, offset));
  const node = nodes[i];
  return node ? { index: i + 1, node, range: node.range } : null;
}

/**
 * Index of the last segment starting at or before the offset.
 */
function segmentPositionAt(segments: readonly Segment[], offset: number): number {
  let low = 0;
  let high = segments.length - 1;
  let found = -1;
  while (low <= high) {
    const mid = (low + high) >>> 1;
    const segment = segments[mid];
    if (segment && segment.range.start <= offset) {
      found = mid;
      low = mid + 1;
    } else {
      high = mid - 1;
    }
  }
  return found;
}

export function locateCursor(message: Message, offset: number): CursorLocation | null {
  if (!Number.isInteger(offset) || offset < 0 || offset >= message.source.length) {
    return null;
  }

  const segments = message.segments;
  const position = segmentPositionAt(segments, offset);
  const segment = segments[position];
  if (!segment) {
    return null;
  }

  let occurrence = 0;
  for (let i = 0; i <= position; i++) {
    if (segments[i]?.name === segment.name) occurrence++;
  }

  const field = findContaining(segment.fields, offset);
  const repetition = findContaining(field?.node.repetitions, offset);
  const component = findContaining(repetition?.node.components, offset);
  const subcomponent = findContaining(component?.node.subcomponents, offset);

  return {
    offset,
    segment: { name: segment.name, occurrence, position, node: segment, range: segment.range },
    field,
    repetition,
    component,
    subcomponent,
  };
}

/**
 * The location as a query that resolves to its deepest matched node.
 */
export function cursorToQuery(location: CursorLocation): LocationQuery {
  return {
    segment: location.segment.name,
    segmentIndex: location.segment.occurrence,
    field: location.field?.index ?? null,
    repetition: location.repetition?.index ?? null,
    component: location.component?.index ?? null,
    subcomponent: location.subcomponent?.index ?? null,
  };
}

/**
 * Path text for a location, e.g. `PID[1].5[1].2.1`.
 */
export function formatCursorLocation(location: CursorLocation): string {
  return formatLocationQuery(cursorToQuery(location));
}
