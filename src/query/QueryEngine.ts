/**
 * Resolves location paths against a parsed message.
 *
 * A syntactically invalid path throws QueryParseError; a valid path that
 * matches nothing resolves to null.
 */

import type { Component } from '../message/Component.js';
import type { Field } from '../message/Field.js';
import type { Message } from '../message/Message.js';
import type { Repetition } from '../message/Repetition.js';
import type { Segment } from '../message/Segment.js';
import type { Subcomponent } from '../message/Subcomponent.js';
import { parseLocationQuery } from './LocationQuery.js';
import type { LocationQuery } from './LocationQuery.js';

export type QueryResult =
  | { readonly kind: 'segment'; readonly node: Segment }
  | { readonly kind: 'field'; readonly node: Field }
  | { readonly kind: 'repetition'; readonly node: Repetition }
  | { readonly kind: 'component'; readonly node: Component }
  | { readonly kind: 'subcomponent'; readonly node: Subcomponent };

export type QueryResultKind = QueryResult['kind'];

/**
 * Walk the message down to the depth the query asks for.
 *
 * Segment occurrence defaults to 1. When a component is requested without a
 * repetition index the first repetition is used.
 */
export function resolveQuery(message: Message, location: LocationQuery): QueryResult | null {
  const segment = message.segmentN(location.segment, location.segmentIndex ?? 1);
  if (!segment) {
    return null;
  }
  if (location.field === null) {
    return { kind: 'segment', node: segment };
  }

  const field = segment.field(location.field);
  if (!field) {
    return null;
  }
  if (location.component === null) {
    if (location.repetition === null) {
      return { kind: 'field', node: field };
    }
    const repetition = field.repetition(location.repetition);
    return repetition ? { kind: 'repetition', node: repetition } : null;
  }

  const component = field.repetition(location.repetition ?? 1)?.component(location.component);
  if (!component) {
    return null;
  }
  if (location.subcomponent === null) {
    return { kind: 'component', node: component };
  }

  const subcomponent = component.subcomponent(location.subcomponent);
  return subcomponent ? { kind: 'subcomponent', node: subcomponent } : null;
}

/**
 * Resolve a path string or an already parsed query.
 * @throws QueryParseError when a path string is malformed
 */
export function query(message: Message, path: string | LocationQuery): QueryResult | null {
  const location = typeof path === 'string' ? parseLocationQuery(path) : path;
  return resolveQuery(message, location);
}
