export { Message } from './Message.js';
export type { MessageJSON } from './Message.js';
export { Segment } from './Segment.js';
export type { SegmentJSON } from './Segment.js';
export { Field } from './Field.js';
export type { FieldJSON } from './Field.js';
export { Repetition } from './Repetition.js';
export type { RepetitionJSON } from './Repetition.js';
export { Component } from './Component.js';
export type { ComponentJSON } from './Component.js';
export { Subcomponent } from './Subcomponent.js';
export type { SubcomponentJSON } from './Subcomponent.js';
export { SourceNode } from './SourceNode.js';
export { createSpan, spanIncludes } from './Span.js';
export type { Span } from './Span.js';
export {
  DEFAULT_SEPARATORS,
  HEADER_SEGMENT_NAMES,
  HL7V2_DEFAULTS,
  SeparatorError,
  createSeparators,
  validateSeparators,
  encodingCharacters,
  escapeSegmentDelimiter,
  unescapeSegmentDelimiter,
} from './Separators.js';
export type { Separators } from './Separators.js';
export { decode, encode } from './escaping.js';
