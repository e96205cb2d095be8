export { MessageParser, parseMessage, parseSegment, parseField } from './MessageParser.js';
export { ParseError } from './ParseError.js';
export type { ParseErrorKind } from './ParseError.js';
export { getDefaultParserProperties } from './ParserProperties.js';
export type { ParserProperties } from './ParserProperties.js';
