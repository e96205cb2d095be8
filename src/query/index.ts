export {
  parseLocationQuery,
  formatLocationQuery,
  LocationQueryBuilder,
  LocationQueryBuildError,
} from './LocationQuery.js';
export type { LocationQuery, LocationQueryBuildErrorKind } from './LocationQuery.js';
export { QueryParseError } from './QueryParseError.js';
export type { QueryParseErrorKind } from './QueryParseError.js';
export { query, resolveQuery } from './QueryEngine.js';
export type { QueryResult, QueryResultKind } from './QueryEngine.js';
export { locateCursor, cursorToQuery, formatCursorLocation } from './CursorLocator.js';
export type { CursorLocation, CursorSegment, CursorLevel } from './CursorLocator.js';
