export {
  parseTimeStamp,
  parseDate,
  parseTime,
  formatTimeStamp,
  formatDate,
  formatTime,
} from './DateTimeParser.js';
export { DateTimeParseError } from './DateTimeParseError.js';
export type { DateTimeParseErrorKind, DateTimeStage } from './DateTimeParseError.js';
export { getDefaultDateTimeParseOptions } from './TimeStamp.js';
export type {
  TimeStamp,
  TimeStampOffset,
  DateOnly,
  TimeOfDay,
  DateTimeParseOptions,
} from './TimeStamp.js';
