export { LogLevel, parseLogLevel, isLevelEnabled } from './LogLevel.js';
export { Logger } from './Logger.js';
export type { LogMetadata, LogSink } from './Logger.js';
export {
  formatLogLine,
  getLogger,
  getRootLogger,
  initializeLogging,
  getGlobalLevel,
  setGlobalLevel,
  setComponentLevel,
  clearComponentLevel,
  getEffectiveLevel,
  resetLogging,
} from './LoggerFactory.js';
export type { LogTransports } from './LoggerFactory.js';
