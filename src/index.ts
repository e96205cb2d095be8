/**
 * hl7-structure
 *
 * Structural parser, query engine and builder for pipe-delimited HL7 v2 (ER7) messages.
 */

export * from './message/index.js';
export * from './parser/index.js';
export * from './query/index.js';
export * from './datetime/index.js';
export * from './builder/index.js';
export {
  LogLevel,
  initializeLogging,
  resetLogging,
  setGlobalLevel,
  getGlobalLevel,
  setComponentLevel,
  clearComponentLevel,
} from './logging/index.js';
export type { LogTransports } from './logging/index.js';
