/**
 * Component loggers over one shared winston logger.
 *
 * Levels come from the environment on first use and can be changed at run time:
 *   LOG_LEVEL               global threshold (default INFO)
 *   HL7_DEBUG_COMPONENTS    comma-separated `name[:LEVEL]` overrides; LEVEL defaults to DEBUG
 *
 *   const logger = getLogger('parser');
 *   if (logger.isDebugEnabled()) logger.debug('Parsed 3 segment(s)', { length: 120 });
 */

import winston from 'winston';
import { Logger } from './Logger.js';
import type { LogSink } from './Logger.js';
import { LogLevel, isLevelEnabled, parseLogLevel } from './LogLevel.js';

const WINSTON_LEVELS = { error: 0, warn: 1, info: 2, debug: 3, trace: 4 };

export type LogTransports = NonNullable<winston.LoggerOptions['transports']>;

let rootLogger: winston.Logger | null = null;
let globalLevel: LogLevel | null = null;
let componentLevels: Map<string, LogLevel> | null = null;
const loggers = new Map<string, Logger>();

/**
 * `2024-01-01T00:00:00.000Z DEBUG [parser] Parsed 3 segment(s) {"length":120}`
 */
export function formatLogLine(info: winston.Logform.TransformableInfo): string {
  const { level, message, timestamp, component, ...rest } = info;
  const extra = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
  const scope = component === undefined ? '' : ` [${String(component)}]`;
  return `${String(timestamp)} ${level.toUpperCase()}${scope} ${String(message)}${extra}`;
}

function createRootLogger(transports?: LogTransports): winston.Logger {
  return winston.createLogger({
    levels: WINSTON_LEVELS,
    // Thresholds are applied per component before anything reaches winston
    level: 'trace',
    format: winston.format.combine(winston.format.timestamp(), winston.format.printf(formatLogLine)),
    transports: transports ?? [new winston.transports.Console({ stderrLevels: [] })],
  });
}

function componentLevelsFromEnv(): Map<string, LogLevel> {
  const levels = new Map<string, LogLevel>();
  for (const entry of (process.env['HL7_DEBUG_COMPONENTS'] ?? '').split(',')) {
    const [name, level] = entry.trim().split(':');
    if (name) {
      levels.set(name, level ? parseLogLevel(level, LogLevel.DEBUG) : LogLevel.DEBUG);
    }
  }
  return levels;
}

function overrides(): Map<string, LogLevel> {
  if (componentLevels === null) {
    componentLevels = componentLevelsFromEnv();
  }
  return componentLevels;
}

export function getGlobalLevel(): LogLevel {
  if (globalLevel === null) {
    globalLevel = parseLogLevel(process.env['LOG_LEVEL'] ?? LogLevel.INFO);
  }
  return globalLevel;
}

export function setGlobalLevel(level: LogLevel): void {
  globalLevel = level;
}

export function setComponentLevel(component: string, level: LogLevel): void {
  overrides().set(component, level);
}

export function clearComponentLevel(component: string): void {
  overrides().delete(component);
}

export function getEffectiveLevel(component: string): LogLevel {
  return overrides().get(component) ?? getGlobalLevel();
}

export function getRootLogger(): winston.Logger {
  if (!rootLogger) {
    rootLogger = createRootLogger();
  }
  return rootLogger;
}

/**
 * Replace the root logger, e.g. to send output to a file transport.
 * Loggers already handed out write to the new root.
 */
export function initializeLogging(transports?: LogTransports): winston.Logger {
  rootLogger?.close();
  rootLogger = createRootLogger(transports);
  return rootLogger;
}

const sink: LogSink = {
  isEnabled: (component, level) => isLevelEnabled(level, getEffectiveLevel(component)),
  write: (level, component, message, metadata) => {
    getRootLogger().log(level.toLowerCase(), message, { component, ...metadata });
  },
};

export function getLogger(component: string): Logger {
  let logger = loggers.get(component);
  if (!logger) {
    logger = new Logger(component, sink);
    loggers.set(component, logger);
  }
  return logger;
}

/**
 * Close the root logger and forget every level, so the environment is read again.
 */
export function resetLogging(): void {
  rootLogger?.close();
  rootLogger = null;
  globalLevel = null;
  componentLevels = null;
}
