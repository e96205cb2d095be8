/**
 * Log levels, ordered from most to least verbose.
 */
export enum LogLevel {
  TRACE = 'TRACE',
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: readonly LogLevel[] = [
  LogLevel.TRACE,
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.WARN,
  LogLevel.ERROR,
];

/**
 * Parse a level name, case-insensitively. Unknown names give `fallback`.
 */
export function parseLogLevel(level: string, fallback: LogLevel = LogLevel.INFO): LogLevel {
  const upper = level.trim().toUpperCase();
  return LEVEL_ORDER.find((l) => l === upper) ?? fallback;
}

/**
 * True when a message at `level` passes the `threshold`.
 */
export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(threshold);
}
