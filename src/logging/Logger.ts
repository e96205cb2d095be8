import { LogLevel } from './LogLevel.js';

export type LogMetadata = Record<string, unknown>;

/**
 * Where a Logger checks its threshold and sends what passes it.
 */
export interface LogSink {
  isEnabled(component: string, level: LogLevel): boolean;
  write(level: LogLevel, component: string, message: string, metadata?: LogMetadata): void;
}

/**
 * Logger bound to one component name, e.g. `parser` or `builder`.
 */
export class Logger {
  constructor(
    readonly component: string,
    private readonly sink: LogSink
  ) {}

  trace(message: string, metadata?: LogMetadata): void {
    this.log(LogLevel.TRACE, message, metadata);
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log(LogLevel.DEBUG, message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log(LogLevel.INFO, message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log(LogLevel.WARN, message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log(LogLevel.ERROR, message, metadata);
  }

  /**
   * Guard for debug output that is costly to build.
   */
  isDebugEnabled(): boolean {
    return this.sink.isEnabled(this.component, LogLevel.DEBUG);
  }

  isTraceEnabled(): boolean {
    return this.sink.isEnabled(this.component, LogLevel.TRACE);
  }

  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (this.sink.isEnabled(this.component, level)) {
      this.sink.write(level, this.component, message, metadata);
    }
  }
}
