/**
 * Severity of a log entry; a logger emits entries at or above its level
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  FATAL = 4,
  OFF = 100,
}

/**
 * Flat metadata attached to an event, serialized as JSON
 */
export type LogMetadata = Readonly<Record<string, string | number | boolean | null | undefined>>;

/**
 * Logger accepted by graphs and by `withLoggerProvider`.
 * Extend `LoggerAdapter` to get everything but `log` for free.
 */
export interface ILogger {
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
  isLevelEnabled(level: LogLevel): boolean;

  log(level: LogLevel, message: string, ...args: readonly unknown[]): void;
  debug(message: string, ...args: readonly unknown[]): void;
  info(message: string, ...args: readonly unknown[]): void;
  warn(message: string, ...args: readonly unknown[]): void;
  error(message: string, ...args: readonly unknown[]): void;
  fatal(message: string, ...args: readonly unknown[]): void;

  /**
   * Logs `[EVENT][category][eventName]` followed by the metadata, at DEBUG unless `level` says otherwise
   */
  logEvent(category: string, eventName: string, metadata?: LogMetadata, level?: LogLevel): void;
}
