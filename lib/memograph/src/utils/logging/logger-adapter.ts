import { ILogger, LogLevel, LogMetadata } from '../../types/logger';

/**
 * Base of the bundled loggers. Subclasses write entries in `log`;
 * level filtering, the per-level shorthands and event formatting live here.
 */
export abstract class LoggerAdapter implements ILogger {
  protected level: LogLevel = LogLevel.INFO;

  abstract log(level: LogLevel, message: string, ...args: readonly unknown[]): void;

  /**
   * Sets logging level
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Gets current logging level
   */
  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Whether entries at `level` pass the current level
   */
  isLevelEnabled(level: LogLevel): boolean {
    return level >= this.level;
  }

  /**
   * Logs at DEBUG
   */
  debug(message: string, ...args: readonly unknown[]): void {
    this.log(LogLevel.DEBUG, message, ...args);
  }

  /**
   * Logs at INFO
   */
  info(message: string, ...args: readonly unknown[]): void {
    this.log(LogLevel.INFO, message, ...args);
  }

  /**
   * Logs at WARN
   */
  warn(message: string, ...args: readonly unknown[]): void {
    this.log(LogLevel.WARN, message, ...args);
  }

  /**
   * Logs at ERROR
   */
  error(message: string, ...args: readonly unknown[]): void {
    this.log(LogLevel.ERROR, message, ...args);
  }

  /**
   * Logs at FATAL
   */
  fatal(message: string, ...args: readonly unknown[]): void {
    this.log(LogLevel.FATAL, message, ...args);
  }

  /**
   * Logs `[EVENT][category][eventName]` with the metadata as JSON, at DEBUG by default
   */
  logEvent(
    category: string,
    eventName: string,
    metadata?: LogMetadata,
    level: LogLevel = LogLevel.DEBUG
  ): void {
    // Skip serialization when the entry would be dropped anyway
    if (!this.isLevelEnabled(level)) {
      return;
    }
    const tag = `[EVENT][${category}][${eventName}]`;
    this.log(level, metadata ? `${tag} ${JSON.stringify(metadata)}` : tag);
  }
}
