import { ILogger, LogLevel } from '../../types/logger';
import { ConsoleLoggerAdapter } from './console-logger-adapter';

/**
 * Holds the process-wide default logger.
 * Graphs created without a `logger` option log through it.
 */
export class LoggerManager {
  private static instance: LoggerManager | undefined;

  private logger: ILogger = new ConsoleLoggerAdapter(LogLevel.INFO);

  private constructor() {}

  public static getInstance(): LoggerManager {
    return (LoggerManager.instance ??= new LoggerManager());
  }

  /**
   * Replaces the default logger for graphs created afterwards
   */
  public setLogger(logger: ILogger): void {
    this.logger = logger;
  }

  /**
   * Gets the current default logger
   */
  public getLogger(): ILogger {
    return this.logger;
  }

  /**
   * Enables the default logger at `level`
   */
  public static enableLogs(level: LogLevel = LogLevel.INFO): void {
    LoggerManager.getInstance().logger.setLevel(level);
  }

  /**
   * Turns the default logger off
   */
  public static disableLogs(): void {
    LoggerManager.getInstance().logger.setLevel(LogLevel.OFF);
  }
}
