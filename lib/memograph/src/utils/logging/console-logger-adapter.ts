import { LogLevel } from '../../types/logger';
import { LoggerAdapter } from './logger-adapter';

type ConsoleMethod = 'debug' | 'info' | 'warn' | 'error' | 'log';

const LEVEL_OUTPUT: Readonly<Record<LogLevel, { label: string; method: ConsoleMethod }>> = {
  [LogLevel.DEBUG]: { label: 'DEBUG', method: 'debug' },
  [LogLevel.INFO]: { label: 'INFO', method: 'info' },
  [LogLevel.WARN]: { label: 'WARN', method: 'warn' },
  [LogLevel.ERROR]: { label: 'ERROR', method: 'error' },
  [LogLevel.FATAL]: { label: 'FATAL', method: 'error' },
  [LogLevel.OFF]: { label: 'LOG', method: 'log' },
};

const DEFAULT_HISTORY_SIZE = 100;

/**
 * Writes `[timestamp] LEVEL: message` lines to the console.
 * The last formatted lines are kept for `getLogs()`.
 */
export class ConsoleLoggerAdapter extends LoggerAdapter {
  private history: string[] = [];
  private historySize = DEFAULT_HISTORY_SIZE;

  constructor(level: LogLevel = LogLevel.INFO) {
    super();
    this.level = level;
  }

  log(level: LogLevel, message: string, ...args: readonly unknown[]): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const { label, method } = LEVEL_OUTPUT[level];
    const line = `[${new Date().toISOString()}] ${label}: ${message}`;
    // eslint-disable-next-line no-console
    console[method](line, ...args);
    this.remember(line);
  }

  /**
   * The first Error among `args` is appended to the message;
   * its stack follows at DEBUG
   */
  public override error(message: string, ...args: readonly unknown[]): void {
    const cause = args.find((arg): arg is Error => arg instanceof Error);
    if (!cause) {
      this.log(LogLevel.ERROR, message, ...args);
      return;
    }

    this.log(LogLevel.ERROR, `${message}: ${cause.message}`, ...args.filter(arg => arg !== cause));
    if (cause.stack) {
      this.log(LogLevel.DEBUG, `Stack: ${cause.stack}`);
    }
  }

  /**
   * Sets how many lines `getLogs()` keeps; non-positive sizes restore the default
   */
  setMaxLogSize(size: number): void {
    this.historySize = size > 0 ? size : DEFAULT_HISTORY_SIZE;
    this.history = this.history.slice(-this.historySize);
  }

  /**
   * Drops the kept history
   */
  clear(): void {
    this.history = [];
  }

  /**
   * Kept lines, oldest first
   */
  getLogs(): string[] {
    return [...this.history];
  }

  private remember(line: string): void {
    this.history.push(line);
    if (this.history.length > this.historySize) {
      this.history.splice(0, this.history.length - this.historySize);
    }
  }
}
