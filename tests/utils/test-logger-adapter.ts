import { LogLevel } from '../../lib/memograph/src/types/logger';
import { LoggerAdapter } from '../../lib/memograph/src/utils/logging/logger-adapter';

export interface LogEntry {
  level: LogLevel;
  message: string;
  args: readonly unknown[];
}

/**
 * Test logger adapter
 * Records entries in memory instead of writing to the console
 */
export class TestLoggerAdapter extends LoggerAdapter {
  readonly entries: LogEntry[] = [];

  constructor(level: LogLevel = LogLevel.DEBUG) {
    super();
    this.level = level;
  }

  log(level: LogLevel, message: string, ...args: readonly unknown[]): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    this.entries.push({ level, message, args });
  }

  messages(level?: LogLevel): string[] {
    return this.entries
      .filter(entry => level === undefined || entry.level === level)
      .map(entry => entry.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
