export { LoggerAdapter } from './logger-adapter';
export { ConsoleLoggerAdapter } from './console-logger-adapter';
export { LoggerManager } from './logger-manager';

export { LogLevel } from '../../types/logger';
