/**
 * Build API Operators
 */
export { withInputs } from './with-inputs';
export { withNodes } from './with-nodes';
export { withOptions } from './with-options';
export type { GraphOptions } from './with-options';
export { withLoggerProvider } from './with-logger';
