/**
 * Logging module - structured logging implementations
 */

export { BaseLogger } from './base-logger';
export type { ConsoleLoggerOptions } from './console-logger';
export { ConsoleLogger, createConsoleLogger, formatPrettyLine } from './console-logger';
export { BufferLogger, createBufferLogger } from './buffer-logger';
