export type {
  LogLevel,
  LogContext,
  Logger,
  LogEntry,
  ConsoleLoggerOptions,
  MemoryLogger,
} from './logger.js';
export { noopLogger, createConsoleLogger, createMemoryLogger } from './logger.js';
