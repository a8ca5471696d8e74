/**
 * Logging module barrel export
 *
 * The logging system includes:
 * - Logger coordinator (createLogger)
 * - Console sink with chalk coloring (createConsoleSink)
 * - Append-only file sink (createFileSink)
 * - Pure filter and format functions
 */

export { formatLogMessage, shouldLog, parseLogLevel } from './helpers';
export { createConsoleSink } from './console';
export { createFileSink } from './file';
export { createLogger } from './logger';

export type {
  LogLevel,
  LogLevels,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SinkWithLevel,
  LogSink,
  ConsoleAPI,
  ConsoleSinkConfig,
  FileAPI,
  FileSink,
  FileSinkConfig,
  FilterContext,
  InitMessage
} from './types';
