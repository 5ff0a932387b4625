/**
 * Logging module barrel export
 *
 * The logging system includes:
 * - Logger coordinator (createLogger)
 * - Console sink with buffering and colors (createConsoleSink)
 * - Slack webhook sink (createSlackSink)
 * - Pure filter and format functions
 */

export { formatLogMessage, shouldLog, fmtTemp, parseLogLevel } from './helpers';
export { createConsoleSink, colorize } from './console';
export { createSlackSink, postJson } from './slack';
export { createLogger } from './logger';

export type {
  LogLevel,
  LogLevels,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SinkWithLevel,
  LogSink,
  ConsoleSink,
  ConsoleSinkConfig,
  ConsoleAPI,
  SlackSink,
  SlackSinkConfig,
  HttpPost,
  FilterContext,
  InitMessage
} from './types';
