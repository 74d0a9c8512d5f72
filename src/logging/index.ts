/**
 * Logging module barrel export
 *
 * - Logger coordinator (createLogger)
 * - Console sink with optional buffering (createConsoleSink)
 * - Webhook alert sink with retries (createWebhookSink)
 * - Pure filter and format functions
 */

export { LOG_LEVELS, formatLogMessage, shouldLog, fmtTemp, parseLogLevel, createPrefixedLogger } from './helpers';
export { createConsoleSink } from './console';
export { createWebhookSink, createFetchPoster } from './webhook';
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
  HttpPoster,
  WebhookSink,
  WebhookSinkConfig,
  FilterContext,
  InitMessage
} from './types';
