/**
 * Logging helper functions
 */

import type { TemperatureReading } from '$types/common';
import type { LogLevel, LogLevels, FilterContext, Logger } from './types';

/**
 * Log level constants
 */
export const LOG_LEVELS: LogLevels = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  CRITICAL: 3
};

/**
 * Format temperature for log lines
 * @param value - Temperature (°C), null when unknown
 * @returns e.g. "20.6C" or "n/a"
 */
export function fmtTemp(value: TemperatureReading): string {
  if (value === null) return "n/a";
  return value.toFixed(1) + "C";
}

/**
 * Format log message with level tag
 *
 * - DEBUG: "[DEBUG]    "
 * - INFO: "ℹ️ [INFO]     "
 * - WARNING: "⚠️ [WARNING]  "
 * - CRITICAL: "🚨 [CRITICAL] "
 *
 * @param level - Log level
 * @param msg - Message to format
 * @param logLevels - Log level constants object
 * @returns Formatted log line with level tag prefix
 */
export function formatLogMessage(level: LogLevel, msg: string, logLevels: LogLevels): string {
  let tag = "[DEBUG]    ";
  if (level === logLevels.INFO) tag = "ℹ️ [INFO]     ";
  if (level === logLevels.WARNING) tag = "⚠️ [WARNING]  ";
  if (level === logLevels.CRITICAL) tag = "🚨 [CRITICAL] ";

  return tag + msg;
}

/**
 * Check if message should be logged based on level and auto-demotion
 *
 * Filtering rules:
 * 1. Message level must be >= current level
 * 2. INFO logs are suppressed after demoteHours uptime
 *    (only when not in DEBUG mode, and demoteHours > 0)
 *
 * @param level - Log level to check
 * @param context - Filtering context with currentLevel, uptime, demoteHours
 * @param logLevels - Log level constants object
 * @returns True if message should be logged, false to suppress
 */
export function shouldLog(level: LogLevel, context: FilterContext, logLevels: LogLevels): boolean {
  if (level < context.currentLevel) {
    return false;
  }

  if (level === logLevels.INFO &&
      context.currentLevel > logLevels.DEBUG &&
      context.demoteHours > 0) {
    if (context.uptime > context.demoteHours * 3600) {
      return false;
    }
  }

  return true;
}

/**
 * Parse a level name as used in environment variables
 * @param name - "debug" | "info" | "warning" | "critical" (case-insensitive)
 * @returns Matching level, null for unknown names
 */
export function parseLogLevel(name: string): LogLevel | null {
  switch (name.trim().toLowerCase()) {
    case 'debug': return LOG_LEVELS.DEBUG;
    case 'info': return LOG_LEVELS.INFO;
    case 'warning':
    case 'warn': return LOG_LEVELS.WARNING;
    case 'critical': return LOG_LEVELS.CRITICAL;
    default: return null;
  }
}

/**
 * Wrap a logger so every message carries a fixed prefix
 * Level and sink state stay shared with the wrapped logger
 *
 * @param logger - Logger to wrap
 * @param prefix - Text placed before each message, e.g. "[living] "
 */
export function createPrefixedLogger(logger: Logger, prefix: string): Logger {
  return {
    log: function(level: LogLevel, msg: string) {
      logger.log(level, prefix + msg);
    },
    debug: function(msg: string) {
      logger.debug(prefix + msg);
    },
    info: function(msg: string) {
      logger.info(prefix + msg);
    },
    warning: function(msg: string) {
      logger.warning(prefix + msg);
    },
    critical: function(msg: string) {
      logger.critical(prefix + msg);
    },
    setLevel: logger.setLevel,
    getLevel: logger.getLevel,
    initialize: logger.initialize
  };
}
