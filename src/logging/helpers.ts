/**
 * Logging helper functions
 */

import type { TemperatureUnit } from '$types/common';
import type { LogLevel, LogLevels, FilterContext } from './types';

/**
 * Format a temperature with its unit
 * @param value - Temperature, null when unavailable
 * @param unit - Display unit
 * @returns Formatted temperature string ("68.0°F", or "n/a")
 */
export function fmtTemp(value: number | null, unit: TemperatureUnit): string {
  if (value === null) return "n/a";

  return value.toFixed(1) + "°" + unit;
}

/**
 * Format log message with level tag
 *
 * Adds a prefix tag to the message based on log level:
 * - DEBUG: "[DEBUG]    "
 * - INFO: "ℹ️ [INFO]     "
 * - WARNING: "⚠️ [WARNING]  "
 * - CRITICAL: "🚨 [CRITICAL] "
 *
 * @param level - Log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL)
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
 * 1. Basic level filtering: message level must be >= current level
 * 2. Auto-demotion: INFO logs are suppressed after demoteHours uptime
 *    (only when not in DEBUG mode, and demoteHours > 0)
 *
 * @param level - Log level to check (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL)
 * @param context - Filtering context with currentLevel, uptime, demoteHours
 * @param logLevels - Log level constants object
 * @returns True if message should be logged, false to suppress
 */
export function shouldLog(level: LogLevel, context: FilterContext, logLevels: LogLevels): boolean {
  if (level < context.currentLevel) {
    return false;
  }

  // INFO goes quiet after the demotion window unless running in DEBUG
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
 * Parse a log level name or number from the environment
 *
 * Accepts "debug", "INFO", "2", ...; anything else yields the fallback.
 *
 * @param value - Raw value (e.g. process.env.LOG_LEVEL)
 * @param fallback - Level used when value is missing or unknown
 * @param logLevels - Log level constants object
 * @returns Parsed log level
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel, logLevels: LogLevels): LogLevel {
  if (value === undefined) return fallback;

  switch (value.trim().toUpperCase()) {
    case 'DEBUG':
    case '0':
      return logLevels.DEBUG;
    case 'INFO':
    case '1':
      return logLevels.INFO;
    case 'WARNING':
    case 'WARN':
    case '2':
      return logLevels.WARNING;
    case 'CRITICAL':
    case '3':
      return logLevels.CRITICAL;
    default:
      return fallback;
  }
}
