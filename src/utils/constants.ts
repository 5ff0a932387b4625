/**
 * Global constants used throughout the application
 */

export const TIME_CONSTANTS = {
  MS_PER_SECOND: 1000,
  SECONDS_PER_MINUTE: 60,
  SECONDS_PER_HOUR: 3600,
  /** Numeric timestamps at or above this are milliseconds (seconds would be past year 5000) */
  MS_TIMESTAMP_THRESHOLD: 1e11,
} as const;
