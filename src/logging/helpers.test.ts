/**
 * Unit tests for logging helper functions
 */

import { formatLogMessage, shouldLog, fmtTemp, parseLogLevel } from './helpers';
import type { LogLevels } from './types';

const LOG_LEVELS: LogLevels = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  CRITICAL: 3
};

describe('formatLogMessage', () => {
  describe('level formatting', () => {
    test('should format DEBUG level with correct tag', () => {
      const result = formatLogMessage(LOG_LEVELS.DEBUG, 'test message', LOG_LEVELS);
      expect(result).toBe('[DEBUG]    test message');
    });

    test('should format INFO level with emoji and correct tag', () => {
      const result = formatLogMessage(LOG_LEVELS.INFO, 'test message', LOG_LEVELS);
      expect(result).toBe('ℹ️ [INFO]     test message');
    });

    test('should format WARNING level with emoji and correct tag', () => {
      const result = formatLogMessage(LOG_LEVELS.WARNING, 'test message', LOG_LEVELS);
      expect(result).toBe('⚠️ [WARNING]  test message');
    });

    test('should format CRITICAL level with emoji and correct tag', () => {
      const result = formatLogMessage(LOG_LEVELS.CRITICAL, 'test message', LOG_LEVELS);
      expect(result).toBe('🚨 [CRITICAL] test message');
    });
  });

  describe('message content', () => {
    test('should preserve message content exactly', () => {
      const msg = 'Temperature: 68.5°F, limits 66.0°F to 70.0°F';
      const result = formatLogMessage(LOG_LEVELS.INFO, msg, LOG_LEVELS);
      expect(result).toBe('ℹ️ [INFO]     ' + msg);
    });

    test('should handle empty message', () => {
      const result = formatLogMessage(LOG_LEVELS.INFO, '', LOG_LEVELS);
      expect(result).toBe('ℹ️ [INFO]     ');
    });
  });
});

describe('shouldLog', () => {
  describe('basic level filtering', () => {
    test('should log when level equals current log level', () => {
      const context = { currentLevel: LOG_LEVELS.INFO, uptime: 0, demoteHours: 0 };
      expect(shouldLog(LOG_LEVELS.INFO, context, LOG_LEVELS)).toBe(true);
    });

    test('should not log when level below current log level', () => {
      const context = { currentLevel: LOG_LEVELS.WARNING, uptime: 0, demoteHours: 0 };
      expect(shouldLog(LOG_LEVELS.INFO, context, LOG_LEVELS)).toBe(false);
    });

    test('should log when level above current log level', () => {
      const context = { currentLevel: LOG_LEVELS.INFO, uptime: 0, demoteHours: 0 };
      expect(shouldLog(LOG_LEVELS.CRITICAL, context, LOG_LEVELS)).toBe(true);
    });
  });

  describe('auto-demotion of INFO logs', () => {
    test('should demote INFO logs after uptime threshold', () => {
      const context = { currentLevel: LOG_LEVELS.INFO, uptime: 25 * 3600, demoteHours: 24 };
      expect(shouldLog(LOG_LEVELS.INFO, context, LOG_LEVELS)).toBe(false);
    });

    test('should not demote INFO logs before uptime threshold', () => {
      const context = { currentLevel: LOG_LEVELS.INFO, uptime: 23 * 3600, demoteHours: 24 };
      expect(shouldLog(LOG_LEVELS.INFO, context, LOG_LEVELS)).toBe(true);
    });

    test('should not demote INFO at exact threshold boundary', () => {
      const context = { currentLevel: LOG_LEVELS.INFO, uptime: 24 * 3600, demoteHours: 24 };
      expect(shouldLog(LOG_LEVELS.INFO, context, LOG_LEVELS)).toBe(true);
    });

    test('should not demote INFO logs in DEBUG mode', () => {
      const context = { currentLevel: LOG_LEVELS.DEBUG, uptime: 100 * 3600, demoteHours: 24 };
      expect(shouldLog(LOG_LEVELS.INFO, context, LOG_LEVELS)).toBe(true);
    });

    test('should not demote when demoteHours is 0 (disabled)', () => {
      const context = { currentLevel: LOG_LEVELS.INFO, uptime: 100 * 3600, demoteHours: 0 };
      expect(shouldLog(LOG_LEVELS.INFO, context, LOG_LEVELS)).toBe(true);
    });

    test('should not demote WARNING logs regardless of uptime', () => {
      const context = { currentLevel: LOG_LEVELS.INFO, uptime: 100 * 3600, demoteHours: 24 };
      expect(shouldLog(LOG_LEVELS.WARNING, context, LOG_LEVELS)).toBe(true);
    });
  });
});

describe('fmtTemp', () => {
  test('should format temperature with one decimal place and unit', () => {
    expect(fmtTemp(68.25, 'F')).toBe('68.3°F');
  });

  test('should handle integer and negative temperatures', () => {
    expect(fmtTemp(20, 'C')).toBe('20.0°C');
    expect(fmtTemp(-1.5, 'C')).toBe('-1.5°C');
  });

  test('should return n/a for null value', () => {
    expect(fmtTemp(null, 'F')).toBe('n/a');
  });
});

describe('parseLogLevel', () => {
  test('should parse level names case-insensitively', () => {
    expect(parseLogLevel('debug', LOG_LEVELS.INFO, LOG_LEVELS)).toBe(LOG_LEVELS.DEBUG);
    expect(parseLogLevel('INFO', LOG_LEVELS.DEBUG, LOG_LEVELS)).toBe(LOG_LEVELS.INFO);
    expect(parseLogLevel(' warn ', LOG_LEVELS.INFO, LOG_LEVELS)).toBe(LOG_LEVELS.WARNING);
    expect(parseLogLevel('Critical', LOG_LEVELS.INFO, LOG_LEVELS)).toBe(LOG_LEVELS.CRITICAL);
  });

  test('should parse numeric levels', () => {
    expect(parseLogLevel('2', LOG_LEVELS.INFO, LOG_LEVELS)).toBe(LOG_LEVELS.WARNING);
  });

  test('should fall back for missing or unknown values', () => {
    expect(parseLogLevel(undefined, LOG_LEVELS.INFO, LOG_LEVELS)).toBe(LOG_LEVELS.INFO);
    expect(parseLogLevel('verbose', LOG_LEVELS.WARNING, LOG_LEVELS)).toBe(LOG_LEVELS.WARNING);
  });
});
