/**
 * Unit tests for logger coordinator
 */

import { createLogger } from './logger';
import type { LogLevels, LogSink, SinkWithLevel } from './types';

const LOG_LEVELS: LogLevels = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  CRITICAL: 3
};

function makeSink(minLevel: SinkWithLevel['minLevel'] = LOG_LEVELS.DEBUG) {
  const write = vi.fn<LogSink['write']>();
  const entry: SinkWithLevel = { sink: { write: write }, minLevel: minLevel };
  return { entry: entry, write: write };
}

describe('createLogger', () => {
  let clock: number;
  const timeSource = () => clock;

  beforeEach(() => {
    clock = 100;
  });

  describe('log level methods', () => {
    test('should log debug messages when level is DEBUG', () => {
      const { entry, write } = makeSink();
      const logger = createLogger({ level: LOG_LEVELS.DEBUG, demoteHours: 0 }, { timeSource: timeSource, sinks: [entry] }, LOG_LEVELS);

      logger.debug('test debug');

      expect(write).toHaveBeenCalledWith('[DEBUG]    test debug', LOG_LEVELS.DEBUG);
    });

    test('should log info messages with the INFO tag', () => {
      const { entry, write } = makeSink();
      const logger = createLogger({ level: LOG_LEVELS.INFO, demoteHours: 0 }, { timeSource: timeSource, sinks: [entry] }, LOG_LEVELS);

      logger.info('test info');

      expect(write).toHaveBeenCalledWith('ℹ️ [INFO]     test info', LOG_LEVELS.INFO);
    });

    test('should log warning and critical messages', () => {
      const { entry, write } = makeSink();
      const logger = createLogger({ level: LOG_LEVELS.INFO, demoteHours: 0 }, { timeSource: timeSource, sinks: [entry] }, LOG_LEVELS);

      logger.warning('warn');
      logger.critical('crit');

      expect(write).toHaveBeenNthCalledWith(1, '⚠️ [WARNING]  warn', LOG_LEVELS.WARNING);
      expect(write).toHaveBeenNthCalledWith(2, '🚨 [CRITICAL] crit', LOG_LEVELS.CRITICAL);
    });

    test('should log via generic log method', () => {
      const { entry, write } = makeSink();
      const logger = createLogger({ level: LOG_LEVELS.DEBUG, demoteHours: 0 }, { timeSource: timeSource, sinks: [entry] }, LOG_LEVELS);

      logger.log(LOG_LEVELS.WARNING, 'generic');

      expect(write).toHaveBeenCalledWith('⚠️ [WARNING]  generic', LOG_LEVELS.WARNING);
    });
  });

  describe('level filtering', () => {
    test('should not log debug when level is INFO', () => {
      const { entry, write } = makeSink();
      const logger = createLogger({ level: LOG_LEVELS.INFO, demoteHours: 0 }, { timeSource: timeSource, sinks: [entry] }, LOG_LEVELS);

      logger.debug('hidden');

      expect(write).not.toHaveBeenCalled();
    });

    test('should respect each sink minimum level', () => {
      const consoleSink = makeSink(LOG_LEVELS.DEBUG);
      const slackSink = makeSink(LOG_LEVELS.WARNING);
      const logger = createLogger(
        { level: LOG_LEVELS.DEBUG, demoteHours: 0 },
        { timeSource: timeSource, sinks: [consoleSink.entry, slackSink.entry] },
        LOG_LEVELS
      );

      logger.info('console only');
      logger.warning('both');

      expect(consoleSink.write).toHaveBeenCalledTimes(2);
      expect(slackSink.write).toHaveBeenCalledTimes(1);
      expect(slackSink.write).toHaveBeenCalledWith('⚠️ [WARNING]  both', LOG_LEVELS.WARNING);
    });

    test('should keep writing to other sinks when one throws', () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const broken: SinkWithLevel = {
        sink: { write: () => { throw new Error('disk full'); } },
        minLevel: LOG_LEVELS.DEBUG
      };
      const { entry, write } = makeSink();
      const logger = createLogger({ level: LOG_LEVELS.DEBUG, demoteHours: 0 }, { timeSource: timeSource, sinks: [broken, entry] }, LOG_LEVELS);

      logger.info('still delivered');

      expect(write).toHaveBeenCalledTimes(1);
      expect(warnSpy).toHaveBeenCalledWith('Logger sink error: Error: disk full');
    });
  });

  describe('auto-demotion', () => {
    test('should demote INFO after demoteHours', () => {
      const { entry, write } = makeSink();
      const logger = createLogger({ level: LOG_LEVELS.INFO, demoteHours: 1 }, { timeSource: timeSource, sinks: [entry] }, LOG_LEVELS);

      clock = 100 + 3601;
      logger.info('demoted');

      expect(write).not.toHaveBeenCalled();
    });

    test('should not demote WARNING after demoteHours', () => {
      const { entry, write } = makeSink();
      const logger = createLogger({ level: LOG_LEVELS.INFO, demoteHours: 1 }, { timeSource: timeSource, sinks: [entry] }, LOG_LEVELS);

      clock = 100 + 7200;
      logger.warning('kept');

      expect(write).toHaveBeenCalledTimes(1);
    });
  });

  describe('setLevel and getLevel', () => {
    test('should update level at runtime', () => {
      const { entry, write } = makeSink();
      const logger = createLogger({ level: LOG_LEVELS.WARNING, demoteHours: 0 }, { timeSource: timeSource, sinks: [entry] }, LOG_LEVELS);

      expect(logger.getLevel()).toBe(LOG_LEVELS.WARNING);
      logger.setLevel(LOG_LEVELS.DEBUG);
      logger.debug('now visible');

      expect(logger.getLevel()).toBe(LOG_LEVELS.DEBUG);
      expect(write).toHaveBeenCalledTimes(1);
    });
  });

  describe('initialize', () => {
    test('should succeed immediately without initializable sinks', () => {
      const { entry } = makeSink();
      const logger = createLogger({ level: LOG_LEVELS.DEBUG, demoteHours: 0 }, { timeSource: timeSource, sinks: [entry] }, LOG_LEVELS);
      const callback = vi.fn();

      logger.initialize(callback);

      expect(callback).toHaveBeenCalledWith(true, []);
    });

    test('should collect messages from every sink', () => {
      const a: SinkWithLevel = {
        sink: { write: vi.fn(), initialize: (cb) => cb(true, 'Console sink initialized') },
        minLevel: LOG_LEVELS.DEBUG
      };
      const b: SinkWithLevel = {
        sink: { write: vi.fn(), initialize: (cb) => cb(false, 'Slack enabled but SLACK_WEBHOOK_URL is not set') },
        minLevel: LOG_LEVELS.INFO
      };
      const logger = createLogger({ level: LOG_LEVELS.DEBUG, demoteHours: 0 }, { timeSource: timeSource, sinks: [a, b] }, LOG_LEVELS);
      const callback = vi.fn();

      logger.initialize(callback);

      expect(callback).toHaveBeenCalledTimes(1);
      expect(callback).toHaveBeenCalledWith(true, [
        { success: true, message: 'Console sink initialized' },
        { success: false, message: 'Slack enabled but SLACK_WEBHOOK_URL is not set' }
      ]);
    });
  });
});
