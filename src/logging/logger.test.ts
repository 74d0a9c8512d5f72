/**
 * Unit tests for logger coordinator
 */

import { LOG_LEVELS } from './helpers';
import { createLogger } from './logger';
import type { LogSink, SinkWithLevel } from './types';

function createRecordingSink(minLevel: SinkWithLevel['minLevel']) {
  const lines: string[] = [];
  const sink: LogSink = {
    write: function(msg: string) {
      lines.push(msg);
    }
  };
  return { lines: lines, entry: { sink: sink, minLevel: minLevel } };
}

describe('createLogger', () => {
  describe('log level methods', () => {
    it('should tag messages by level', () => {
      const recorder = createRecordingSink(LOG_LEVELS.DEBUG);
      const logger = createLogger(
        { level: LOG_LEVELS.DEBUG, demoteHours: 0 },
        { timeSource: () => 100, sinks: [recorder.entry] },
        LOG_LEVELS
      );

      logger.debug('d');
      logger.info('i');
      logger.warning('w');
      logger.critical('c');
      logger.log(LOG_LEVELS.WARNING, 'generic');

      expect(recorder.lines).toEqual([
        '[DEBUG]    d',
        'ℹ️ [INFO]     i',
        '⚠️ [WARNING]  w',
        '🚨 [CRITICAL] c',
        '⚠️ [WARNING]  generic'
      ]);
    });
  });

  describe('level filtering', () => {
    it('should drop messages below the logger level', () => {
      const recorder = createRecordingSink(LOG_LEVELS.DEBUG);
      const logger = createLogger(
        { level: LOG_LEVELS.WARNING, demoteHours: 0 },
        { timeSource: () => 100, sinks: [recorder.entry] },
        LOG_LEVELS
      );

      logger.debug('hidden');
      logger.info('hidden');
      logger.warning('shown');

      expect(recorder.lines).toEqual(['⚠️ [WARNING]  shown']);
    });

    it('should route by per-sink minimum level', () => {
      const all = createRecordingSink(LOG_LEVELS.INFO);
      const alerts = createRecordingSink(LOG_LEVELS.WARNING);
      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 0 },
        { timeSource: () => 100, sinks: [all.entry, alerts.entry] },
        LOG_LEVELS
      );

      logger.info('routine');
      logger.critical('urgent');

      expect(all.lines).toHaveLength(2);
      expect(alerts.lines).toEqual(['🚨 [CRITICAL] urgent']);
    });

    it('should apply level changes at runtime', () => {
      const recorder = createRecordingSink(LOG_LEVELS.DEBUG);
      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 0 },
        { timeSource: () => 100, sinks: [recorder.entry] },
        LOG_LEVELS
      );

      logger.setLevel(LOG_LEVELS.DEBUG);
      logger.debug('now visible');

      expect(logger.getLevel()).toBe(LOG_LEVELS.DEBUG);
      expect(recorder.lines).toEqual(['[DEBUG]    now visible']);
    });
  });

  describe('auto-demotion', () => {
    it('should suppress INFO after the demotion uptime', () => {
      let t = 0;
      const recorder = createRecordingSink(LOG_LEVELS.DEBUG);
      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 1 },
        { timeSource: () => t, sinks: [recorder.entry] },
        LOG_LEVELS
      );

      logger.info('early');
      t = 3601;
      logger.info('late');
      logger.warning('still shown');

      expect(recorder.lines).toEqual(['ℹ️ [INFO]     early', '⚠️ [WARNING]  still shown']);
    });
  });

  describe('sink errors', () => {
    it('should keep writing to other sinks when one throws', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const recorder = createRecordingSink(LOG_LEVELS.DEBUG);
      const broken: SinkWithLevel = {
        sink: {
          write: function() {
            throw new Error('disk full');
          }
        },
        minLevel: LOG_LEVELS.DEBUG
      };
      const logger = createLogger(
        { level: LOG_LEVELS.DEBUG, demoteHours: 0 },
        { timeSource: () => 0, sinks: [broken, recorder.entry] },
        LOG_LEVELS
      );

      logger.info('hello');

      expect(recorder.lines).toEqual(['ℹ️ [INFO]     hello']);
      expect(warn).toHaveBeenCalledWith('Logger sink error: Error: disk full');
    });
  });

  describe('initialize', () => {
    it('should complete immediately without initializable sinks', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 0 },
        { timeSource: () => 0, sinks: [] },
        LOG_LEVELS
      );
      const callback = vi.fn();

      logger.initialize(callback);

      expect(callback).toHaveBeenCalledWith(true, []);
    });

    it('should collect every sink message and report failures', () => {
      const ok: SinkWithLevel = {
        sink: { write: vi.fn(), initialize: (cb) => cb(true, 'console ready') },
        minLevel: LOG_LEVELS.DEBUG
      };
      const failing: SinkWithLevel = {
        sink: { write: vi.fn(), initialize: (cb) => cb(false, 'webhook unreachable') },
        minLevel: LOG_LEVELS.WARNING
      };
      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 0 },
        { timeSource: () => 0, sinks: [ok, failing] },
        LOG_LEVELS
      );
      const callback = vi.fn();

      logger.initialize(callback);

      expect(callback).toHaveBeenCalledWith(false, [
        { success: true, message: 'console ready' },
        { success: false, message: 'webhook unreachable' }
      ]);
    });
  });
});
