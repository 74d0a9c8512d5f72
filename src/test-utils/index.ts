/**
 * Shared test helpers
 */

import type { Logger, LogLevel } from '@logging';

/**
 * Logger whose methods are all vi.fn() mocks
 */
export function createLoggerMock(): Logger {
  return {
    log: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warning: vi.fn(),
    critical: vi.fn(),
    setLevel: vi.fn(),
    getLevel: vi.fn(function(): LogLevel {
      return 0;
    }),
    initialize: vi.fn()
  };
}

/**
 * Logger that keeps every message as "LEVEL message" lines
 */
export function createRecordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  const names = ['DEBUG', 'INFO', 'WARNING', 'CRITICAL'];
  let level: LogLevel = 0;

  function log(msgLevel: LogLevel, msg: string): void {
    lines.push(names[msgLevel] + " " + msg);
  }

  return {
    lines: lines,
    log: log,
    debug: function(msg: string) {
      log(0, msg);
    },
    info: function(msg: string) {
      log(1, msg);
    },
    warning: function(msg: string) {
      log(2, msg);
    },
    critical: function(msg: string) {
      log(3, msg);
    },
    setLevel: function(newLevel: LogLevel) {
      level = newLevel;
    },
    getLevel: function() {
      return level;
    },
    initialize: function(callback) {
      callback(true, []);
    }
  };
}
