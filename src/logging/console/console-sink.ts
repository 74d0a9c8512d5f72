/**
 * Console output sink with optional rate-limited buffering
 *
 * With a drain interval the sink buffers up to bufferSize messages and
 * writes drainBatch of them per tick, dropping with a warning on overflow.
 * A drain interval of 0 writes straight through.
 */

import type { TimerAPI } from '$types/common';
import type { ConsoleSink, ConsoleSinkConfig, ConsoleAPI } from '../types';

/**
 * Create a console sink
 *
 * @param timerApi - Timer API for scheduling drain
 * @param consoleApi - Console API for output (global console object)
 * @param config - Sink configuration
 * @returns Console sink instance
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(createNodeTimerApi(), console, {
 *   bufferSize: 200,
 *   drainInterval: 50,
 *   drainBatch: 20
 * });
 * consoleSink.initialize(function() {});
 * consoleSink.write("Hello world");
 * ```
 */
export function createConsoleSink(
  timerApi: TimerAPI,
  consoleApi: ConsoleAPI,
  config: ConsoleSinkConfig
): ConsoleSink {
  const buffer: string[] = [];
  const immediate = config.drainInterval <= 0;
  let drainStarted = false;

  function drain(): void {
    const count = Math.min(buffer.length, Math.max(1, config.drainBatch));
    const batch = buffer.splice(0, count);
    for (let i = 0; i < batch.length; i++) {
      consoleApi.log(batch[i]);
    }
  }

  function startDrain(): void {
    if (!drainStarted && !immediate) {
      drainStarted = true;
      timerApi.set(config.drainInterval, true, drain);
    }
  }

  function write(formattedMessage: string): void {
    if (immediate) {
      consoleApi.log(formattedMessage);
      return;
    }

    if (buffer.length < config.bufferSize) {
      buffer.push(formattedMessage);
    } else {
      consoleApi.warn('Console log buffer overflow, dropping message: ' + formattedMessage);
    }
  }

  function getBufferSize(): number {
    return buffer.length;
  }

  function initialize(callback: (success: boolean, message: string) => void): void {
    startDrain();
    callback(true, immediate ? 'Console sink writing through' : 'Console sink initialized');
  }

  return {
    write: write,
    initialize: initialize,
    getBufferSize: getBufferSize
  };
}
