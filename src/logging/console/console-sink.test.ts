/**
 * Unit tests for console sink
 */

import { createSimulatedClock } from '@utils/time';

import { createConsoleSink } from './console-sink';

function createConsoleMock() {
  return { log: vi.fn(), warn: vi.fn() };
}

describe('createConsoleSink', () => {
  describe('buffered mode', () => {
    it('should buffer messages until drained', () => {
      const clock = createSimulatedClock();
      const consoleApi = createConsoleMock();
      const sink = createConsoleSink(clock.timerApi, consoleApi, { bufferSize: 10, drainInterval: 100, drainBatch: 1 });

      sink.write('message 1');
      sink.write('message 2');

      expect(sink.getBufferSize()).toBe(2);
      expect(consoleApi.log).not.toHaveBeenCalled();
    });

    it('should drain in batches on each interval after initialize', () => {
      const clock = createSimulatedClock();
      const consoleApi = createConsoleMock();
      const sink = createConsoleSink(clock.timerApi, consoleApi, { bufferSize: 10, drainInterval: 100, drainBatch: 2 });
      sink.initialize(vi.fn());

      sink.write('a');
      sink.write('b');
      sink.write('c');
      clock.advance(100);

      expect(consoleApi.log.mock.calls).toEqual([['a'], ['b']]);

      clock.advance(100);
      expect(consoleApi.log).toHaveBeenLastCalledWith('c');
      expect(sink.getBufferSize()).toBe(0);
    });

    it('should drop and warn when the buffer is full', () => {
      const clock = createSimulatedClock();
      const consoleApi = createConsoleMock();
      const sink = createConsoleSink(clock.timerApi, consoleApi, { bufferSize: 1, drainInterval: 100, drainBatch: 1 });

      sink.write('first');
      sink.write('dropped message');

      expect(sink.getBufferSize()).toBe(1);
      expect(consoleApi.warn).toHaveBeenCalledWith('Console log buffer overflow, dropping message: dropped message');
    });

    it('should start the drain timer only once', () => {
      const clock = createSimulatedClock();
      const sink = createConsoleSink(clock.timerApi, createConsoleMock(), { bufferSize: 5, drainInterval: 100, drainBatch: 1 });

      sink.initialize(vi.fn());
      sink.initialize(vi.fn());

      expect(clock.pendingTimers()).toBe(1);
    });
  });

  describe('write-through mode', () => {
    it('should write immediately without a timer', () => {
      const clock = createSimulatedClock();
      const consoleApi = createConsoleMock();
      const sink = createConsoleSink(clock.timerApi, consoleApi, { bufferSize: 5, drainInterval: 0, drainBatch: 1 });
      const callback = vi.fn();

      sink.initialize(callback);
      sink.write('now');

      expect(consoleApi.log).toHaveBeenCalledWith('now');
      expect(clock.pendingTimers()).toBe(0);
      expect(callback).toHaveBeenCalledWith(true, 'Console sink writing through');
    });
  });
});
