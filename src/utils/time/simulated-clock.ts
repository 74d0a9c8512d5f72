/**
 * Deterministic clock for tests and the simulator
 *
 * Time only moves when advance() is called. Timers due within the advanced
 * span fire in due order (ties in scheduling order), and the clock reads the
 * timer's due time while its callback runs.
 */

import type { TimerAPI } from '$types/common';

interface ScheduledTimer {
  id: number;
  dueMs: number;
  intervalMs: number;
  repeat: boolean;
  seq: number;
  callback: () => void;
}

export interface SimulatedClock {
  /** Timer API bound to this clock */
  readonly timerApi: TimerAPI;
  /** Current time in seconds */
  now(): number;
  /** Current time in milliseconds */
  nowMs(): number;
  /** Move time forward, firing due timers */
  advance(ms: number): void;
  /** Move time forward to an absolute time in seconds */
  advanceTo(seconds: number): void;
  /** Due time in seconds of the earliest timer, null when none is scheduled */
  nextDueAt(): number | null;
  /** Number of timers still scheduled */
  pendingTimers(): number;
}

/**
 * Create a simulated clock
 * @param startMs - Initial time in milliseconds
 */
export function createSimulatedClock(startMs: number = 0): SimulatedClock {
  let currentMs = startMs;
  let nextId = 1;
  let nextSeq = 0;
  const timers = new Map<number, ScheduledTimer>();

  function set(intervalMs: number, repeat: boolean, callback: () => void): number {
    if (repeat && intervalMs <= 0) {
      throw new Error("Repeating timer interval must be positive, got " + intervalMs);
    }
    const id = nextId++;
    timers.set(id, {
      id: id,
      dueMs: currentMs + Math.max(0, intervalMs),
      intervalMs: intervalMs,
      repeat: repeat,
      seq: nextSeq++,
      callback: callback
    });
    return id;
  }

  function clear(id: number): void {
    timers.delete(id);
  }

  function nextDue(limitMs: number): ScheduledTimer | null {
    let found: ScheduledTimer | null = null;
    for (const timer of timers.values()) {
      if (timer.dueMs > limitMs) {
        continue;
      }
      if (found === null || timer.dueMs < found.dueMs ||
          (timer.dueMs === found.dueMs && timer.seq < found.seq)) {
        found = timer;
      }
    }
    return found;
  }

  function advance(ms: number): void {
    if (ms < 0) {
      throw new Error("Cannot advance the clock backwards, got " + ms);
    }
    const targetMs = currentMs + ms;

    let timer = nextDue(targetMs);
    while (timer !== null) {
      currentMs = Math.max(currentMs, timer.dueMs);
      if (timer.repeat) {
        timer.dueMs += timer.intervalMs;
        timer.seq = nextSeq++;
      } else {
        timers.delete(timer.id);
      }
      timer.callback();
      timer = nextDue(targetMs);
    }

    currentMs = targetMs;
  }

  return {
    timerApi: { set: set, clear: clear },
    now: function() {
      return currentMs / 1000;
    },
    nowMs: function() {
      return currentMs;
    },
    advance: advance,
    advanceTo: function(seconds: number) {
      advance(Math.max(0, seconds * 1000 - currentMs));
    },
    nextDueAt: function() {
      const timer = nextDue(Number.POSITIVE_INFINITY);
      return timer === null ? null : timer.dueMs / 1000;
    },
    pendingTimers: function() {
      return timers.size;
    }
  };
}
