/**
 * Timer API implementations and cancellable delayed actions
 */

import type { TimerAPI, TimeSource } from '$types/common';

/**
 * Timer API backed by Node timers
 * Ids are small integers so callers never hold Node handles
 */
export function createNodeTimerApi(): TimerAPI {
  const handles = new Map<number, NodeJS.Timeout>();
  let nextId = 1;

  function set(intervalMs: number, repeat: boolean, callback: () => void): number {
    const id = nextId++;
    if (repeat) {
      handles.set(id, setInterval(callback, intervalMs));
    } else {
      handles.set(id, setTimeout(function() {
        handles.delete(id);
        callback();
      }, intervalMs));
    }
    return id;
  }

  function clear(id: number): void {
    const handle = handles.get(id);
    if (handle === undefined) {
      return;
    }
    clearTimeout(handle);
    clearInterval(handle);
    handles.delete(id);
  }

  return {
    set: set,
    clear: clear
  };
}

/**
 * Lifecycle of a delayed action
 */
export type DelayedActionStatus = 'pending' | 'fired' | 'cancelled';

/**
 * One-shot cancellable action
 *
 * The callback runs at most once. After cancel() returns true the callback
 * is guaranteed never to run; after it has fired, cancel() returns false.
 */
export interface DelayedAction {
  /** Time (s) at which the action is due */
  readonly dueAt: number;
  /** Cancel if still pending, returns whether anything was cancelled */
  cancel(): boolean;
  /** Current lifecycle status */
  status(): DelayedActionStatus;
}

/**
 * Schedule a fire-once action
 *
 * @param timerApi - Timer API used for scheduling
 * @param timeSource - Clock used to compute dueAt
 * @param delaySec - Delay in seconds
 * @param callback - Action to run once
 * @returns Handle for cancellation and inspection
 */
export function createDelayedAction(
  timerApi: TimerAPI,
  timeSource: TimeSource,
  delaySec: number,
  callback: () => void
): DelayedAction {
  let current: DelayedActionStatus = 'pending';
  const dueAt = timeSource() + delaySec;

  const timerId = timerApi.set(Math.max(0, delaySec * 1000), false, function() {
    if (current !== 'pending') {
      return;
    }
    current = 'fired';
    callback();
  });

  function cancel(): boolean {
    if (current !== 'pending') {
      return false;
    }
    current = 'cancelled';
    timerApi.clear(timerId);
    return true;
  }

  return {
    dueAt: dueAt,
    cancel: cancel,
    status: function() {
      return current;
    }
  };
}
