/**
 * Serial async task queue
 *
 * Tasks run one after another in enqueue order. A failing task is reported
 * through onError and never stops the tasks queued behind it.
 */

import type { TimerAPI } from '$types/common';

export interface SerialQueue {
  /** Append a task */
  enqueue(label: string, task: () => Promise<void>): void;
  /** Resolves once every task queued so far has settled */
  whenIdle(): Promise<void>;
  /** Tasks queued or running */
  size(): number;
}

/**
 * Create a serial queue
 * @param onError - Receives the task label and the rejection reason
 */
export function createSerialQueue(onError: (label: string, err: unknown) => void): SerialQueue {
  let tail: Promise<void> = Promise.resolve();
  let pending = 0;

  function enqueue(label: string, task: () => Promise<void>): void {
    pending++;
    tail = tail
      .then(task)
      .catch(function(err: unknown) {
        onError(label, err);
      })
      .finally(function() {
        pending--;
      });
  }

  return {
    enqueue: enqueue,
    whenIdle: function() {
      return tail;
    },
    size: function() {
      return pending;
    }
  };
}

/**
 * Reject a promise that does not settle in time
 *
 * @param promise - Operation to bound
 * @param timeoutMs - Limit in milliseconds (0 disables the limit)
 * @param timerApi - Timer API used for the deadline
 * @param message - Rejection message on timeout
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  timerApi: TimerAPI,
  message: string
): Promise<T> {
  if (timeoutMs <= 0) {
    return promise;
  }

  return new Promise<T>(function(resolve, reject) {
    let settled = false;
    const timerId = timerApi.set(timeoutMs, false, function() {
      if (settled) {
        return;
      }
      settled = true;
      reject(new Error(message));
    });

    promise.then(
      function(value) {
        if (settled) {
          return;
        }
        settled = true;
        timerApi.clear(timerId);
        resolve(value);
      },
      function(err: unknown) {
        if (settled) {
          return;
        }
        settled = true;
        timerApi.clear(timerId);
        reject(err);
      }
    );
  });
}
