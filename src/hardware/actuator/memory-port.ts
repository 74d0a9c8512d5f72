/**
 * In-memory actuator port
 * Records every command; used by tests and the simulator
 */

import type { TimeSource } from '$types/common';
import type { ActuatorAction, ActuatorHistoryEntry, ActuatorPort } from './types';

export interface MemoryActuatorPort extends ActuatorPort {
  /** Every applied command in order */
  readonly history: ActuatorHistoryEntry[];
  /** Current state of a reference, null if never commanded */
  stateOf(ref: string): ActuatorAction | null;
  /** Commands applied to one reference */
  historyOf(ref: string): ActuatorAction[];
  /** Make subsequent commands for a reference reject */
  failFor(ref: string, reason: string | null): void;
}

/**
 * Create an in-memory port
 * @param timeSource - Clock used to stamp history entries
 */
export function createMemoryActuatorPort(timeSource: TimeSource): MemoryActuatorPort {
  const history: ActuatorHistoryEntry[] = [];
  const states = new Map<string, ActuatorAction>();
  const failures = new Map<string, string>();

  function apply(ref: string, action: ActuatorAction): Promise<void> {
    const failure = failures.get(ref);
    if (failure !== undefined) {
      return Promise.reject(new Error(failure));
    }
    states.set(ref, action);
    history.push({ ref: ref, action: action, at: timeSource() });
    return Promise.resolve();
  }

  return {
    history: history,
    turnOn: function(ref: string) {
      return apply(ref, 'on');
    },
    turnOff: function(ref: string) {
      return apply(ref, 'off');
    },
    stateOf: function(ref: string) {
      const state = states.get(ref);
      return state === undefined ? null : state;
    },
    historyOf: function(ref: string) {
      return history
        .filter(function(entry) {
          return entry.ref === ref;
        })
        .map(function(entry) {
          return entry.action;
        });
    },
    failFor: function(ref: string, reason: string | null) {
      if (reason === null) {
        failures.delete(ref);
      } else {
        failures.set(ref, reason);
      }
    }
  };
}
