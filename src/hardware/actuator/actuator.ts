/**
 * Actuator command issuing
 * Serializes port calls, bounds them in time and logs failures
 */

import { ActuatorCommandError } from '$types/errors';
import { createSerialQueue, withTimeout } from '@utils/time';

import type { TimerAPI } from '$types/common';
import type { Logger } from '@logging';
import type { ActuatorAction, ActuatorCommander, ActuatorCommanderConfig, ActuatorPort } from './types';

/**
 * Create the command issuer
 *
 * Commands are executed strictly in the order they were queued, so an
 * on/off pair for one reference can never be reordered. A failed or
 * timed-out command is logged; the caller's decision state is not rolled
 * back and the next transition issues a fresh command.
 *
 * @param port - Actuator port
 * @param timerApi - Timer API used for command timeouts
 * @param logger - Logger for command and failure lines
 * @param config - Commander configuration
 */
export function createActuatorCommander(
  port: ActuatorPort,
  timerApi: TimerAPI,
  logger: Logger,
  config: ActuatorCommanderConfig
): ActuatorCommander {
  const last = new Map<string, ActuatorAction>();
  const queue = createSerialQueue(function(label: string, err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warning("Actuator command failed (" + label + "): " + message);
  });

  function command(ref: string, action: ActuatorAction, reason: string): void {
    last.set(ref, action);
    const label = ref + " -> " + action.toUpperCase();
    logger.debug("Actuator " + label + " (" + reason + ")");

    queue.enqueue(label, function() {
      const call = action === 'on' ? port.turnOn(ref) : port.turnOff(ref);
      return withTimeout(call, config.timeoutMs, timerApi, "no response within " + config.timeoutMs + "ms")
        .catch(function(err: unknown) {
          throw new ActuatorCommandError(ref, err instanceof Error ? err.message : String(err));
        });
    });
  }

  return {
    command: command,
    lastCommanded: function(ref: string) {
      const action = last.get(ref);
      return action === undefined ? null : action;
    },
    whenIdle: queue.whenIdle
  };
}
