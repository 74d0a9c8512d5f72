/**
 * Central heater coordinator
 *
 * Aggregates heat demand from every zone sharing one central heater and
 * applies the on/off protective delays:
 *
 * - demand empty -> non-empty: a pending off-timer is cancelled; when the
 *   heater is not commanded on and no on-timer is pending an on-timer is
 *   started. On expiry the heater is commanded on unless demand emptied.
 * - demand non-empty -> empty: when the heater is commanded on an
 *   off-timer is started. On expiry the heater is commanded off if demand
 *   is still empty.
 * - the last zone to leave may hold its heater open while the off-timer
 *   runs, so the central heater always has an open circuit.
 *
 * All mutations run synchronously, so a timer callback never interleaves
 * with a register or deregister. Commands go through the shared commander.
 */

import { createDelayedAction } from '@utils/time';
import type { DelayedAction } from '@utils/time';
import type {
  CentralHeaterCoordinator,
  CentralHeaterSnapshot,
  CentralHeaterTiming,
  CoordinatorDependencies
} from './types';

/**
 * Maximum delays across subscribers
 * Returns fallback when there are none
 */
export function effectiveTiming(
  timings: Iterable<CentralHeaterTiming>,
  fallback: CentralHeaterTiming
): CentralHeaterTiming {
  let onDelaySec = -1;
  let offDelaySec = -1;
  for (const timing of timings) {
    onDelaySec = Math.max(onDelaySec, timing.onDelaySec);
    offDelaySec = Math.max(offDelaySec, timing.offDelaySec);
  }
  if (onDelaySec < 0) {
    return fallback;
  }
  return { onDelaySec: onDelaySec, offDelaySec: offDelaySec };
}

function timingsDiffer(timings: Iterable<CentralHeaterTiming>): boolean {
  let first: CentralHeaterTiming | null = null;
  for (const timing of timings) {
    if (first === null) {
      first = timing;
    } else if (timing.onDelaySec !== first.onDelaySec || timing.offDelaySec !== first.offDelaySec) {
      return true;
    }
  }
  return false;
}

/**
 * Create a coordinator for one central heater
 *
 * @param ref - Central heater actuator reference
 * @param deps - Commander, clock, timers and logger
 */
export function createCentralHeaterCoordinator(
  ref: string,
  deps: CoordinatorDependencies
): CentralHeaterCoordinator {
  const demand = new Set<string>();
  const subscribers = new Map<string, CentralHeaterTiming>();
  let timing: CentralHeaterTiming = { onDelaySec: 0, offDelaySec: 0 };
  let commandedOn = false;
  let onTimer: DelayedAction | null = null;
  let offTimer: DelayedAction | null = null;
  let hold: { zoneId: string; release: () => void } | null = null;

  const logger = deps.logger;

  function isSettled(): boolean {
    return onTimer === null && offTimer === null;
  }

  function notifySettled(): void {
    if (isSettled() && deps.onSettled !== undefined) {
      deps.onSettled();
    }
  }

  function refreshTiming(): void {
    timing = effectiveTiming(subscribers.values(), timing);
    if (timingsDiffer(subscribers.values())) {
      logger.warning(
        "Zones sharing " + ref + " use different delays, using on " + timing.onDelaySec +
        "s off " + timing.offDelaySec + "s"
      );
    }
  }

  function commandOn(reason: string): void {
    if (commandedOn) {
      return;
    }
    commandedOn = true;
    logger.info("Central heater " + ref + " ON (" + reason + ")");
    deps.commander.command(ref, 'on', reason);
  }

  function commandOff(reason: string): void {
    if (!commandedOn) {
      return;
    }
    commandedOn = false;
    logger.info("Central heater " + ref + " OFF (" + reason + ")");
    deps.commander.command(ref, 'off', reason);
  }

  function releaseHold(): void {
    if (hold === null) {
      return;
    }
    const released = hold;
    hold = null;
    logger.debug("Central heater " + ref + " releases heater hold of " + released.zoneId);
    released.release();
  }

  function handleOnExpiry(): void {
    onTimer = null;
    if (demand.size === 0) {
      logger.debug("Central heater " + ref + " on-delay expired without demand");
    } else {
      commandOn("on-delay elapsed, demand: " + Array.from(demand).join(", "));
    }
    notifySettled();
  }

  function handleOffExpiry(): void {
    offTimer = null;
    if (demand.size === 0) {
      commandOff("off-delay elapsed");
    }
    releaseHold();
    notifySettled();
  }

  function onDemandStarted(zoneId: string): void {
    if (hold !== null && hold.zoneId === zoneId) {
      hold = null;
    } else {
      releaseHold();
    }

    if (offTimer !== null) {
      offTimer.cancel();
      offTimer = null;
      logger.debug("Central heater " + ref + " off-timer cancelled by " + zoneId);
    }

    if (commandedOn || onTimer !== null) {
      return;
    }

    if (timing.onDelaySec <= 0) {
      commandOn("demand from " + zoneId);
      return;
    }

    onTimer = createDelayedAction(deps.timerApi, deps.timeSource, timing.onDelaySec, handleOnExpiry);
    logger.debug("Central heater " + ref + " on scheduled in " + timing.onDelaySec + "s");
  }

  function onDemandEnded(): void {
    if (!commandedOn || offTimer !== null) {
      return;
    }

    if (timing.offDelaySec <= 0) {
      commandOff("demand ended");
      return;
    }

    offTimer = createDelayedAction(deps.timerApi, deps.timeSource, timing.offDelaySec, handleOffExpiry);
    logger.debug("Central heater " + ref + " off scheduled in " + timing.offDelaySec + "s");
  }

  function register(zoneId: string): void {
    if (demand.has(zoneId)) {
      return;
    }
    const wasEmpty = demand.size === 0;
    demand.add(zoneId);
    if (wasEmpty) {
      onDemandStarted(zoneId);
    }
  }

  function deregister(zoneId: string, release?: () => void): boolean {
    if (!demand.delete(zoneId)) {
      return false;
    }
    if (demand.size > 0) {
      return false;
    }
    onDemandEnded();
    if (release === undefined || offTimer === null) {
      return false;
    }
    hold = { zoneId: zoneId, release: release };
    return true;
  }

  function snapshot(): CentralHeaterSnapshot {
    return {
      ref: ref,
      demand: Array.from(demand).sort(),
      commandedOn: commandedOn,
      onDueAt: onTimer === null ? null : onTimer.dueAt,
      offDueAt: offTimer === null ? null : offTimer.dueAt,
      heldBy: hold === null ? null : hold.zoneId,
      timing: { onDelaySec: timing.onDelaySec, offDelaySec: timing.offDelaySec },
      subscribers: subscribers.size
    };
  }

  function dispose(): void {
    if (onTimer !== null) {
      onTimer.cancel();
      onTimer = null;
    }
    if (offTimer !== null) {
      offTimer.cancel();
      offTimer = null;
    }
    hold = null;
    demand.clear();
  }

  return {
    ref: ref,
    subscribe: function(zoneId: string, zoneTiming: CentralHeaterTiming) {
      subscribers.set(zoneId, { onDelaySec: zoneTiming.onDelaySec, offDelaySec: zoneTiming.offDelaySec });
      refreshTiming();
    },
    unsubscribe: function(zoneId: string) {
      deregister(zoneId);
      if (hold !== null && hold.zoneId === zoneId) {
        hold = null;
      }
      if (subscribers.delete(zoneId) && subscribers.size > 0) {
        refreshTiming();
      }
    },
    register: register,
    deregister: deregister,
    hasDemand: function(zoneId: string) {
      return demand.has(zoneId);
    },
    isCommandedOn: function() {
      return commandedOn;
    },
    isSettled: isSettled,
    subscriberCount: function() {
      return subscribers.size;
    },
    snapshot: snapshot,
    dispose: dispose
  };
}
