/**
 * Temperature sensor health monitoring
 * Detects stale and stuck zone temperature sensors
 */

import type { TemperatureReading } from '$types/common';
import type { SensorHealthState, SensorHealthConfig } from './types';
import { checkNoReading, checkStuckSensor } from './helpers';

/**
 * Create health state for a sensor first seen at nowSec
 * The timeout counts from creation until the first valid reading
 */
export function createSensorHealthState(nowSec: number): SensorHealthState {
  return {
    lastReadTime: nowSec,
    lastChangeTime: nowSec,
    lastValid: null,
    lastRaw: null,
    staleFired: false,
    stuckFired: false
  };
}

/**
 * Update sensor health state (mutates state in place)
 *
 * Called on every evaluation. Transition flags are set only on the update
 * where the transition happens.
 *
 * @param rawValue - A newly arrived valid reading, null when there is none
 * @returns The same state object
 */
export function updateSensorHealth(
  rawValue: TemperatureReading,
  nowSec: number,
  sensorState: SensorHealthState,
  config: SensorHealthConfig
): SensorHealthState {
  const oldLastRaw = sensorState.lastRaw;

  sensorState.recovered = undefined;
  sensorState.unstuck = undefined;
  sensorState.staleDuration = undefined;
  sensorState.stuckDuration = undefined;

  if (rawValue !== null) {
    sensorState.lastReadTime = nowSec;
    sensorState.lastValid = rawValue;

    if (sensorState.staleFired) {
      sensorState.recovered = true;
      sensorState.staleFired = false;
    }
  }

  const noReadingCheck = checkNoReading(rawValue, nowSec, sensorState.lastReadTime, config.timeoutSec);
  if (noReadingCheck.stale && !sensorState.staleFired) {
    sensorState.staleFired = true;
    sensorState.staleDuration = noReadingCheck.duration;
  }

  const stuckCheck = checkStuckSensor(
    rawValue,
    oldLastRaw,
    nowSec,
    sensorState.lastChangeTime,
    config.stuckSec,
    config.stuckEpsilon
  );

  if (stuckCheck.changed) {
    sensorState.lastChangeTime = nowSec;
    sensorState.lastRaw = rawValue;

    if (sensorState.stuckFired) {
      sensorState.unstuck = true;
      sensorState.stuckFired = false;
    }
  } else if (stuckCheck.stuck && !sensorState.stuckFired) {
    sensorState.stuckFired = true;
    sensorState.stuckDuration = stuckCheck.duration;
  }

  return sensorState;
}

/**
 * Temperature the controller should act on
 * The last valid value is used while the sensor is silent but not yet stale
 */
export function effectiveTemperature(sensorState: SensorHealthState): TemperatureReading {
  return sensorState.staleFired ? null : sensorState.lastValid;
}
