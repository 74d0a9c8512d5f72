/**
 * Sensor health checks
 *
 * A zone temperature sensor has a single timeout. It is stale once no valid
 * reading has arrived for longer than the timeout, counted from the last
 * valid reading, or from zone creation before the first one. Stuck
 * detection is optional and off when its threshold is 0.
 */

import type { TemperatureReading } from '$types/common';
import type { NoReadingResult, StuckSensorResult } from './types';

/**
 * Silence since the last valid reading
 * Stale only when the silence is strictly longer than timeoutSec
 *
 * @param sensorValue - This update's reading, null when there is none
 * @param lastReadTimeSec - Last valid reading, or zone creation
 */
export function checkNoReading(
  sensorValue: TemperatureReading,
  nowSec: number,
  lastReadTimeSec: number,
  timeoutSec: number
): NoReadingResult {
  if (sensorValue !== null) {
    return { stale: false, duration: 0 };
  }

  const duration = Math.max(0, nowSec - lastReadTimeSec);
  return {
    stale: duration > timeoutSec,
    duration: duration
  };
}

/**
 * Whether a stored sample is already older than the timeout
 * Such a sample does not count as a reading for a zone that first sees it
 */
export function isSampleExpired(sampleTimeSec: number, nowSec: number, timeoutSec: number): boolean {
  return nowSec - sampleTimeSec > timeoutSec;
}

/**
 * Compare a reading with the value at the last change
 *
 * @param lastValue - Value at the last change beyond epsilon
 * @param stuckSec - 0 disables detection
 * @param epsilon - Largest difference still counted as unchanged
 */
export function checkStuckSensor(
  currentValue: TemperatureReading,
  lastValue: TemperatureReading,
  nowSec: number,
  lastChangeTimeSec: number,
  stuckSec: number,
  epsilon: number
): StuckSensorResult {
  if (currentValue === null) {
    return { stuck: false, duration: 0, changed: false };
  }

  if (lastValue === null) {
    return { stuck: false, duration: 0, changed: true };
  }

  const changed = Math.abs(currentValue - lastValue) > epsilon;
  if (changed) {
    return { stuck: false, duration: 0, changed: true };
  }

  const duration = nowSec - lastChangeTimeSec;
  return {
    stuck: stuckSec > 0 && duration > stuckSec,
    duration: duration,
    changed: false
  };
}
