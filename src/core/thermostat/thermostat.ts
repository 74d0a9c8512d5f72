/**
 * Thermostat decision logic
 * Two-threshold hysteresis around the zone target
 */

import type { TemperatureReading } from '$types/common';
import type { HeatingThresholds } from './types';

/**
 * Calculate switching thresholds
 *
 * @param target - Target temperature (°C)
 * @param hysteresisLow - Margin below target that starts heating (°C)
 * @param hysteresisHigh - Margin above target that stops heating (°C)
 */
export function calculateThresholds(
  target: number,
  hysteresisLow: number,
  hysteresisHigh: number
): HeatingThresholds {
  return {
    onAtOrBelow: target - hysteresisLow,
    offAtOrAbove: target + hysteresisHigh
  };
}

/**
 * Decide whether the zone should heat
 *
 * Inside the band the current decision is kept. Without a temperature
 * the answer is always false.
 *
 * @param currentTemp - Current zone temperature
 * @param heating - Whether the zone is heating now
 * @param thresholds - Switching thresholds
 * @returns True if the zone should heat after this evaluation
 */
export function decideHeating(
  currentTemp: TemperatureReading,
  heating: boolean,
  thresholds: HeatingThresholds
): boolean {
  if (currentTemp === null) {
    return false;
  }

  if (heating) {
    return currentTemp < thresholds.offAtOrAbove;
  }

  return currentTemp <= thresholds.onAtOrBelow;
}
