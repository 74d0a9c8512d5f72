/**
 * Thermostat type definitions
 */

/**
 * Switching thresholds derived from target and hysteresis
 */
export interface HeatingThresholds {
  /** Start heating at or below this temperature (°C) */
  onAtOrBelow: number;
  /** Stop heating at or above this temperature (°C) */
  offAtOrAbove: number;
}

/**
 * Result of the minimum-off check
 */
export interface MinOffCheckResult {
  /** Whether the heater may be energized again */
  allow: boolean;
  /** Seconds left until it may, when blocked */
  remainingSec?: number;
  /** Timestamp (s) from which it may, when blocked */
  canTurnOnAt?: number;
}
