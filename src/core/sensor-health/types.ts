/**
 * Sensor health monitoring type definitions
 */

import type { TemperatureReading } from '$types/common';

/**
 * Result of no-reading detection check
 */
export interface NoReadingResult {
  /** Whether the sensor has been without a valid value beyond the timeout */
  stale: boolean;

  /** Seconds since the last valid reading */
  duration: number;
}

/**
 * Result of stuck sensor detection check
 *
 * A sensor is stuck when its value has stayed within epsilon for longer
 * than the stuck threshold.
 */
export interface StuckSensorResult {
  /** Whether sensor is stuck (value unchanged beyond threshold) */
  stuck: boolean;

  /** Duration in seconds since value last changed */
  duration: number;

  /** Whether the value changed on this check (beyond epsilon) */
  changed: boolean;
}

/**
 * Health state of a zone temperature sensor
 */
export interface SensorHealthState {
  /** Timestamp (s) of the last valid reading, zone creation time before any */
  lastReadTime: number;

  /** Timestamp (s) when the value last changed beyond epsilon */
  lastChangeTime: number;

  /** Last valid temperature (°C), kept while the sensor is silent */
  lastValid: TemperatureReading;

  /** Value at the last change beyond epsilon, reference for stuck detection */
  lastRaw: TemperatureReading;

  /** Whether the sensor is currently considered stale */
  staleFired: boolean;

  /** Whether the sensor is currently considered stuck */
  stuckFired: boolean;

  /** Set when the sensor came back from stale on this update */
  recovered?: boolean;

  /** Seconds without a reading when staleness was first detected */
  staleDuration?: number;

  /** Set when the value moved again after being stuck */
  unstuck?: boolean;

  /** Seconds unchanged when stuck was first detected */
  stuckDuration?: number;
}

/**
 * Sensor health thresholds taken from the zone configuration
 */
export interface SensorHealthConfig {
  /** Seconds without a valid reading before the sensor is stale */
  timeoutSec: number;

  /** Seconds with an unchanged value before the sensor is stuck (0 disables) */
  stuckSec: number;

  /** Minimum change (°C) that counts as movement */
  stuckEpsilon: number;
}
