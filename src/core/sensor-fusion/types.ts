/**
 * Sensor fusion type definitions
 */

import type { TemperatureReading } from '$types/common';
import type { SensorSample } from '@hardware/sensors';

/**
 * Where the effective outdoor temperature came from
 */
export type OutdoorSource = 'primary' | 'backup' | 'weather' | 'none';

/**
 * Latest samples of the outdoor inputs, null when missing or unconfigured
 */
export interface OutdoorInputs {
  primary: SensorSample | null;
  backup: SensorSample | null;
  weather: SensorSample | null;
}

/**
 * Effective outdoor temperature
 */
export interface OutdoorReading {
  value: TemperatureReading;
  source: OutdoorSource;
  /** True when no source resolved */
  degraded: boolean;
}
