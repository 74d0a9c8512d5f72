/**
 * Outdoor temperature fusion
 * Primary sensor, then backup sensor, then the weather entity
 */

import { parseNumericState, isRecord } from '@hardware/sensors';
import type { TemperatureReading } from '$types/common';
import type { SensorSample } from '@hardware/sensors';
import type { OutdoorInputs, OutdoorReading } from './types';

function parseAttribute(value: unknown): TemperatureReading {
  if (typeof value === 'number' || typeof value === 'string') {
    return parseNumericState(value);
  }
  return null;
}

/**
 * Read a temperature from a weather entity sample
 * Current conditions first, then the first forecast entry
 */
export function readWeatherTemperature(sample: SensorSample | null): TemperatureReading {
  if (sample === null) {
    return null;
  }

  const current = parseAttribute(sample.attributes['temperature']);
  if (current !== null) {
    return current;
  }

  const forecast = sample.attributes['forecast'];
  if (Array.isArray(forecast) && forecast.length > 0) {
    const first: unknown = forecast[0];
    if (isRecord(first)) {
      return parseAttribute(first['temperature']);
    }
  }
  return null;
}

function readSample(sample: SensorSample | null): TemperatureReading {
  if (sample === null) {
    return null;
  }
  return parseNumericState(sample.value);
}

/**
 * Resolve the effective outdoor temperature
 */
export function resolveOutdoorTemperature(inputs: OutdoorInputs): OutdoorReading {
  const primary = readSample(inputs.primary);
  if (primary !== null) {
    return { value: primary, source: 'primary', degraded: false };
  }

  const backup = readSample(inputs.backup);
  if (backup !== null) {
    return { value: backup, source: 'backup', degraded: false };
  }

  const weather = readWeatherTemperature(inputs.weather);
  if (weather !== null) {
    return { value: weather, source: 'weather', degraded: false };
  }

  return { value: null, source: 'none', degraded: true };
}
