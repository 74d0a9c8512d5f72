/**
 * Sensor value parsing
 *
 * Sensor states arrive as numbers, strings or booleans. The sentinel
 * strings below mean "no value" and are never treated as readings.
 */

import { isFiniteNumber } from '@utils/number';

import type { SensorValue, TemperatureReading } from '$types/common';

const NO_VALUE_STATES = ['unknown', 'unavailable', 'none', 'null', ''];
const TRUE_STATES = ['on', 'open', 'true', 'detected', 'home'];
const FALSE_STATES = ['off', 'closed', 'false', 'clear', 'not_home'];

/**
 * Check whether a raw state is one of the "no value" sentinels
 */
export function isNoValueState(value: SensorValue): boolean {
  if (value === null) {
    return true;
  }
  return typeof value === 'string' && NO_VALUE_STATES.indexOf(value.trim().toLowerCase()) !== -1;
}

/**
 * Parse a numeric sensor state
 * @param value - Raw state
 * @returns Finite number, or null for sentinels, booleans and non-numeric text
 */
export function parseNumericState(value: SensorValue): TemperatureReading {
  if (isFiniteNumber(value)) {
    return value;
  }
  if (typeof value !== 'string' || isNoValueState(value)) {
    return null;
  }

  const trimmed = value.trim();
  if (!/^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/.test(trimmed)) {
    return null;
  }

  const parsed = Number(trimmed);
  return isFiniteNumber(parsed) ? parsed : null;
}

/**
 * Parse a binary sensor state
 * @param value - Raw state
 * @returns true/false, or null when the state is unknown
 */
export function parseBinaryState(value: SensorValue): boolean | null {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return value !== 0;
  }
  if (value === null) {
    return null;
  }

  const normalized = value.trim().toLowerCase();
  if (TRUE_STATES.indexOf(normalized) !== -1) {
    return true;
  }
  if (FALSE_STATES.indexOf(normalized) !== -1) {
    return false;
  }
  return null;
}

/**
 * Narrow an unknown value to a plain object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
