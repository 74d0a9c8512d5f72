/**
 * Preset management
 *
 * Maps preset names to target temperatures and applies target changes.
 * Both operations validate first and only then mutate, so a rejected
 * command leaves the state exactly as it was.
 */

import { isFiniteNumber } from '@utils/number';
import { InvalidPresetError, InvalidTemperatureError } from '$types/errors';
import type { PresetName } from '$types/common';
import type { PresetTable } from '$types/config';
import type { TargetState, TargetBounds } from './types';

export const PRESET_NAMES = ['home', 'sleep', 'away'] as const satisfies readonly PresetName[];

/**
 * Type guard for preset names coming from commands or persisted state
 */
export function isPresetName(value: string): value is PresetName {
  return PRESET_NAMES.some(function(name) {
    return name === value;
  });
}

/**
 * Look up a preset temperature
 * @throws {InvalidPresetError} For names outside the preset table
 */
export function resolvePresetTemperature(presets: PresetTable, name: string): number {
  if (!isPresetName(name)) {
    throw new InvalidPresetError(name);
  }
  return presets[name];
}

/**
 * Validate a requested target temperature
 * @throws {InvalidTemperatureError} For non-finite or out-of-bounds values
 */
export function validateTargetTemperature(temperature: number, bounds: TargetBounds): number {
  if (!isFiniteNumber(temperature) || temperature < bounds.minTemp || temperature > bounds.maxTemp) {
    throw new InvalidTemperatureError(temperature, bounds.minTemp, bounds.maxTemp);
  }
  return temperature;
}

/**
 * Apply a named preset (mutates state)
 *
 * Target and preset name change together; a zone evaluating after this
 * returns always sees the preset's target.
 *
 * @throws {InvalidPresetError} Unknown name, state unchanged
 */
export function applyPreset(state: TargetState, presets: PresetTable, name: string): TargetState {
  if (!isPresetName(name)) {
    throw new InvalidPresetError(name);
  }

  state.targetTemperature = presets[name];
  state.activePreset = name;
  return state;
}

/**
 * Apply a direct target temperature (mutates state)
 * Clears the active preset
 *
 * @throws {InvalidTemperatureError} Invalid temperature, state unchanged
 */
export function applyTarget(state: TargetState, bounds: TargetBounds, temperature: number): TargetState {
  state.targetTemperature = validateTargetTemperature(temperature, bounds);
  state.activePreset = null;
  return state;
}

/**
 * Clamp a restored target into the current bounds
 */
export function clampToBounds(temperature: number, bounds: TargetBounds): number {
  return Math.min(bounds.maxTemp, Math.max(bounds.minTemp, temperature));
}
