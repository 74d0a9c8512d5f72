/**
 * Preset type definitions
 */

import type { PresetName } from '$types/common';

/**
 * Target-related slice of a zone's runtime state
 * activePreset is null after a direct target change
 */
export interface TargetState {
  targetTemperature: number;
  activePreset: PresetName | null;
}

/**
 * Allowed target range of a zone (°C)
 */
export interface TargetBounds {
  readonly minTemp: number;
  readonly maxTemp: number;
}
