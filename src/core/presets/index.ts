export {
  PRESET_NAMES,
  isPresetName,
  resolvePresetTemperature,
  validateTargetTemperature,
  applyPreset,
  applyTarget,
  clampToBounds
} from './presets';
export type { TargetState, TargetBounds } from './types';
