export {
  createManualOverrideState,
  recordCommand,
  resetManualOverride,
  expireManualOverride
} from './manual-override';
export type { ManualOverrideState } from './types';
