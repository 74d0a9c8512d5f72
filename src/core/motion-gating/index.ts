export { createMotionState, recordMotion, updateMotionGating } from './motion-gating';
export type { MotionState, MotionCheckResult } from './types';
