/**
 * Absence-of-motion gating
 * No motion for absenceSec blocks heating until motion is seen again
 */

import type { MotionGatingConfig } from '$types/config';
import type { MotionState, MotionCheckResult } from './types';

export function createMotionState(nowSec: number): MotionState {
  return { active: null, lastMotionTime: nowSec, absent: false };
}

/**
 * Record a motion sensor update (mutates state)
 * Motion ending counts as the last time motion was seen
 */
export function recordMotion(state: MotionState, active: boolean | null, nowSec: number): void {
  if (active === true || state.active === true) {
    state.lastMotionTime = nowSec;
  }
  state.active = active;
}

/**
 * Check whether absence blocks heating (mutates state.absent)
 */
export function updateMotionGating(
  state: MotionState,
  nowSec: number,
  config: MotionGatingConfig
): MotionCheckResult {
  const absentSec = state.active === true ? 0 : Math.max(0, nowSec - state.lastMotionTime);
  const blocking = config.enabled && state.active !== true && absentSec >= config.absenceSec;
  const changed = blocking !== state.absent;

  state.absent = blocking;
  return { blocking: blocking, absentSec: absentSec, changed: changed };
}
