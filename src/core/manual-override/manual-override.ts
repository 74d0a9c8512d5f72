/**
 * Manual override tracking
 *
 * Any user command sets the override and refreshes its timestamp. Commands
 * issued by the auto on/off guard never touch it. Only reset() clears it,
 * or expiry when a timeout is configured.
 */

import type { CommandOrigin } from '$types/common';
import type { ManualOverrideState } from './types';

export function createManualOverrideState(): ManualOverrideState {
  return { active: false, since: null };
}

/**
 * Record a power, preset or target command (mutates state)
 * @returns True when the override was newly activated
 */
export function recordCommand(state: ManualOverrideState, origin: CommandOrigin, nowSec: number): boolean {
  if (origin !== 'user') {
    return false;
  }

  const activated = !state.active;
  state.active = true;
  state.since = nowSec;
  return activated;
}

/**
 * Clear the override unconditionally (mutates state)
 * @returns True when an active override was cleared
 */
export function resetManualOverride(state: ManualOverrideState): boolean {
  const wasActive = state.active;
  state.active = false;
  state.since = null;
  return wasActive;
}

/**
 * Expire the override once timeoutSec has elapsed since it was set
 * A timeout of 0 means the override never expires
 *
 * @returns True when the override expired on this call
 */
export function expireManualOverride(state: ManualOverrideState, nowSec: number, timeoutSec: number): boolean {
  if (!state.active || timeoutSec <= 0 || state.since === null) {
    return false;
  }
  if (nowSec - state.since < timeoutSec) {
    return false;
  }

  return resetManualOverride(state);
}
