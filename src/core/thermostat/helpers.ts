/**
 * Thermostat helper functions
 */

import type { MinOffCheckResult } from './types';

/**
 * Check the minimum off time before a zone heater may be energized again
 *
 * @param nowSec - Current time (s)
 * @param lastOffTime - When the heater was last switched off (s), null if never
 * @param minOffSec - Required rest time (s), 0 disables the check
 */
export function checkMinOff(
  nowSec: number,
  lastOffTime: number | null,
  minOffSec: number
): MinOffCheckResult {
  if (minOffSec <= 0 || lastOffTime === null) {
    return { allow: true };
  }

  const elapsed = nowSec - lastOffTime;
  if (elapsed >= minOffSec) {
    return { allow: true };
  }

  return {
    allow: false,
    remainingSec: minOffSec - elapsed,
    canTurnOnAt: lastOffTime + minOffSec
  };
}
