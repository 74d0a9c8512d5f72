/**
 * Outdoor temperature driven power forcing
 *
 * Two distinct thresholds form the hysteresis band: above offTemp the zone
 * is switched off, below onTemp it is switched on, in between nothing
 * happens. Missing outdoor data never forces anything.
 */

import type { TemperatureReading, PowerState } from '$types/common';
import type { AutoOnOffConfig } from '$types/config';
import type { AutoOnOffDecision, AutoPowerChange } from './types';

export const AUTO_ON_OFF_ACTIONS = {
  FORCE_ON: 'force_on',
  FORCE_OFF: 'force_off',
  NONE: 'none'
} as const;

/**
 * Evaluate the guard
 *
 * With an active manual override the decision is still computed, for
 * diagnostics, and marked suppressed.
 *
 * @param outdoorTemp - Fused outdoor temperature, null when unavailable
 * @param config - Zone auto on/off thresholds
 * @param manualOverride - Whether a user override is active
 */
export function evaluateAutoOnOff(
  outdoorTemp: TemperatureReading,
  config: AutoOnOffConfig,
  manualOverride: boolean
): AutoOnOffDecision {
  if (!config.enabled) {
    return { action: AUTO_ON_OFF_ACTIONS.NONE, reason: 'disabled', outdoorTemp: outdoorTemp, suppressed: false };
  }

  if (outdoorTemp === null) {
    return {
      action: AUTO_ON_OFF_ACTIONS.NONE,
      reason: 'outdoor_unavailable',
      outdoorTemp: null,
      suppressed: false
    };
  }

  if (outdoorTemp > config.offTemp) {
    return {
      action: AUTO_ON_OFF_ACTIONS.FORCE_OFF,
      reason: 'above_off_temp',
      outdoorTemp: outdoorTemp,
      suppressed: manualOverride
    };
  }

  if (outdoorTemp < config.onTemp) {
    return {
      action: AUTO_ON_OFF_ACTIONS.FORCE_ON,
      reason: 'below_on_temp',
      outdoorTemp: outdoorTemp,
      suppressed: manualOverride
    };
  }

  return { action: AUTO_ON_OFF_ACTIONS.NONE, reason: 'in_band', outdoorTemp: outdoorTemp, suppressed: false };
}

/**
 * Translate a decision into a power change
 * Only an unsuppressed decision that differs from the current power applies
 */
export function resolvePowerChange(decision: AutoOnOffDecision, currentPower: PowerState): AutoPowerChange {
  if (decision.suppressed || decision.action === AUTO_ON_OFF_ACTIONS.NONE) {
    return { apply: false, powerState: currentPower };
  }

  const wanted: PowerState = decision.action === AUTO_ON_OFF_ACTIONS.FORCE_ON ? 'on' : 'off';
  return { apply: wanted !== currentPower, powerState: wanted };
}
