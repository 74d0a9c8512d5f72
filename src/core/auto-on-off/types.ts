/**
 * Auto on/off type definitions
 */

import type { TemperatureReading, PowerState } from '$types/common';

/**
 * Guard decision
 */
export type AutoOnOffAction = 'force_on' | 'force_off' | 'none';

/**
 * Why the guard decided what it decided
 */
export type AutoOnOffReason =
  | 'disabled'
  | 'outdoor_unavailable'
  | 'below_on_temp'
  | 'above_off_temp'
  | 'in_band';

/**
 * Result of one guard evaluation
 */
export interface AutoOnOffDecision {
  action: AutoOnOffAction;
  reason: AutoOnOffReason;
  /** Outdoor temperature the decision was based on */
  outdoorTemp: TemperatureReading;
  /** Computed but not applied because a manual override is active */
  suppressed: boolean;
}

/**
 * Power change the zone should make after the guard ran
 */
export interface AutoPowerChange {
  apply: boolean;
  powerState: PowerState;
}
