/**
 * Manual override type definitions
 */

/**
 * Whether a user has taken over the zone's power decision
 */
export interface ManualOverrideState {
  active: boolean;
  /** When the override was last set (s), null when inactive */
  since: number | null;
}
