/**
 * Motion gating type definitions
 */

export interface MotionState {
  /** Last known motion sensor state, null when unknown */
  active: boolean | null;
  /** Last time (s) motion was seen, zone creation time before any */
  lastMotionTime: number;
  /** Whether absence currently blocks heating */
  absent: boolean;
}

export interface MotionCheckResult {
  blocking: boolean;
  /** Seconds since motion was last seen */
  absentSec: number;
  /** Set when blocking changed on this check */
  changed: boolean;
}
