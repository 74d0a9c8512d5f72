/**
 * Common type definitions used throughout the project
 */

/**
 * Temperature reading - null when no valid value is known
 */
export type TemperatureReading = number | null;

/**
 * Raw value carried by a sensor event before parsing
 */
export type SensorValue = number | string | boolean | null;

/**
 * Zone power switch as set by the user or by auto on/off
 */
export type PowerState = 'on' | 'off';

/**
 * Zone controller state machine states
 */
export type ZoneMode = 'off' | 'idle' | 'heating';

/**
 * Published heating action
 */
export type HvacAction = 'idle' | 'heating';

/**
 * Who issued a runtime command
 * 'auto' is reserved for the outdoor auto on/off guard
 */
export type CommandOrigin = 'user' | 'auto';

/**
 * Named temperature profiles
 */
export type PresetName = 'home' | 'sleep' | 'away';

/**
 * Timer abstraction
 * Implemented over Node timers at runtime and by the simulated clock in tests
 */
export interface TimerAPI {
  /**
   * Set a timer
   * @param intervalMs - Interval in milliseconds
   * @param repeat - Whether to repeat the timer
   * @param callback - Function to call when timer fires
   * @returns Timer id usable with clear()
   */
  set(intervalMs: number, repeat: boolean, callback: () => void): number;

  /**
   * Cancel a timer (no-op for unknown or already fired ids)
   */
  clear(id: number): void;
}

/**
 * Function returning the current monotonic time in seconds
 */
export type TimeSource = () => number;
