/**
 * Window detection type definitions
 */

import type { TemperatureReading } from '$types/common';

/**
 * What opened the window
 */
export type WindowSource = 'sensor' | 'slope';

/**
 * Unconfirmed slope detection
 */
export interface WindowCandidate {
  startTime: number;
  startTemp: TemperatureReading;
  lastTemp: TemperatureReading;
  sampleCount: number;
}

/**
 * Window state of one zone
 */
export interface WindowState {
  open: boolean;
  source: WindowSource | null;
  /** Temperature when the window opened (°C) */
  baselineTemp: TemperatureReading;
  /** Time (s) of the last open or close */
  lastEventTime: number | null;
  /** Heating stays blocked until this time (s) after a close */
  recoveryUntil: number | null;
  candidate: WindowCandidate | null;

  // ───────── SLOPE TRACKING ─────────
  lastSampleTime: number | null;
  lastSampleTemp: TemperatureReading;
  /** Sample before the last one, baseline for a new candidate */
  prevSampleTemp: TemperatureReading;
  /** Temperature change rate (°C/h) */
  slopePerHour: number;
}

/**
 * Why a window transition happened
 */
export type WindowCause =
  | 'sensor_open'
  | 'sensor_closed'
  | 'slope_confirmed'
  | 'slope_resolved'
  | 'false_positive'
  | 'timed_out'
  | 'disabled';

/**
 * Transition reported by one detection update
 */
export interface WindowEvent {
  type: 'opened' | 'closed';
  cause: WindowCause;
  slopePerHour: number;
}

/**
 * Heating block caused by a window
 */
export type WindowBlock = 'window_open' | 'window_recovery';
