/**
 * Open window detection
 *
 * A door/window sensor reporting open blocks heating at once. Optionally a
 * rapid temperature drop is treated as an open window too: a candidate is
 * started when the slope falls below -threshold and confirmed by a large
 * enough drop or by the slope persisting. After a window closes heating
 * stays blocked for the recovery period.
 */

import type { TemperatureReading } from '$types/common';
import type { WindowDetectionConfig } from '$types/config';
import type { WindowState, WindowEvent, WindowCause, WindowBlock, WindowSource } from './types';

export const WINDOW_CONSTANTS = {
  /** Slope must persist this long to confirm a candidate (s) */
  CONFIRMATION_SEC: 120,
  /** Drop that confirms a candidate immediately (°C) */
  CONFIRMATION_DROP: 0.15,
  /** Unconfirmed candidates are discarded after this long (s) */
  CANDIDATE_RESET_SEC: 240,
  /** Slope detections that never dropped this far are cleared (°C) */
  FALSE_POSITIVE_TOLERANCE: 0.1,
  /** Slope detections without further cooling are cleared after (s) */
  AUTO_CLEAR_SEC: 900
} as const;

const SECONDS_PER_HOUR = 3600;

export function createWindowState(): WindowState {
  return {
    open: false,
    source: null,
    baselineTemp: null,
    lastEventTime: null,
    recoveryUntil: null,
    candidate: null,
    lastSampleTime: null,
    lastSampleTemp: null,
    prevSampleTemp: null,
    slopePerHour: 0
  };
}

/**
 * Feed a new temperature sample into slope tracking (mutates state)
 */
export function recordTemperatureSample(state: WindowState, temp: number, sampleTime: number): void {
  if (state.lastSampleTime !== null && state.lastSampleTemp !== null) {
    const dt = sampleTime - state.lastSampleTime;
    if (dt > 0) {
      state.slopePerHour = (temp - state.lastSampleTemp) / dt * SECONDS_PER_HOUR;
    }
  }

  state.prevSampleTemp = state.lastSampleTemp;
  state.lastSampleTemp = temp;
  state.lastSampleTime = sampleTime;

  if (state.candidate !== null) {
    state.candidate.sampleCount++;
    state.candidate.lastTemp = temp;
  }
}

function openWindow(
  state: WindowState,
  nowSec: number,
  source: WindowSource,
  baseline: TemperatureReading
): void {
  state.open = true;
  state.source = source;
  state.baselineTemp = baseline;
  state.lastEventTime = nowSec;
  state.recoveryUntil = null;
  state.candidate = null;
}

function closeWindow(state: WindowState, nowSec: number, recoverySec: number, enforceRecovery: boolean): void {
  state.open = false;
  state.source = null;
  state.baselineTemp = null;
  state.lastEventTime = nowSec;
  state.recoveryUntil = enforceRecovery && recoverySec > 0 ? nowSec + recoverySec : null;
}

function event(type: WindowEvent['type'], cause: WindowCause, state: WindowState): WindowEvent {
  return { type: type, cause: cause, slopePerHour: state.slopePerHour };
}

function updateCandidate(
  state: WindowState,
  nowSec: number,
  currentTemp: TemperatureReading,
  threshold: number
): WindowEvent | null {
  const slope = state.slopePerHour;

  if (slope > -threshold) {
    const candidate = state.candidate;
    if (candidate !== null &&
        (slope > -threshold * 0.2 || nowSec - candidate.startTime >= WINDOW_CONSTANTS.CANDIDATE_RESET_SEC)) {
      state.candidate = null;
    }
    return null;
  }

  if (state.candidate === null) {
    state.candidate = {
      startTime: nowSec,
      startTemp: state.prevSampleTemp !== null ? state.prevSampleTemp : currentTemp,
      lastTemp: currentTemp,
      sampleCount: 1
    };
  } else if (currentTemp !== null) {
    state.candidate.lastTemp = currentTemp;
  }

  const candidate = state.candidate;
  const drop = candidate.startTemp !== null && candidate.lastTemp !== null
    ? candidate.startTemp - candidate.lastTemp
    : null;
  const elapsed = nowSec - candidate.startTime;

  const confirmDrop = drop !== null && drop >= WINDOW_CONSTANTS.CONFIRMATION_DROP;
  const confirmDuration = candidate.sampleCount >= 2 &&
    elapsed >= WINDOW_CONSTANTS.CONFIRMATION_SEC &&
    slope <= -threshold * 0.5;

  if (confirmDrop || confirmDuration) {
    const baseline = candidate.startTemp !== null ? candidate.startTemp : candidate.lastTemp;
    openWindow(state, nowSec, 'slope', baseline);
    return event('opened', 'slope_confirmed', state);
  }

  if (candidate.sampleCount < 2 && elapsed >= WINDOW_CONSTANTS.CANDIDATE_RESET_SEC) {
    state.candidate = null;
  }
  return null;
}

function updateSlopeDetection(
  state: WindowState,
  nowSec: number,
  currentTemp: TemperatureReading,
  config: WindowDetectionConfig
): WindowEvent | null {
  const threshold = config.slopeThreshold;
  const slope = state.slopePerHour;

  if (!state.open) {
    return updateCandidate(state, nowSec, currentTemp, threshold);
  }

  const sinceEvent = state.lastEventTime === null ? 0 : nowSec - state.lastEventTime;
  const falsePositive = state.baselineTemp !== null &&
    currentTemp !== null &&
    state.baselineTemp - currentTemp < WINDOW_CONSTANTS.FALSE_POSITIVE_TOLERANCE &&
    sinceEvent >= WINDOW_CONSTANTS.CONFIRMATION_SEC;
  const timedOut = sinceEvent >= WINDOW_CONSTANTS.AUTO_CLEAR_SEC && slope > -threshold;

  if (falsePositive) {
    closeWindow(state, nowSec, config.recoverySec, false);
    return event('closed', 'false_positive', state);
  }
  if (slope >= -threshold * 0.4) {
    closeWindow(state, nowSec, config.recoverySec, true);
    return event('closed', 'slope_resolved', state);
  }
  if (timedOut) {
    closeWindow(state, nowSec, config.recoverySec, true);
    return event('closed', 'timed_out', state);
  }
  return null;
}

/**
 * Update window detection (mutates state)
 *
 * @param state - Zone window state
 * @param nowSec - Current time (s)
 * @param doorWindowOpen - Door/window sensor, null when absent or unknown
 * @param currentTemp - Zone temperature used for drop checks
 * @param config - Window detection settings
 * @returns The transition that happened on this update, if any
 */
export function updateWindowDetection(
  state: WindowState,
  nowSec: number,
  doorWindowOpen: boolean | null,
  currentTemp: TemperatureReading,
  config: WindowDetectionConfig
): WindowEvent | null {
  if (!config.enabled) {
    state.candidate = null;
    state.recoveryUntil = null;
    if (state.open) {
      closeWindow(state, nowSec, 0, false);
      return event('closed', 'disabled', state);
    }
    return null;
  }

  if (doorWindowOpen === true) {
    state.candidate = null;
    if (state.open) {
      state.source = 'sensor';
      return null;
    }
    openWindow(state, nowSec, 'sensor', currentTemp);
    return event('opened', 'sensor_open', state);
  }

  if (state.open && state.source === 'sensor') {
    closeWindow(state, nowSec, config.recoverySec, true);
    return event('closed', 'sensor_closed', state);
  }

  if (!config.slopeDetection) {
    state.candidate = null;
    return null;
  }

  return updateSlopeDetection(state, nowSec, currentTemp, config);
}

/**
 * Heating block from the window state, null when heating is allowed
 */
export function windowBlock(state: WindowState, nowSec: number): WindowBlock | null {
  if (state.open) {
    return 'window_open';
  }
  if (state.recoveryUntil !== null && nowSec < state.recoveryUntil) {
    return 'window_recovery';
  }
  return null;
}
