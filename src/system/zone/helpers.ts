/**
 * Zone controller helper functions
 */

import { parseNumericState, parseBinaryState } from '@hardware/sensors';
import { calculateThresholds } from '@core/thermostat';
import { isPresetName, clampToBounds } from '@core/presets';

import type { TemperatureReading } from '$types/common';
import type { ZoneConfig } from '$types/config';
import type { SensorReader } from '@hardware/sensors';
import type { CentralHeaterSnapshot } from '@core/central-heater';
import type { ZoneRuntimeState, ZoneSnapshot, PersistedZoneState } from './types';

/**
 * Read a numeric entity, null when unconfigured, missing or invalid
 */
export function readNumeric(sensors: SensorReader, entityId: string | undefined): TemperatureReading {
  if (entityId === undefined) {
    return null;
  }
  const sample = sensors.get(entityId);
  return sample === null ? null : parseNumericState(sample.value);
}

/**
 * Read a binary entity, null when unconfigured, missing or unknown
 */
export function readBinary(sensors: SensorReader, entityId: string | undefined): boolean | null {
  if (entityId === undefined) {
    return null;
  }
  const sample = sensors.get(entityId);
  return sample === null ? null : parseBinaryState(sample.value);
}

/**
 * Entities a zone listens to
 */
export function zoneEntities(config: ZoneConfig): string[] {
  const entities = [config.tempSensor, config.outdoorSensor];
  const optional = [
    config.backupOutdoorSensor,
    config.weatherEntity,
    config.humiditySensor,
    config.doorWindowSensor,
    config.motionSensor
  ];
  for (const entityId of optional) {
    if (entityId !== undefined && entities.indexOf(entityId) === -1) {
      entities.push(entityId);
    }
  }
  return entities;
}

/**
 * Build the published snapshot
 */
export function buildSnapshot(
  config: ZoneConfig,
  state: ZoneRuntimeState,
  sensors: SensorReader,
  centralHeater: CentralHeaterSnapshot | null
): ZoneSnapshot {
  const thresholds = calculateThresholds(state.targetTemperature, config.hysteresisLow, config.hysteresisHigh);

  return {
    zoneId: config.id,
    name: config.name,
    mode: state.mode,
    hvacAction: state.mode === 'heating' ? 'heating' : 'idle',
    powerState: state.powerState,
    currentTemperature: state.currentTemperature,
    targetTemperature: state.targetTemperature,
    activePreset: state.activePreset,
    manualOverride: state.manualOverride.active,
    manualOverrideSince: state.manualOverride.since,
    degraded: state.degradedReasons.length > 0,
    degradedReasons: state.degradedReasons.slice(),
    blockedBy: state.blockedBy.slice(),
    heatOnThreshold: thresholds.onAtOrBelow,
    heatOffThreshold: thresholds.offAtOrAbove,
    outdoorTemperature: state.outdoor.value,
    outdoorSource: state.outdoor.source,
    autoOnOff: { ...state.autoDecision },
    humidity: readNumeric(sensors, config.humiditySensor),
    doorWindowOpen: readBinary(sensors, config.doorWindowSensor),
    motionActive: state.motion.active,
    windowOpen: state.window.open,
    windowRecoveryUntil: state.window.recoveryUntil,
    temperatureSlope: state.window.slopePerHour,
    centralHeater: centralHeater
  };
}

/**
 * Sanitize persisted values against the current configuration
 * Targets outside the bounds are clamped, unknown presets dropped
 */
export function sanitizePersistedState(saved: PersistedZoneState, config: ZoneConfig): PersistedZoneState {
  const activePreset = saved.activePreset !== null && isPresetName(saved.activePreset) ? saved.activePreset : null;
  const targetTemperature = activePreset !== null
    ? config.presets[activePreset]
    : clampToBounds(saved.targetTemperature, config);

  return {
    powerState: saved.powerState,
    targetTemperature: targetTemperature,
    activePreset: activePreset,
    manualOverride: saved.manualOverride
  };
}
