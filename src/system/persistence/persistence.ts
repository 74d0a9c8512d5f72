/**
 * Persisted state parsing and the in-memory store
 */

import { isRecord } from '@hardware/sensors';
import { isFiniteNumber } from '@utils/number';
import { isPresetName } from '@core/presets';
import { PERSISTED_STATE_VERSION } from './types';

import type { PersistedZoneState } from '@system/zone';
import type { PersistedEngineState, RuntimeStateStore } from './types';

function parseZoneState(value: unknown): PersistedZoneState | null {
  if (!isRecord(value)) {
    return null;
  }

  const powerState = value.powerState;
  if (powerState !== 'on' && powerState !== 'off') {
    return null;
  }
  const targetTemperature = value.targetTemperature;
  if (!isFiniteNumber(targetTemperature)) {
    return null;
  }

  const preset = value.activePreset;
  const activePreset = typeof preset === 'string' && isPresetName(preset) ? preset : null;

  return {
    powerState: powerState,
    targetTemperature: targetTemperature,
    activePreset: activePreset,
    manualOverride: value.manualOverride === true
  };
}

/**
 * Validate stored data
 *
 * Unknown versions yield null. Zones whose entry is malformed are dropped
 * individually and reported through onInvalid.
 *
 * @param data - Parsed JSON
 * @param onInvalid - Called with the id of every dropped zone entry
 */
export function parsePersistedState(
  data: unknown,
  onInvalid?: (zoneId: string) => void
): PersistedEngineState | null {
  if (!isRecord(data) || data.version !== PERSISTED_STATE_VERSION) {
    return null;
  }
  const saved = data.zones;
  if (!isRecord(saved)) {
    return null;
  }

  const zones: Record<string, PersistedZoneState> = {};
  for (const zoneId of Object.keys(saved)) {
    const parsed = parseZoneState(saved[zoneId]);
    if (parsed === null) {
      if (onInvalid !== undefined) {
        onInvalid(zoneId);
      }
      continue;
    }
    zones[zoneId] = parsed;
  }

  return { version: PERSISTED_STATE_VERSION, zones: zones };
}

/**
 * Store that keeps the last saved state in memory
 * Used by tests and the simulator
 */
export function createMemoryStateStore(
  initial: PersistedEngineState | null = null
): RuntimeStateStore & { saves: number; current(): PersistedEngineState | null } {
  let stored: string | null = initial === null ? null : JSON.stringify(initial);

  const store = {
    saves: 0,
    load: function(): Promise<PersistedEngineState | null> {
      return Promise.resolve(stored === null ? null : parsePersistedState(JSON.parse(stored)));
    },
    save: function(state: PersistedEngineState): Promise<void> {
      stored = JSON.stringify(state);
      store.saves++;
      return Promise.resolve();
    },
    current: function(): PersistedEngineState | null {
      return stored === null ? null : parsePersistedState(JSON.parse(stored));
    }
  };
  return store;
}
