import { createSensorStore } from '@hardware/sensors';
import { readNumeric, readBinary, zoneEntities, sanitizePersistedState } from './helpers';

import type { ZoneConfig } from '$types/config';

const config: ZoneConfig = {
  id: 'office',
  name: 'Office',
  heater: 'switch.office_heater',
  tempSensor: 'sensor.office_temp',
  outdoorSensor: 'sensor.outdoor_temp',
  backupOutdoorSensor: 'sensor.outdoor_temp',
  humiditySensor: 'sensor.office_humidity',
  motionSensor: 'binary_sensor.office_motion',
  presets: { home: 21, sleep: 18, away: 16 },
  initialPreset: 'home',
  minTemp: 7,
  maxTemp: 28,
  hysteresisLow: 0.3,
  hysteresisHigh: 0.3,
  autoOnOff: { enabled: false, onTemp: 15, offTemp: 18 },
  manualOverrideTimeoutSec: 0,
  centralHeaterOnDelaySec: 30,
  centralHeaterOffDelaySec: 120,
  sensorTimeoutSec: 600,
  sensorStuckSec: 0,
  minOffSec: 0,
  windowDetection: { enabled: false, slopeDetection: false, slopeThreshold: 2, recoverySec: 300 },
  motionGating: { enabled: false, absenceSec: 1800 }
};

describe('zone helpers', () => {
  describe('readNumeric / readBinary', () => {
    it('should return null for unconfigured and missing entities', () => {
      const store = createSensorStore();
      expect(readNumeric(store, undefined)).toBeNull();
      expect(readNumeric(store, 'sensor.office_humidity')).toBeNull();
      expect(readBinary(store, undefined)).toBeNull();
    });

    it('should parse stored states', () => {
      const store = createSensorStore();
      store.accept('sensor.office_humidity', '45.5', 1);
      store.accept('binary_sensor.office_motion', 'off', 1);
      expect(readNumeric(store, 'sensor.office_humidity')).toBe(45.5);
      expect(readBinary(store, 'binary_sensor.office_motion')).toBe(false);
    });
  });

  describe('zoneEntities', () => {
    it('should list every configured entity once', () => {
      expect(zoneEntities(config)).toEqual([
        'sensor.office_temp',
        'sensor.outdoor_temp',
        'sensor.office_humidity',
        'binary_sensor.office_motion'
      ]);
    });
  });

  describe('sanitizePersistedState', () => {
    it('should keep valid values', () => {
      expect(sanitizePersistedState(
        { powerState: 'on', targetTemperature: 19.5, activePreset: null, manualOverride: false },
        config
      )).toEqual({ powerState: 'on', targetTemperature: 19.5, activePreset: null, manualOverride: false });
    });

    it('should clamp a target outside the bounds', () => {
      expect(sanitizePersistedState(
        { powerState: 'off', targetTemperature: 3, activePreset: null, manualOverride: true },
        config
      ).targetTemperature).toBe(7);
    });

    it('should take the target from the active preset', () => {
      expect(sanitizePersistedState(
        { powerState: 'on', targetTemperature: 25, activePreset: 'away', manualOverride: false },
        config
      ).targetTemperature).toBe(16);
    });
  });
});
