/**
 * Tests for configuration validator
 */

import { ConfigurationError } from '$types/errors';
import {
  validateZoneConfig,
  validateEngineConfig,
  assertValidZoneConfig,
  assertValidEngineConfig,
  validateZoneActuators,
  assertZoneFits
} from './validator';

import type { ZoneConfig, EngineConfig } from '$types/config';

const validZone: ZoneConfig = {
  id: 'living',
  name: 'Living room',
  heater: 'switch.living_heater',
  centralHeater: 'switch.boiler',
  tempSensor: 'sensor.living_temp',
  outdoorSensor: 'sensor.outdoor_temp',
  presets: { home: 23, sleep: 21, away: 18 },
  initialPreset: 'home',
  minTemp: 5,
  maxTemp: 30,
  hysteresisLow: 0.3,
  hysteresisHigh: 0.3,
  autoOnOff: { enabled: true, onTemp: 10, offTemp: 18 },
  manualOverrideTimeoutSec: 0,
  centralHeaterOnDelaySec: 10,
  centralHeaterOffDelaySec: 120,
  sensorTimeoutSec: 600,
  sensorStuckSec: 0,
  minOffSec: 0,
  windowDetection: { enabled: true, slopeDetection: false, slopeThreshold: 0.5, recoverySec: 600 },
  motionGating: { enabled: false, absenceSec: 1800 }
};

function engine(zones: ZoneConfig[]): EngineConfig {
  return { pollIntervalSec: 30, commandTimeoutMs: 10000, stateSaveDelayMs: 2000, zones: zones };
}

function fields(issues: { field: string }[]): string[] {
  return issues.map(function(issue) {
    return issue.field;
  });
}

describe('validateZoneConfig', () => {
  it('should accept a valid zone without warnings', () => {
    const result = validateZoneConfig(validZone);
    expect(result.valid).toBe(true);
    expect(result.errors).toHaveLength(0);
    expect(result.warnings).toHaveLength(0);
  });

  describe('references', () => {
    it('should require heater and sensors', () => {
      const result = validateZoneConfig({ ...validZone, heater: '', tempSensor: ' ' });
      expect(result.valid).toBe(false);
      expect(fields(result.errors)).toEqual(['heater', 'tempSensor']);
    });

    it('should reject a central heater equal to the zone heater', () => {
      const result = validateZoneConfig({ ...validZone, centralHeater: 'switch.living_heater' });
      expect(fields(result.errors)).toEqual(['centralHeater']);
    });

    it('should reject an outdoor sensor equal to the zone sensor', () => {
      const result = validateZoneConfig({ ...validZone, outdoorSensor: 'sensor.living_temp' });
      expect(fields(result.errors)).toEqual(['outdoorSensor']);
    });
  });

  describe('targets', () => {
    it('should reject a preset outside the bounds', () => {
      const result = validateZoneConfig({ ...validZone, presets: { home: 31, sleep: 21, away: 18 } });
      expect(result.errors).toEqual([{
        level: 'CRITICAL',
        field: 'presets.home',
        message: 'presets.home must be between 5 and 30 (got 31)'
      }]);
    });

    it('should reject inverted bounds', () => {
      const result = validateZoneConfig({ ...validZone, minTemp: 25, maxTemp: 20 });
      expect(fields(result.errors)).toEqual(['maxTemp']);
    });

    it('should reject an excessive hysteresis', () => {
      const result = validateZoneConfig({ ...validZone, hysteresisHigh: 6 });
      expect(fields(result.errors)).toEqual(['hysteresisHigh']);
    });
  });

  describe('auto on/off', () => {
    it('should reject onTemp not below offTemp', () => {
      const result = validateZoneConfig({ ...validZone, autoOnOff: { enabled: true, onTemp: 18, offTemp: 18 } });
      expect(result.errors).toEqual([{
        level: 'CRITICAL',
        field: 'autoOnOff.onTemp',
        message: 'autoOnOff.onTemp must be lower than autoOnOff.offTemp (18 >= 18)'
      }]);
    });

    it('should ignore thresholds while disabled', () => {
      const result = validateZoneConfig({ ...validZone, autoOnOff: { enabled: false, onTemp: 30, offTemp: 0 } });
      expect(result.valid).toBe(true);
    });
  });

  describe('timing', () => {
    it('should reject negative delays', () => {
      const result = validateZoneConfig({ ...validZone, centralHeaterOnDelaySec: -1, centralHeaterOffDelaySec: -5 });
      expect(fields(result.errors)).toEqual(['centralHeaterOnDelaySec', 'centralHeaterOffDelaySec']);
    });

    it('should warn about delays outside the recommended range', () => {
      const result = validateZoneConfig({ ...validZone, centralHeaterOnDelaySec: 0, centralHeaterOffDelaySec: 600 });
      expect(result.valid).toBe(true);
      expect(fields(result.warnings)).toEqual(['centralHeaterOnDelaySec', 'centralHeaterOffDelaySec']);
    });
  });

  describe('safety', () => {
    it('should reject a zero sensor timeout', () => {
      const result = validateZoneConfig({ ...validZone, sensorTimeoutSec: 0 });
      expect(fields(result.errors)).toEqual(['sensorTimeoutSec']);
    });

    it('should require a motion sensor for motion gating', () => {
      const result = validateZoneConfig({ ...validZone, motionGating: { enabled: true, absenceSec: 1800 } });
      expect(result.errors[0].message).toBe('motionGating requires a motionSensor');
    });

    it('should warn when slope detection cannot run', () => {
      const result = validateZoneConfig({
        ...validZone,
        windowDetection: { enabled: false, slopeDetection: true, slopeThreshold: 0.5, recoverySec: 600 }
      });
      expect(result.valid).toBe(true);
      expect(fields(result.warnings)).toEqual(['windowDetection.slopeDetection']);
    });

    it('should reject a slope threshold below 0.5', () => {
      const result = validateZoneConfig({
        ...validZone,
        windowDetection: { enabled: true, slopeDetection: true, slopeThreshold: 0.2, recoverySec: 600 }
      });
      expect(fields(result.errors)).toEqual(['windowDetection.slopeThreshold']);
    });
  });
});

describe('validateEngineConfig', () => {
  it('should prefix zone issues with the zone id', () => {
    const result = validateEngineConfig(engine([{ ...validZone, heater: '' }]));
    expect(fields(result.errors)).toEqual(['zones.living.heater']);
  });

  it('should reject duplicate zone ids', () => {
    const result = validateEngineConfig(engine([validZone, { ...validZone, heater: 'switch.other' }]));
    expect(result.errors[0].message).toBe('Duplicate zone id living');
  });

  it('should reject a heater shared between zones', () => {
    const result = validateEngineConfig(engine([validZone, { ...validZone, id: 'office' }]));
    expect(result.valid).toBe(false);
    expect(fields(result.errors)).toEqual(['zones.office.heater']);
    expect(result.errors[0].message).toBe('heater switch.living_heater is already used by zone living');
  });

  it('should allow zones to share a central heater', () => {
    const office = { ...validZone, id: 'office', heater: 'switch.office_heater' };
    expect(validateEngineConfig(engine([validZone, office])).valid).toBe(true);
  });

  it('should warn when no zones are configured', () => {
    expect(fields(validateEngineConfig(engine([])).warnings)).toEqual(['zones']);
  });

  it('should reject a poll interval of zero', () => {
    const result = validateEngineConfig({ ...engine([validZone]), pollIntervalSec: 0 });
    expect(fields(result.errors)).toEqual(['pollIntervalSec']);
  });
});

describe('assertions', () => {
  it('should return warnings for a valid zone', () => {
    expect(assertValidZoneConfig({ ...validZone, minOffSec: 1200 })).toHaveLength(1);
  });

  it('should throw ConfigurationError carrying the errors', () => {
    let caught: unknown = null;
    try {
      assertValidZoneConfig({ ...validZone, autoOnOff: { enabled: true, onTemp: 20, offTemp: 15 } });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    if (caught instanceof ConfigurationError) {
      expect(caught.message).toBe(
        'Invalid configuration for zone living: autoOnOff.onTemp must be lower than autoOnOff.offTemp (20 >= 15)'
      );
      expect(fields(caught.issues)).toEqual(['autoOnOff.onTemp']);
    }
  });

  it('should throw for an invalid engine configuration', () => {
    expect(function() {
      assertValidEngineConfig({ ...engine([validZone]), commandTimeoutMs: 0 });
    }).toThrow(ConfigurationError);
  });
});

describe('validateZoneActuators', () => {
  const office: ZoneConfig = { ...validZone, id: 'office', heater: 'switch.office_heater' };

  it('should ignore the zone own entry', () => {
    expect(validateZoneActuators(validZone, [validZone, office])).toEqual([]);
  });

  it('should reject a heater that is another zone central heater', () => {
    const issues = validateZoneActuators({ ...office, heater: 'switch.boiler' }, [validZone]);
    expect(issues.map(function(issue) {
      return issue.message;
    })).toEqual(['heater switch.boiler is the central heater of zone living']);
  });

  it('should reject a central heater that is another zone heater', () => {
    const issues = validateZoneActuators({ ...office, centralHeater: 'switch.living_heater' }, [validZone]);
    expect(fields(issues)).toEqual(['centralHeater']);
    expect(issues[0].message).toBe('centralHeater switch.living_heater is the heater of zone living');
  });
});

describe('assertZoneFits', () => {
  it('should throw when the heater is taken', () => {
    expect(function() {
      assertZoneFits({ ...validZone, id: 'office' }, [validZone]);
    }).toThrow('Invalid configuration for zone office: heater switch.living_heater is already used by zone living');
  });

  it('should return warnings when the zone fits', () => {
    expect(assertZoneFits({ ...validZone, minOffSec: 1200 }, [validZone])).toHaveLength(1);
  });
});
