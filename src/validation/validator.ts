/**
 * Zone and engine configuration validation
 *
 * Errors reject the configuration; warnings are logged and accepted.
 */

import { ConfigurationError } from '$types/errors';
import { isPresetName, PRESET_NAMES } from '@core/presets';
import {
  addError,
  addWarning,
  validateBoolean,
  validateRequiredString,
  validateOptionalString,
  validateNumberRange
} from './helpers';

import type { ZoneConfig, EngineConfig } from '$types/config';
import type { ValidationIssue, ValidationResult } from './types';

function result(errors: ValidationIssue[], warnings: ValidationIssue[]): ValidationResult {
  return { valid: errors.length === 0, errors: errors, warnings: warnings };
}

// ═══════════════════════════════════════════════════════════════
// ZONE
// ═══════════════════════════════════════════════════════════════

function validateReferences(config: ZoneConfig, errors: ValidationIssue[]): void {
  validateRequiredString(config.id, 'id', errors);
  validateRequiredString(config.name, 'name', errors);
  validateRequiredString(config.heater, 'heater', errors);
  validateRequiredString(config.tempSensor, 'tempSensor', errors);
  validateRequiredString(config.outdoorSensor, 'outdoorSensor', errors);
  validateOptionalString(config.centralHeater, 'centralHeater', errors);
  validateOptionalString(config.backupOutdoorSensor, 'backupOutdoorSensor', errors);
  validateOptionalString(config.weatherEntity, 'weatherEntity', errors);
  validateOptionalString(config.humiditySensor, 'humiditySensor', errors);
  validateOptionalString(config.doorWindowSensor, 'doorWindowSensor', errors);
  validateOptionalString(config.motionSensor, 'motionSensor', errors);

  if (config.centralHeater !== undefined && config.centralHeater === config.heater) {
    addError(errors, 'centralHeater', 'centralHeater must differ from heater');
  }
  if (config.tempSensor === config.outdoorSensor) {
    addError(errors, 'outdoorSensor', 'outdoorSensor must differ from tempSensor');
  }
}

function validateTargets(config: ZoneConfig, errors: ValidationIssue[], warnings: ValidationIssue[]): void {
  validateNumberRange(config.minTemp, 'minTemp', -10, 40, errors, warnings, 5, 16);
  validateNumberRange(config.maxTemp, 'maxTemp', -10, 40, errors, warnings, 20, 32);
  if (config.minTemp >= config.maxTemp) {
    addError(errors, 'maxTemp', `maxTemp must be greater than minTemp (${config.minTemp} >= ${config.maxTemp})`);
    return;
  }

  for (const name of PRESET_NAMES) {
    const value = config.presets[name];
    const field = 'presets.' + name;
    if (typeof value !== 'number' || !isFinite(value) || value < config.minTemp || value > config.maxTemp) {
      addError(errors, field, `${field} must be between ${config.minTemp} and ${config.maxTemp} (got ${value})`);
    }
  }

  if (!isPresetName(config.initialPreset)) {
    addError(errors, 'initialPreset', `initialPreset must be one of ${PRESET_NAMES.join(', ')} (got ${config.initialPreset})`);
  }

  validateNumberRange(config.hysteresisLow, 'hysteresisLow', 0, 5, errors, warnings, 0.1, 1);
  validateNumberRange(config.hysteresisHigh, 'hysteresisHigh', 0, 5, errors, warnings, 0.1, 1);
}

function validateAutoOnOff(config: ZoneConfig, errors: ValidationIssue[], warnings: ValidationIssue[]): void {
  const auto = config.autoOnOff;
  validateBoolean(auto.enabled, 'autoOnOff.enabled', errors);
  if (!auto.enabled) {
    return;
  }

  validateNumberRange(auto.onTemp, 'autoOnOff.onTemp', -10, 25, errors, warnings);
  validateNumberRange(auto.offTemp, 'autoOnOff.offTemp', 10, 35, errors, warnings);
  if (auto.onTemp >= auto.offTemp) {
    addError(
      errors,
      'autoOnOff.onTemp',
      `autoOnOff.onTemp must be lower than autoOnOff.offTemp (${auto.onTemp} >= ${auto.offTemp})`
    );
  }
}

function validateTiming(config: ZoneConfig, errors: ValidationIssue[], warnings: ValidationIssue[]): void {
  validateNumberRange(config.centralHeaterOnDelaySec, 'centralHeaterOnDelaySec', 0, 600, errors, warnings, 5, 60);
  validateNumberRange(config.centralHeaterOffDelaySec, 'centralHeaterOffDelaySec', 0, 1800, errors, warnings, 30, 300);
  validateNumberRange(config.manualOverrideTimeoutSec, 'manualOverrideTimeoutSec', 0, 604800, errors, warnings);
  validateNumberRange(config.minOffSec, 'minOffSec', 0, 3600, errors, warnings, 0, 900);
}

function validateSafety(config: ZoneConfig, errors: ValidationIssue[], warnings: ValidationIssue[]): void {
  validateNumberRange(config.sensorTimeoutSec, 'sensorTimeoutSec', 1, 86400, errors, warnings, 60, 1800);
  validateNumberRange(config.sensorStuckSec, 'sensorStuckSec', 0, 86400, errors, warnings);

  const window = config.windowDetection;
  validateBoolean(window.enabled, 'windowDetection.enabled', errors);
  validateBoolean(window.slopeDetection, 'windowDetection.slopeDetection', errors);
  validateNumberRange(window.slopeThreshold, 'windowDetection.slopeThreshold', 0.5, 10, errors, warnings);
  validateNumberRange(window.recoverySec, 'windowDetection.recoverySec', 0, 7200, errors, warnings);
  if (window.slopeDetection && !window.enabled) {
    addWarning(warnings, 'windowDetection.slopeDetection', 'slopeDetection has no effect while windowDetection is disabled');
  }

  const motion = config.motionGating;
  validateBoolean(motion.enabled, 'motionGating.enabled', errors);
  validateNumberRange(motion.absenceSec, 'motionGating.absenceSec', 60, 86400, errors, warnings);
  if (motion.enabled && config.motionSensor === undefined) {
    addError(errors, 'motionGating.enabled', 'motionGating requires a motionSensor');
  }
}

/**
 * Validate one zone configuration
 */
export function validateZoneConfig(config: ZoneConfig): ValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  validateReferences(config, errors);
  validateTargets(config, errors, warnings);
  validateAutoOnOff(config, errors, warnings);
  validateTiming(config, errors, warnings);
  validateSafety(config, errors, warnings);

  return result(errors, warnings);
}

// ═══════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════

/**
 * Actuator conflicts between a zone and the other zones of an engine
 * A zone heater belongs to one zone and is never a central heater
 */
export function validateZoneActuators(config: ZoneConfig, others: Iterable<ZoneConfig>): ValidationIssue[] {
  const errors: ValidationIssue[] = [];
  for (const other of others) {
    if (other.id === config.id) {
      continue;
    }
    if (other.heater === config.heater) {
      addError(errors, 'heater', `heater ${config.heater} is already used by zone ${other.id}`);
    }
    if (other.centralHeater === config.heater) {
      addError(errors, 'heater', `heater ${config.heater} is the central heater of zone ${other.id}`);
    }
    if (config.centralHeater !== undefined && config.centralHeater === other.heater) {
      addError(errors, 'centralHeater', `centralHeater ${config.centralHeater} is the heater of zone ${other.id}`);
    }
  }
  return errors;
}

function prefixed(issues: ValidationIssue[], prefix: string): ValidationIssue[] {
  return issues.map(function(issue) {
    return { level: issue.level, field: prefix + issue.field, message: issue.message };
  });
}

/**
 * Validate engine settings and every zone
 * Zone fields are reported as zones.<id>.<field>
 */
export function validateEngineConfig(config: EngineConfig): ValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  validateNumberRange(config.pollIntervalSec, 'pollIntervalSec', 1, 3600, errors, warnings, 10, 120);
  validateNumberRange(config.commandTimeoutMs, 'commandTimeoutMs', 100, 60000, errors, warnings);
  validateNumberRange(config.stateSaveDelayMs, 'stateSaveDelayMs', 0, 60000, errors, warnings);

  if (config.zones.length === 0) {
    addWarning(warnings, 'zones', 'No zones configured');
  }

  const seen = new Set<string>();
  const accepted: ZoneConfig[] = [];
  for (const zone of config.zones) {
    if (seen.has(zone.id)) {
      addError(errors, 'zones', `Duplicate zone id ${zone.id}`);
      continue;
    }
    seen.add(zone.id);

    const zoneResult = validateZoneConfig(zone);
    errors.push(...prefixed(zoneResult.errors, 'zones.' + zone.id + '.'));
    warnings.push(...prefixed(zoneResult.warnings, 'zones.' + zone.id + '.'));
    errors.push(...prefixed(validateZoneActuators(zone, accepted), 'zones.' + zone.id + '.'));
    accepted.push(zone);
  }

  return result(errors, warnings);
}

// ═══════════════════════════════════════════════════════════════
// ASSERTIONS
// ═══════════════════════════════════════════════════════════════

function describeErrors(errors: ValidationIssue[]): string {
  return errors
    .map(function(issue) {
      return issue.message;
    })
    .join("; ");
}

/**
 * Validate a zone and throw on errors
 * @returns The warnings, for the caller to log
 * @throws {ConfigurationError}
 */
export function assertValidZoneConfig(config: ZoneConfig): ValidationIssue[] {
  const checked = validateZoneConfig(config);
  if (!checked.valid) {
    throw new ConfigurationError(
      "Invalid configuration for zone " + config.id + ": " + describeErrors(checked.errors),
      checked.errors
    );
  }
  return checked.warnings;
}

/**
 * Validate a zone joining running zones, or replacing its own entry among them
 * @returns The warnings, for the caller to log
 * @throws {ConfigurationError}
 */
export function assertZoneFits(config: ZoneConfig, others: Iterable<ZoneConfig>): ValidationIssue[] {
  const warnings = assertValidZoneConfig(config);
  const conflicts = validateZoneActuators(config, others);
  if (conflicts.length > 0) {
    throw new ConfigurationError(
      "Invalid configuration for zone " + config.id + ": " + describeErrors(conflicts),
      conflicts
    );
  }
  return warnings;
}

/**
 * Validate the engine configuration and throw on errors
 * @returns The warnings, for the caller to log
 * @throws {ConfigurationError}
 */
export function assertValidEngineConfig(config: EngineConfig): ValidationIssue[] {
  const checked = validateEngineConfig(config);
  if (!checked.valid) {
    throw new ConfigurationError("Invalid engine configuration: " + describeErrors(checked.errors), checked.errors);
  }
  return checked.warnings;
}
