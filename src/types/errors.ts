/**
 * Error types for the heating controller
 * Configuration, command and sensor failures
 */

/**
 * Single configuration problem
 */
export interface ConfigIssue {
  field: string;
  message: string;
}

/**
 * Base validation error for all modules
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Zone or engine configuration rejected at setup or reconfiguration
 */
export class ConfigurationError extends ValidationError {
  readonly issues: ConfigIssue[];

  constructor(message: string, issues: ConfigIssue[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * SetPreset with a name missing from the zone's preset table
 */
export class InvalidPresetError extends ValidationError {
  readonly preset: string;

  constructor(preset: string) {
    super("Unknown preset '" + preset + "'");
    this.name = 'InvalidPresetError';
    this.preset = preset;
  }
}

/**
 * SetTarget outside the zone's bounds, or not a finite number
 */
export class InvalidTemperatureError extends ValidationError {
  readonly temperature: number;

  constructor(temperature: number, minTemp: number, maxTemp: number) {
    super("Target temperature must be between " + minTemp + " and " + maxTemp + ", got " + temperature);
    this.name = 'InvalidTemperatureError';
    this.temperature = temperature;
  }
}

/**
 * Command addressed to a zone id the engine does not know
 */
export class ZoneNotFoundError extends Error {
  readonly zoneId: string;

  constructor(zoneId: string) {
    super("Zone '" + zoneId + "' is not configured");
    this.name = 'ZoneNotFoundError';
    this.zoneId = zoneId;
  }
}

/**
 * Temperature sensor has had no valid reading for longer than its timeout
 * Raised inside zone evaluation and handled there by degrading to IDLE
 */
export class SensorUnavailableError extends Error {
  readonly entityId: string;
  readonly silentSec: number;

  constructor(entityId: string, silentSec: number) {
    super("Sensor " + entityId + " has no valid reading for " + Math.round(silentSec) + "s");
    this.name = 'SensorUnavailableError';
    this.entityId = entityId;
    this.silentSec = silentSec;
  }
}

/**
 * Actuator port call failed or timed out
 */
export class ActuatorCommandError extends Error {
  readonly ref: string;

  constructor(ref: string, message: string) {
    super(message);
    this.name = 'ActuatorCommandError';
    this.ref = ref;
  }
}
