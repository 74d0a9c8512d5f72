export {
  validateZoneConfig,
  validateEngineConfig,
  assertValidZoneConfig,
  assertValidEngineConfig,
  validateZoneActuators,
  assertZoneFits
} from './validator';
export {
  addError,
  addWarning,
  validateBoolean,
  validateRequiredString,
  validateOptionalString,
  validateNumberRange
} from './helpers';
export type { ValidationLevel, ValidationIssue, ValidationResult } from './types';
