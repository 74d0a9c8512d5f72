/**
 * Unit tests for validation helper functions
 */

import {
  addError,
  addWarning,
  validateBoolean,
  validateRequiredString,
  validateOptionalString,
  validateNumberRange
} from './helpers';
import type { ValidationIssue } from './types';

describe('Validation Helpers', () => {
  // ═══════════════════════════════════════════════════════════════
  // addError() / addWarning()
  // ═══════════════════════════════════════════════════════════════

  describe('addError', () => {
    it('should add error with CRITICAL level', () => {
      const errors: ValidationIssue[] = [];

      addError(errors, 'hysteresisLow', 'Value out of range');

      expect(errors).toEqual([{ level: 'CRITICAL', field: 'hysteresisLow', message: 'Value out of range' }]);
    });

    it('should accumulate multiple errors', () => {
      const errors: ValidationIssue[] = [];

      addError(errors, 'heater', 'Error 1');
      addError(errors, 'tempSensor', 'Error 2');

      expect(errors.map(function(e) { return e.field; })).toEqual(['heater', 'tempSensor']);
    });
  });

  describe('addWarning', () => {
    it('should add warning with WARNING level', () => {
      const warnings: ValidationIssue[] = [];

      addWarning(warnings, 'minOffSec', 'Outside recommended range');

      expect(warnings).toEqual([{ level: 'WARNING', field: 'minOffSec', message: 'Outside recommended range' }]);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // validateBoolean()
  // ═══════════════════════════════════════════════════════════════

  describe('validateBoolean', () => {
    it('should accept true and false', () => {
      const errors: ValidationIssue[] = [];

      validateBoolean(true, 'autoOnOff.enabled', errors);
      validateBoolean(false, 'autoOnOff.enabled', errors);

      expect(errors).toHaveLength(0);
    });

    it('should add error for string value', () => {
      const errors: ValidationIssue[] = [];

      validateBoolean('true', 'autoOnOff.enabled', errors);

      expect(errors[0].message).toBe('autoOnOff.enabled must be a boolean (got string)');
    });

    it('should report null as object', () => {
      const errors: ValidationIssue[] = [];

      validateBoolean(null, 'motionGating.enabled', errors);

      expect(errors[0].message).toBe('motionGating.enabled must be a boolean (got object)');
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // validateRequiredString() / validateOptionalString()
  // ═══════════════════════════════════════════════════════════════

  describe('validateRequiredString', () => {
    it('should accept a non-empty reference', () => {
      const errors: ValidationIssue[] = [];

      validateRequiredString('switch.office_heater', 'heater', errors);

      expect(errors).toHaveLength(0);
    });

    it('should reject blank, missing and non-string values', () => {
      const errors: ValidationIssue[] = [];

      validateRequiredString('  ', 'heater', errors);
      validateRequiredString(undefined, 'tempSensor', errors);
      validateRequiredString(42, 'outdoorSensor', errors);

      expect(errors.map(function(e) { return e.message; })).toEqual([
        'heater is required',
        'tempSensor is required',
        'outdoorSensor is required'
      ]);
    });
  });

  describe('validateOptionalString', () => {
    it('should accept undefined and reject blank', () => {
      const errors: ValidationIssue[] = [];

      validateOptionalString(undefined, 'motionSensor', errors);
      validateOptionalString('', 'humiditySensor', errors);

      expect(errors).toEqual([{ level: 'CRITICAL', field: 'humiditySensor', message: 'humiditySensor is required' }]);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // validateNumberRange()
  // ═══════════════════════════════════════════════════════════════

  describe('validateNumberRange', () => {
    it('should skip undefined', () => {
      const errors: ValidationIssue[] = [];
      const warnings: ValidationIssue[] = [];

      validateNumberRange(undefined, 'minOffSec', 0, 3600, errors, warnings, 0, 900);

      expect(errors).toHaveLength(0);
      expect(warnings).toHaveLength(0);
    });

    it('should add error outside the critical range', () => {
      const errors: ValidationIssue[] = [];
      const warnings: ValidationIssue[] = [];

      validateNumberRange(700, 'centralHeaterOnDelaySec', 0, 600, errors, warnings, 5, 60);

      expect(errors).toEqual([{
        level: 'CRITICAL',
        field: 'centralHeaterOnDelaySec',
        message: 'centralHeaterOnDelaySec must be between 0 and 600 (got 700)'
      }]);
      expect(warnings).toHaveLength(0);
    });

    it('should reject NaN and Infinity', () => {
      const errors: ValidationIssue[] = [];
      const warnings: ValidationIssue[] = [];

      validateNumberRange(NaN, 'hysteresisLow', 0, 5, errors, warnings);
      validateNumberRange(Infinity, 'hysteresisHigh', 0, 5, errors, warnings);

      expect(errors).toHaveLength(2);
      expect(errors[0].message).toBe('hysteresisLow must be between 0 and 5 (got NaN)');
    });

    it('should warn outside the recommended range', () => {
      const errors: ValidationIssue[] = [];
      const warnings: ValidationIssue[] = [];

      validateNumberRange(2, 'centralHeaterOnDelaySec', 0, 600, errors, warnings, 5, 60);

      expect(errors).toHaveLength(0);
      expect(warnings).toEqual([{
        level: 'WARNING',
        field: 'centralHeaterOnDelaySec',
        message: 'centralHeaterOnDelaySec is outside recommended range 5-60 (got 2)'
      }]);
    });

    it('should accept the critical bounds themselves', () => {
      const errors: ValidationIssue[] = [];
      const warnings: ValidationIssue[] = [];

      validateNumberRange(0, 'minOffSec', 0, 3600, errors, warnings);
      validateNumberRange(3600, 'minOffSec', 0, 3600, errors, warnings);

      expect(errors).toHaveLength(0);
    });
  });
});
