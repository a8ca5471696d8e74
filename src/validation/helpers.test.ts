/**
 * Unit tests for validation helper functions
 */

import {
  addError,
  addWarning,
  validateBoolean,
  validateHexColor,
  validateOneOf,
  validateNumberRange,
  validateIntegerRange
} from './helpers';
import type { FieldError, FieldWarning } from './types';

describe('Validation Helpers', () => {
  let errors: FieldError[];
  let warnings: FieldWarning[];

  beforeEach(() => {
    errors = [];
    warnings = [];
  });

  describe('addError / addWarning', () => {
    it('should tag errors as CRITICAL', () => {
      addError(errors, 'opacity', 'Value out of range');
      expect(errors[0]).toEqual({ level: 'CRITICAL', field: 'opacity', message: 'Value out of range' });
    });

    it('should tag warnings as WARNING', () => {
      addWarning(warnings, 'font_size', 'Large');
      expect(warnings[0]).toEqual({ level: 'WARNING', field: 'font_size', message: 'Large' });
    });
  });

  describe('validateBoolean', () => {
    it('should accept booleans', () => {
      expect(validateBoolean(false, 'enabled', errors)).toBe(true);
      expect(errors).toHaveLength(0);
    });

    it('should reject strings', () => {
      expect(validateBoolean('true', 'enabled', errors)).toBe(false);
      expect(errors[0].message).toBe('enabled must be a boolean (got string)');
    });
  });

  describe('validateHexColor', () => {
    it('should accept #rrggbb in either case', () => {
      expect(validateHexColor('#A0b1C2', 'color', errors)).toBe(true);
    });

    it('should reject short and named colors', () => {
      expect(validateHexColor('#fff', 'color', errors)).toBe(false);
      expect(validateHexColor('red', 'color', errors)).toBe(false);
      expect(errors[1].message).toBe('color must be a #rrggbb color (got "red")');
    });
  });

  describe('validateOneOf', () => {
    it('should accept listed values', () => {
      expect(validateOneOf('custom', 'position_mode', ['preset', 'custom'], errors)).toBe(true);
    });

    it('should list the allowed values on rejection', () => {
      expect(validateOneOf('auto', 'position_mode', ['preset', 'custom'], errors)).toBe(false);
      expect(errors[0].message).toBe('position_mode must be one of preset, custom (got "auto")');
    });
  });

  describe('validateNumberRange', () => {
    it('should accept values inside both ranges without warnings', () => {
      expect(validateNumberRange(0.5, 'opacity', 0, 1, errors, warnings, 0.2, 1)).toBe(true);
      expect(errors).toHaveLength(0);
      expect(warnings).toHaveLength(0);
    });

    it('should warn outside the recommended range', () => {
      expect(validateNumberRange(0.1, 'opacity', 0, 1, errors, warnings, 0.2, 1)).toBe(true);
      expect(warnings[0].message).toBe('opacity is outside recommended range 0.2-1 (got 0.1)');
    });

    it('should reject values outside the critical range', () => {
      expect(validateNumberRange(1.5, 'opacity', 0, 1, errors, warnings)).toBe(false);
      expect(errors[0].message).toBe('opacity must be between 0 and 1 (got 1.5)');
    });

    it('should reject NaN and non-numbers', () => {
      expect(validateNumberRange(NaN, 'opacity', 0, 1, errors, warnings)).toBe(false);
      expect(validateNumberRange('0.5', 'opacity', 0, 1, errors, warnings)).toBe(false);
      expect(errors).toHaveLength(2);
    });
  });

  describe('validateIntegerRange', () => {
    it('should reject fractional values before checking range', () => {
      expect(validateIntegerRange(12.5, 'font_size', 8, 400, errors, warnings)).toBe(false);
      expect(errors[0].message).toBe('font_size must be an integer (got 12.5)');
    });

    it('should accept integers in range', () => {
      expect(validateIntegerRange(78, 'font_size', 8, 400, errors, warnings, 24, 200)).toBe(true);
    });
  });
});
