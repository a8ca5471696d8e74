/**
 * Validation helper functions
 * Reusable utilities for settings validation. Each validator appends to the
 * error/warning lists and returns whether the value may be used.
 */

import { isFiniteNumber, isInteger } from '@utils/number';

import type { FieldError, FieldWarning } from './types';

const HEX_COLOR_PATTERN = /^#[0-9a-fA-F]{6}$/;

// ═══════════════════════════════════════════════════════════════
// ERROR AND WARNING BUILDERS
// ═══════════════════════════════════════════════════════════════

/**
 * Add a critical error to the errors list
 * @param errors - Array to append the error to
 * @param field - Field name that failed validation
 * @param message - Human-readable error message
 */
export function addError(errors: FieldError[], field: string, message: string): void {
  errors.push({ level: 'CRITICAL', field: field, message: message });
}

/**
 * Add a warning to the warnings list
 * @param warnings - Array to append the warning to
 * @param field - Field name with sub-optimal value
 * @param message - Human-readable warning message
 */
export function addWarning(warnings: FieldWarning[], field: string, message: string): void {
  warnings.push({ level: 'WARNING', field: field, message: message });
}

// ═══════════════════════════════════════════════════════════════
// TYPE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Validate that a value is a boolean
 */
export function validateBoolean(value: unknown, field: string, errors: FieldError[]): value is boolean {
  if (typeof value !== 'boolean') {
    addError(errors, field, `${field} must be a boolean (got ${typeof value})`);
    return false;
  }
  return true;
}

/**
 * Validate a #rrggbb color string
 */
export function validateHexColor(value: unknown, field: string, errors: FieldError[]): value is string {
  if (typeof value !== 'string' || !HEX_COLOR_PATTERN.test(value)) {
    addError(errors, field, `${field} must be a #rrggbb color (got ${JSON.stringify(value)})`);
    return false;
  }
  return true;
}

/**
 * Validate that a value is one of a fixed set of strings
 */
export function validateOneOf<T extends string>(
  value: unknown,
  field: string,
  allowed: readonly T[],
  errors: FieldError[]
): value is T {
  for (const option of allowed) {
    if (value === option) return true;
  }
  addError(errors, field, `${field} must be one of ${allowed.join(', ')} (got ${JSON.stringify(value)})`);
  return false;
}

// ═══════════════════════════════════════════════════════════════
// RANGE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Validate a number against critical and recommended ranges
 *
 * Critical range violations produce errors (value rejected)
 * Recommended range violations produce warnings (value accepted)
 *
 * @param value - Value to validate
 * @param field - Field name for error messages
 * @param criticalMin - Minimum acceptable value (hard limit)
 * @param criticalMax - Maximum acceptable value (hard limit)
 * @param errors - Array to append errors to
 * @param warnings - Array to append warnings to
 * @param recommendedMin - Recommended minimum value (optional)
 * @param recommendedMax - Recommended maximum value (optional)
 */
export function validateNumberRange(
  value: unknown,
  field: string,
  criticalMin: number,
  criticalMax: number,
  errors: FieldError[],
  warnings: FieldWarning[],
  recommendedMin?: number,
  recommendedMax?: number
): value is number {
  if (!isFiniteNumber(value) || value < criticalMin || value > criticalMax) {
    addError(
      errors,
      field,
      `${field} must be between ${criticalMin} and ${criticalMax} (got ${String(value)})`
    );
    return false;
  }

  if (recommendedMin !== undefined && recommendedMax !== undefined) {
    if (value < recommendedMin || value > recommendedMax) {
      addWarning(
        warnings,
        field,
        `${field} is outside recommended range ${recommendedMin}-${recommendedMax} (got ${value})`
      );
    }
  }
  return true;
}

/**
 * Validate an integer against critical and recommended ranges
 * First checks that the value is an integer, then validates ranges
 */
export function validateIntegerRange(
  value: unknown,
  field: string,
  criticalMin: number,
  criticalMax: number,
  errors: FieldError[],
  warnings: FieldWarning[],
  recommendedMin?: number,
  recommendedMax?: number
): value is number {
  if (!isInteger(value)) {
    addError(errors, field, `${field} must be an integer (got ${String(value)})`);
    return false;
  }

  return validateNumberRange(
    value,
    field,
    criticalMin,
    criticalMax,
    errors,
    warnings,
    recommendedMin,
    recommendedMax
  );
}
