export { readSettings } from './validator';
export {
  addError,
  addWarning,
  validateBoolean,
  validateHexColor,
  validateOneOf,
  validateNumberRange,
  validateIntegerRange
} from './helpers';
export type { FieldError, FieldWarning, ValidationResult, SettingsReadResult } from './types';
