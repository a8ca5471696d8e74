export interface FieldError {
  field: string;
  message: string;
  level?: string;
}

export interface FieldWarning {
  field: string;
  message: string;
  level?: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: FieldError[];
  warnings: FieldWarning[];
}

/**
 * Settings read from an untrusted document
 * Fields that failed validation hold their default value.
 */
export interface SettingsReadResult<T> extends ValidationResult {
  settings: T;
}
