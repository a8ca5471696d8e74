/**
 * Settings document validator
 *
 * Reads an untrusted, already-parsed settings document over a set of defaults.
 * Missing keys take their default silently; present keys that fail validation
 * are reported and also fall back to the default, so the returned settings are
 * always complete. `valid` is false when any error was reported.
 */

import type { OverlaySettings, PositionMode, PositionPreset, ScreenSamplingSettings } from '$types/config';
import type { DisplayStyle } from '$types/common';

import {
  addError,
  addWarning,
  validateBoolean,
  validateHexColor,
  validateIntegerRange,
  validateNumberRange,
  validateOneOf
} from './helpers';
import type { FieldError, FieldWarning, SettingsReadResult } from './types';

const STYLES: readonly DisplayStyle[] = ['normal', 'bordered', 'lightbulb'];
const POSITION_MODES: readonly PositionMode[] = ['preset', 'custom'];
const POSITION_PRESETS: readonly PositionPreset[] = ['center', 'top', 'bottom'];

const KNOWN_KEYS = [
  'color', 'font_size', 'opacity', 'style', 'background_color',
  'position_mode', 'position_preset', 'position_x', 'position_y', 'screen_sampling'
];
const KNOWN_SAMPLING_KEYS = ['enabled', 'update_interval', 'throttle_threshold'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pick<T>(source: Record<string, unknown>, key: string, fallback: T, check: (value: unknown) => value is T): T {
  const value = source[key];
  if (value === undefined) {
    return fallback;
  }
  return check(value) ? value : fallback;
}

function warnUnknownKeys(source: Record<string, unknown>, known: string[], prefix: string, warnings: FieldWarning[]): void {
  for (const key of Object.keys(source)) {
    // Underscore keys are comments ("_comment", "_docs")
    if (key.charAt(0) !== '_' && known.indexOf(key) === -1) {
      addWarning(warnings, prefix + key, 'Unknown setting ignored');
    }
  }
}

function readSampling(
  raw: unknown,
  defaults: ScreenSamplingSettings,
  errors: FieldError[],
  warnings: FieldWarning[]
): ScreenSamplingSettings {
  if (raw === undefined) {
    return defaults;
  }
  if (!isRecord(raw)) {
    addError(errors, 'screen_sampling', 'screen_sampling must be an object');
    return defaults;
  }
  warnUnknownKeys(raw, KNOWN_SAMPLING_KEYS, 'screen_sampling.', warnings);

  return {
    enabled: pick(raw, 'enabled', defaults.enabled, (v): v is boolean =>
      validateBoolean(v, 'screen_sampling.enabled', errors)),
    update_interval: pick(raw, 'update_interval', defaults.update_interval, (v): v is number =>
      validateNumberRange(v, 'screen_sampling.update_interval', 0.1, 60, errors, warnings, 0.25, 5)),
    throttle_threshold: pick(raw, 'throttle_threshold', defaults.throttle_threshold, (v): v is number =>
      validateNumberRange(v, 'screen_sampling.throttle_threshold', 0, 765, errors, warnings, 5, 100))
  };
}

/**
 * Read and validate a settings document
 *
 * @param raw - Parsed JSON document
 * @param defaults - Complete default settings
 * @returns Complete settings plus the validation report
 *
 * @example
 * ```typescript
 * const read = readSettings(JSON.parse(text), DEFAULT_SETTINGS);
 * if (!read.valid) {
 *   read.errors.forEach(function(err) { logger.warning(err.field + ': ' + err.message); });
 * }
 * ```
 */
export function readSettings(raw: unknown, defaults: OverlaySettings): SettingsReadResult<OverlaySettings> {
  const errors: FieldError[] = [];
  const warnings: FieldWarning[] = [];

  if (!isRecord(raw)) {
    addError(errors, 'settings', 'Settings document must be a JSON object');
    return { valid: false, errors: errors, warnings: warnings, settings: defaults };
  }
  warnUnknownKeys(raw, KNOWN_KEYS, '', warnings);

  const settings: OverlaySettings = {
    color: pick(raw, 'color', defaults.color, (v): v is string =>
      validateHexColor(v, 'color', errors)),
    font_size: pick(raw, 'font_size', defaults.font_size, (v): v is number =>
      validateIntegerRange(v, 'font_size', 8, 400, errors, warnings, 24, 200)),
    opacity: pick(raw, 'opacity', defaults.opacity, (v): v is number =>
      validateNumberRange(v, 'opacity', 0, 1, errors, warnings, 0.2, 1)),
    style: pick(raw, 'style', defaults.style, (v): v is DisplayStyle =>
      validateOneOf(v, 'style', STYLES, errors)),
    background_color: pick(raw, 'background_color', defaults.background_color, (v): v is string =>
      validateHexColor(v, 'background_color', errors)),
    position_mode: pick(raw, 'position_mode', defaults.position_mode, (v): v is PositionMode =>
      validateOneOf(v, 'position_mode', POSITION_MODES, errors)),
    position_preset: pick(raw, 'position_preset', defaults.position_preset, (v): v is PositionPreset =>
      validateOneOf(v, 'position_preset', POSITION_PRESETS, errors)),
    position_x: pick(raw, 'position_x', defaults.position_x, (v): v is number =>
      validateIntegerRange(v, 'position_x', 0, 100000, errors, warnings)),
    position_y: pick(raw, 'position_y', defaults.position_y, (v): v is number =>
      validateIntegerRange(v, 'position_y', 0, 100000, errors, warnings)),
    screen_sampling: readSampling(raw.screen_sampling, defaults.screen_sampling, errors, warnings)
  };

  return {
    valid: errors.length === 0,
    errors: errors,
    warnings: warnings,
    settings: settings
  };
}
