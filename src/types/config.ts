/**
 * Type definitions for overlay configuration
 */

import type { LogLevel, LogLevels } from '@logging';

import type { DisplayStyle } from './common';

/**
 * Screen sampling block of the settings document
 */
export interface ScreenSamplingSettings {
  readonly enabled: boolean;
  /** Seconds between samples; also the minimum time between color changes */
  readonly update_interval: number;
  /** Minimum color distance that counts as a change */
  readonly throttle_threshold: number;
}

export type PositionMode = 'preset' | 'custom';

export type PositionPreset = 'center' | 'top' | 'bottom';

/**
 * User settings document (config.json)
 * Keys keep the on-disk snake_case spelling.
 */
export interface OverlaySettings {
  // ───────── APPEARANCE ─────────
  readonly color: string;
  readonly font_size: number;
  readonly opacity: number;
  readonly style: DisplayStyle;
  readonly background_color: string;

  // ───────── POSITION ─────────
  readonly position_mode: PositionMode;
  readonly position_preset: PositionPreset;
  readonly position_x: number;
  readonly position_y: number;

  // ───────── ADAPTIVE COLOR ─────────
  readonly screen_sampling: ScreenSamplingSettings;
}

/**
 * Application constants
 * Engine constants that should rarely change; some accept environment overrides
 */
export interface AppConstants {
  // ───────── LOGGING ─────────
  readonly LOG_LEVELS: LogLevels;
  readonly LOG_LEVEL: LogLevel;
  readonly LOG_AUTO_DEMOTE_HOURS: number;
  readonly LOG_FILE: string | null;

  // ───────── CONTROL CHANNEL ─────────
  readonly SOCKET_PATH: string;
  readonly SOCKET_MODE: number;
  readonly READ_TIMEOUT_MS: number;
  readonly MAX_COMMAND_BYTES: number;

  // ───────── SCHEDULER ─────────
  readonly TICK_INTERVAL_MS: number;

  // ───────── ALARM ─────────
  readonly ALARM_TIMEOUT_SEC: number;

  // ───────── SAMPLER ─────────
  readonly SAMPLER_COMMAND: string | null;
  readonly SAMPLER_ARGS: readonly string[];
  readonly SAMPLER_TIMEOUT_MS: number;
  readonly SAMPLER_MAX_FAILURES: number;
  readonly MIN_LUMINANCE_DELTA: number;

  // ───────── SETTINGS FILE ─────────
  readonly SETTINGS_PATH: string;
}
