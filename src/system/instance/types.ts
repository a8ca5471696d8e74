/**
 * Overlay instance type definitions
 *
 * One instance drives one render target (one per monitor).
 */

import type { DisplayMode, DisplayStyle, Rgb } from '$types/common';
import type { OverlaySettings, PositionMode, PositionPreset } from '$types/config';
import type { AlarmRequest, AlarmState } from '@core/alarm';
import type { SamplingStatus, ToggleResult } from '@core/color';
import type { Clock, ScreenSampler, TimerAPI } from '@core/scheduler';
import type { Logger } from '@logging';

/**
 * Source of the settings document
 */
export interface SettingsSource {
  /**
   * Load the current settings
   * @throws When the document is unreadable or invalid
   */
  load: () => Promise<OverlaySettings>;
}

/**
 * Inputs that decide the animation cadence
 */
export interface CadenceInput {
  mode: DisplayMode;
  style: DisplayStyle;
  alarmActive: boolean;
  alarmIntensity: number;
}

/**
 * Maps the current look to an animation interval in ms, null for none
 */
export type AnimationCadence = (input: CadenceInput) => number | null;

/**
 * Instance configuration
 */
export interface InstanceConfig {
  id: number;
  settings: OverlaySettings;

  /** Explicit color; disables adaptive sampling for the lifetime of the instance */
  fixedColor: Rgb | null;

  tickIntervalMs: number;
  alarmTimeoutMs: number;
  samplerTimeoutMs: number;
  maxSamplerFailures: number;
  minLuminanceDelta: number;
}

/**
 * Instance collaborators
 */
export interface InstanceDependencies {
  sampler: ScreenSampler;
  settingsSource: SettingsSource;
  logger: Logger;
  timers: TimerAPI;
  clock: Clock;
  cadence?: AnimationCadence;
}

/**
 * `status` reply payload
 */
export interface StatusPayload {
  mode: DisplayMode;
  alarm: boolean;
  alarm_message?: string;
  alarm_class?: string;
  alarm_title?: string;
  remaining?: string;
  urgency: number;
  finished: boolean;
  color: string;
  sampling: SamplingStatus;
  config: {
    color: string;
    font_size: number;
    opacity: number;
    style: DisplayStyle;
    position_mode: PositionMode;
    position_preset: PositionPreset;
  };
}

/**
 * Read-only frame state pulled by the renderer
 */
export interface RenderSnapshot {
  mode: DisplayMode;
  remaining: string | null;
  urgency: number;
  finished: boolean;
  alarm: AlarmState;
  color: string;
  animationPhase: number;
  alarmIntensity: number;
}

export interface ReloadResult {
  color: string;
  style: DisplayStyle;
}

export interface AlarmAck {
  alarm: boolean;
  message?: string;
}

/**
 * One running overlay
 */
export interface OverlayInstance {
  readonly id: number;

  /**
   * Enter a display mode
   * @throws {InvalidDurationError} State is left unchanged
   */
  enterMode: (mode: DisplayMode, duration: string | null) => void;

  /** Install the periodic jobs */
  start: () => void;

  /** Cancel every job and the sampler; idempotent */
  stop: () => void;

  reloadConfig: () => Promise<ReloadResult>;
  status: () => StatusPayload;
  triggerAlarm: (request: AlarmRequest) => AlarmAck;
  dismissAlarm: () => AlarmAck;
  resetDeadline: () => { mode: DisplayMode };
  toggleSampling: () => ToggleResult;
  snapshot: () => RenderSnapshot;
}
