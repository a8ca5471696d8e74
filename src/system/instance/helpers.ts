/**
 * Overlay instance helpers
 */

import type { OverlaySettings } from '$types/config';
import { BLACK, WHITE, parseHexColor, toHex } from '@core/color';
import type { ColorEngineReload, EffectiveColor, SamplingStatus } from '@core/color';
import type { DisplayView } from '@core/display-state';
import { formatHms } from '@utils/time';
import type { AnimationCadence, StatusPayload } from './types';

/**
 * Animation intervals (ms) of the default cadence
 */
export const CADENCE_MS = {
  LIGHTBULB: 50,
  ALARM: 100,
  DEADLINE: 333
} as const;

/**
 * Default animation cadence. The fastest applicable interval wins.
 */
export const DEFAULT_CADENCE: AnimationCadence = function(input) {
  const intervals: number[] = [];
  if (input.style === 'lightbulb') {
    intervals.push(CADENCE_MS.LIGHTBULB);
  }
  if (input.alarmActive || input.alarmIntensity > 0) {
    intervals.push(CADENCE_MS.ALARM);
  }
  if (input.mode === 'deadline') {
    intervals.push(CADENCE_MS.DEADLINE);
  }
  return intervals.length > 0 ? Math.min(...intervals) : null;
};

/**
 * Color engine values carried by a settings document
 */
export function engineValuesFrom(settings: OverlaySettings): ColorEngineReload {
  return {
    baseColor: parseHexColor(settings.color) ?? WHITE,
    backgroundColor: parseHexColor(settings.background_color) ?? BLACK,
    updateIntervalMs: settings.screen_sampling.update_interval * 1000,
    throttleThreshold: settings.screen_sampling.throttle_threshold
  };
}

/**
 * Compose the `status` payload from mode, alarm and color state
 */
export function buildStatus(
  view: DisplayView,
  color: EffectiveColor,
  sampling: SamplingStatus,
  settings: OverlaySettings
): StatusPayload {
  const payload: StatusPayload = {
    mode: view.mode,
    alarm: view.alarm.active,
    urgency: view.urgency,
    finished: view.finished,
    color: toHex(color.rgb),
    sampling,
    config: {
      color: settings.color,
      font_size: settings.font_size,
      opacity: settings.opacity,
      style: settings.style,
      position_mode: settings.position_mode,
      position_preset: settings.position_preset
    }
  };

  if (view.alarm.active) {
    payload.alarm_message = view.alarm.message;
    payload.alarm_class = view.alarm.sourceClass;
    payload.alarm_title = view.alarm.title;
  }
  if (view.remainingMs !== null) {
    payload.remaining = formatHms(view.remainingMs);
  }
  return payload;
}
