/**
 * Alarm activation, safety timeout and intensity ramp
 */

import type { EpochMs } from '$types/common';
import { clamp } from '@utils/number';
import type { AlarmRequest, AlarmState } from './types';

export const INACTIVE_ALARM: AlarmState = { active: false };

const INTENSITY_RISE = 0.1;
const INTENSITY_FALL = 0.15;

/**
 * Activate an alarm. Replaces any active alarm, restarting its timeout.
 */
export function activateAlarm(request: AlarmRequest, nowMs: EpochMs): AlarmState {
  return {
    active: true,
    sourceClass: request.sourceClass,
    title: request.title,
    message: request.message,
    startedAt: nowMs
  };
}

/**
 * Check whether an active alarm has outlived the safety timeout
 *
 * @param alarm - Current alarm state
 * @param nowMs - Current time
 * @param timeoutMs - Safety timeout; 0 or less disables it
 * @returns True if the alarm must be auto-dismissed
 */
export function isAlarmExpired(alarm: AlarmState, nowMs: EpochMs, timeoutMs: number): boolean {
  if (!alarm.active || timeoutMs <= 0) {
    return false;
  }
  return nowMs - alarm.startedAt >= timeoutMs;
}

/**
 * Advance the alarm intensity by one animation step
 *
 * Rises while the alarm is active, fades out after dismissal.
 *
 * @example
 * stepAlarmIntensity(0.5, true)  // 0.6
 * stepAlarmIntensity(0.1, false) // 0
 */
export function stepAlarmIntensity(current: number, active: boolean): number {
  const next = active ? current + INTENSITY_RISE : current - INTENSITY_FALL;
  return Math.round(clamp(next, 0, 1) * 100) / 100;
}
