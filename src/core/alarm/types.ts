/**
 * Alarm overlay type definitions
 *
 * The alarm is orthogonal to the display mode: it is layered on top of
 * whatever mode is active and never replaces it.
 */

import type { EpochMs } from '$types/common';

/**
 * Fields carried by an alarm request
 */
export interface AlarmRequest {
  /** Source class of the alarm (e.g. "Work", "deadline") */
  sourceClass: string;
  title: string;
  message: string;
}

/**
 * Active alarm with its activation time
 */
export interface ActiveAlarm extends AlarmRequest {
  active: true;
  startedAt: EpochMs;
}

export type AlarmState = { active: false } | ActiveAlarm;
