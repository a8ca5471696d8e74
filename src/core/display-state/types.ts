/**
 * Display state machine type definitions
 */

import type { DisplayMode, EpochMs } from '$types/common';
import type { AlarmRequest, AlarmState } from '@core/alarm';

/**
 * Mutable state owned by one state machine
 */
export interface DisplayState {
  mode: DisplayMode;

  /** Absolute target for countdown/midnight/deadline, null in clock mode */
  target: EpochMs | null;

  /** Milliseconds left as of the last tick, null in clock mode */
  remainingMs: number | null;

  /** True once remaining reached zero; cleared only by a reset */
  finished: boolean;

  /** Deadline expiry alarm already raised for the current target */
  expiryAlarmRaised: boolean;

  alarm: AlarmState;
}

/**
 * State machine configuration
 */
export interface StateMachineConfig {
  /** Auto-dismiss delay for an active alarm */
  alarmTimeoutMs: number;

  /** Alarm raised when a deadline reaches zero */
  expiryAlarm: AlarmRequest;
}

/**
 * What a tick changed
 */
export interface TickResult {
  /** Remaining time reached zero on this tick */
  finishedNow: boolean;

  /** An active alarm was auto-dismissed on this tick */
  alarmTimedOut: boolean;

  /** The deadline expiry alarm was raised on this tick */
  expiryAlarmRaised: boolean;
}

/**
 * Read-only view composed from mode and alarm
 */
export interface DisplayView {
  mode: DisplayMode;
  remainingMs: number | null;
  urgency: number;
  finished: boolean;
  alarm: AlarmState;
}

/**
 * State machine instance
 */
export interface StateMachine {
  start: (mode: DisplayMode, duration: string | null, nowMs: EpochMs) => void;
  tick: (nowMs: EpochMs) => TickResult;
  resetDeadline: () => void;
  triggerAlarm: (request: AlarmRequest, nowMs: EpochMs) => void;
  dismissAlarm: () => void;
  view: () => DisplayView;
}
