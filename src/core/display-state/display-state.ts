/**
 * Display mode and alarm state machine
 *
 * Owns the display mode, its target time and the orthogonal alarm.
 * Every operation replaces the state as a whole, so a caller never sees
 * a partly applied transition. Alarm changes never touch the mode.
 *
 * Modes do not auto-clear: once a target is reached the remaining time
 * stays at zero with maximal urgency until `resetDeadline`.
 */

import type { DisplayMode, EpochMs } from '$types/common';
import { activateAlarm, isAlarmExpired, INACTIVE_ALARM } from '@core/alarm';
import type { AlarmRequest } from '@core/alarm';
import { computeRemaining, computeUrgency, resolveTarget } from './helpers';
import type { DisplayState, DisplayView, StateMachine, StateMachineConfig, TickResult } from './types';

/**
 * Create the initial clock-mode state
 */
export function createInitialDisplayState(): DisplayState {
  return {
    mode: 'clock',
    target: null,
    remainingMs: null,
    finished: false,
    expiryAlarmRaised: false,
    alarm: INACTIVE_ALARM
  };
}

/**
 * Create a state machine in clock mode
 *
 * @param config - Alarm timeout and deadline expiry alarm
 * @returns State machine instance
 */
export function createStateMachine(config: StateMachineConfig): StateMachine {
  let state = createInitialDisplayState();

  /**
   * Enter a mode. The alarm is kept as it is.
   * @throws {InvalidDurationError} Leaves the state unchanged
   */
  function start(mode: DisplayMode, duration: string | null, nowMs: EpochMs): void {
    const target = resolveTarget(mode, duration, nowMs);
    state = {
      mode,
      target,
      remainingMs: target === null ? null : computeRemaining(target, nowMs),
      finished: false,
      expiryAlarmRaised: false,
      alarm: state.alarm
    };
  }

  function tick(nowMs: EpochMs): TickResult {
    const result: TickResult = { finishedNow: false, alarmTimedOut: false, expiryAlarmRaised: false };
    let next = state;

    if (isAlarmExpired(next.alarm, nowMs, config.alarmTimeoutMs)) {
      next = { ...next, alarm: INACTIVE_ALARM };
      result.alarmTimedOut = true;
    }

    if (next.target !== null) {
      const remainingMs = computeRemaining(next.target, nowMs);
      const finished = next.finished || remainingMs === 0;
      result.finishedNow = finished && !next.finished;
      next = { ...next, remainingMs, finished };

      if (next.mode === 'deadline' && finished && !next.expiryAlarmRaised) {
        next = { ...next, alarm: activateAlarm(config.expiryAlarm, nowMs), expiryAlarmRaised: true };
        result.expiryAlarmRaised = true;
      }
    }

    state = next;
    return result;
  }

  /**
   * Back to clock mode with no alarm. Idempotent.
   */
  function resetDeadline(): void {
    state = createInitialDisplayState();
  }

  function triggerAlarm(request: AlarmRequest, nowMs: EpochMs): void {
    state = { ...state, alarm: activateAlarm(request, nowMs) };
  }

  function dismissAlarm(): void {
    if (state.alarm.active) {
      state = { ...state, alarm: INACTIVE_ALARM };
    }
  }

  function view(): DisplayView {
    return {
      mode: state.mode,
      remainingMs: state.remainingMs,
      urgency: computeUrgency(state.mode, state.remainingMs),
      finished: state.finished,
      alarm: state.alarm
    };
  }

  return {
    start,
    tick,
    resetDeadline,
    triggerAlarm,
    dismissAlarm,
    view
  };
}
