/**
 * Display state helpers
 */

import type { DisplayMode, EpochMs } from '$types/common';
import { InvalidDurationError } from '$types/errors';
import { parseDuration, startOfNextDay } from '@utils/time';
import { TIME_CONSTANTS } from '@utils/constants';

/**
 * Urgency steps as [minimum remaining seconds, level], checked in order
 */
const URGENCY_STEPS: ReadonlyArray<readonly [number, number]> = [
  [300, 0.5],
  [60, 0.7],
  [10, 0.9]
];

/**
 * Remaining time until a target, clamped at zero
 */
export function computeRemaining(target: EpochMs, nowMs: EpochMs): number {
  return Math.max(0, target - nowMs);
}

/**
 * Urgency level for the renderer, 0 in clock mode
 *
 * @param mode - Current display mode
 * @param remainingMs - Remaining time, null in clock mode
 * @returns 0.5, 0.7, 0.9 or 1.0 as the target approaches
 */
export function computeUrgency(mode: DisplayMode, remainingMs: number | null): number {
  if (mode === 'clock' || remainingMs === null) {
    return 0;
  }
  const seconds = remainingMs / TIME_CONSTANTS.MS_PER_SECOND;
  for (const [above, level] of URGENCY_STEPS) {
    if (seconds > above) {
      return level;
    }
  }
  return 1;
}

/**
 * Resolve the target timestamp for a mode
 *
 * Parses the duration before anything else so a bad duration changes
 * nothing.
 *
 * @throws {InvalidDurationError} If a countdown/deadline duration is missing or invalid
 */
export function resolveTarget(mode: DisplayMode, duration: string | null, nowMs: EpochMs): EpochMs | null {
  switch (mode) {
    case 'clock':
      return null;
    case 'midnight':
      return startOfNextDay(nowMs);
    case 'countdown':
    case 'deadline':
      if (duration === null) {
        throw new InvalidDurationError('', `Mode '${mode}' requires a duration`);
      }
      return nowMs + parseDuration(duration) * TIME_CONSTANTS.MS_PER_SECOND;
  }
}
