/**
 * Time helper functions
 */

import { InvalidDurationError } from '$types/errors';

import { TIME_CONSTANTS } from '../constants';

const DURATION_PATTERN = /^(?:(\d+)h)?(?:(\d+)m)?(?:(\d+)s)?$/;
const BARE_SECONDS_PATTERN = /^\d+$/;

/**
 * Parse a duration string into whole seconds
 *
 * Accepts `1h30m45s` with every unit optional (`30m`, `1h`, `45s`) or a bare
 * number of seconds (`90`).
 *
 * @param input - Duration text
 * @returns Total seconds, always > 0
 * @throws {InvalidDurationError} If the text is empty, malformed or zero
 */
export function parseDuration(input: string): number {
  const text = input.trim().toLowerCase();
  if (text === '') {
    throw new InvalidDurationError(input);
  }

  let total: number;
  if (BARE_SECONDS_PATTERN.test(text)) {
    total = parseInt(text, 10);
  } else {
    const match = DURATION_PATTERN.exec(text);
    if (!match) {
      throw new InvalidDurationError(input);
    }
    const hours = parseInt(match[1] || '0', 10);
    const minutes = parseInt(match[2] || '0', 10);
    const seconds = parseInt(match[3] || '0', 10);
    total = hours * TIME_CONSTANTS.SECONDS_PER_HOUR + minutes * TIME_CONSTANTS.SECONDS_PER_MINUTE + seconds;
  }

  if (total <= 0) {
    throw new InvalidDurationError(input, `Duration must be greater than 0: ${input}`);
  }
  return total;
}

/**
 * Format a millisecond span as HH:MM:SS
 * Hours are not wrapped at 24; negative spans render as 00:00:00.
 */
export function formatHms(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / TIME_CONSTANTS.MS_PER_SECOND));
  const hours = Math.floor(totalSeconds / TIME_CONSTANTS.SECONDS_PER_HOUR);
  const minutes = Math.floor((totalSeconds % TIME_CONSTANTS.SECONDS_PER_HOUR) / TIME_CONSTANTS.SECONDS_PER_MINUTE);
  const seconds = totalSeconds % TIME_CONSTANTS.SECONDS_PER_MINUTE;
  return pad2(hours) + ':' + pad2(minutes) + ':' + pad2(seconds);
}

/**
 * Local-time start of the calendar day after `nowMs`
 */
export function startOfNextDay(nowMs: number): number {
  const d = new Date(nowMs);
  return new Date(d.getFullYear(), d.getMonth(), d.getDate() + 1, 0, 0, 0, 0).getTime();
}

function pad2(n: number): string {
  return n < 10 ? '0' + n : String(n);
}
