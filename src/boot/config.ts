import os from 'node:os';
import path from 'node:path';

import { parseLogLevel } from '@logging';
import type { LogLevels } from '@logging';
import type { AppConstants, OverlaySettings } from '$types/config';

// ─────────────────────────────────────────────────────────────
// DEFAULT SETTINGS
//   The settings document a user edits (config.json). Anything
//   missing or invalid in the file falls back to these values.
// ─────────────────────────────────────────────────────────────

export const DEFAULT_SETTINGS: Readonly<OverlaySettings> = {
  // color
  //   Role: Text color while adaptive sampling is off.
  //   Critical: #rrggbb.
  color: '#FFFFFF',

  // font_size
  //   Role: Font size of the time text in points.
  //   Critical: Integer 8–400.
  //   Recommended: 24–200; 78 reads well from across a desk.
  font_size: 78,

  // opacity
  //   Role: Overlay opacity.
  //   Critical: 0–1.
  //   Recommended: 0.2–1; below 0.2 the text is hard to read.
  opacity: 0.5,

  // style
  //   Role: Rendering style: 'normal', 'bordered' (dark outline) or 'lightbulb' (animated glow).
  style: 'normal',

  // background_color
  //   Role: Reference background for the luminance contrast check.
  //   Critical: #rrggbb.
  background_color: '#000000',

  // position_mode / position_preset / position_x / position_y
  //   Role: Placement on screen, by preset or by custom coordinates.
  //   Critical: position_x and position_y are integers ≥ 0.
  position_mode: 'preset',
  position_preset: 'center',
  position_x: 0,
  position_y: 0,

  // screen_sampling
  //   Role: Adaptive text color from the screen content behind the overlay.
  //   Critical: update_interval 0.1–60 s; throttle_threshold 0–765.
  //   Recommended: update_interval 0.25–5 s; throttle_threshold 5–100.
  screen_sampling: {
    enabled: false,
    update_interval: 0.5,
    throttle_threshold: 15
  }
};

// ─────────────────────────────────────────────────────────────
// APP CONSTANTS
//   Engine constants that should rarely change. Some accept an
//   INTIME_* environment override (see resolveAppConstants).
// ─────────────────────────────────────────────────────────────

const LOG_LEVELS: LogLevels = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  CRITICAL: 3
};

export const APP_CONSTANTS: Readonly<AppConstants> = {
  // ═══════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════

  // LOG_LEVELS
  //   Role: Canonical mapping of log level names to numeric codes.
  LOG_LEVELS,

  // LOG_LEVEL
  //   Role: Minimum level written by the logger.
  //   Override: INTIME_LOG_LEVEL (debug|info|warning|critical).
  LOG_LEVEL: LOG_LEVELS.INFO,

  // LOG_AUTO_DEMOTE_HOURS
  //   Role: INFO lines are muted after this much uptime; 0 disables.
  LOG_AUTO_DEMOTE_HOURS: 24,

  // LOG_FILE
  //   Role: Append-only log file, null for console only.
  //   Override: INTIME_LOG_FILE.
  LOG_FILE: null,

  // ═══════════════════════════════════════════════════════════════
  // CONTROL CHANNEL
  // ═══════════════════════════════════════════════════════════════

  // SOCKET_PATH
  //   Role: Well-known Unix socket path clients connect to.
  //   Override: INTIME_SOCKET_PATH.
  SOCKET_PATH: '/tmp/intime_widget.sock',

  // SOCKET_MODE
  //   Role: Permission bits of the socket file (any local user may send commands).
  SOCKET_MODE: 0o666,

  // READ_TIMEOUT_MS
  //   Role: Time a client has to send its command.
  //   Recommended: Do not raise much; a slow client holds its connection this long.
  READ_TIMEOUT_MS: 2000,

  // MAX_COMMAND_BYTES
  //   Role: Longest accepted command line.
  MAX_COMMAND_BYTES: 1024,

  // ═══════════════════════════════════════════════════════════════
  // SCHEDULER
  // ═══════════════════════════════════════════════════════════════

  // TICK_INTERVAL_MS
  //   Role: State tick period; remaining time has one-second resolution.
  TICK_INTERVAL_MS: 1000,

  // ALARM_TIMEOUT_SEC
  //   Role: Active alarm is dismissed automatically after this long.
  //   Override: INTIME_ALARM_TIMEOUT_SEC.
  ALARM_TIMEOUT_SEC: 30,

  // ═══════════════════════════════════════════════════════════════
  // SAMPLER
  // ═══════════════════════════════════════════════════════════════

  // SAMPLER_COMMAND / SAMPLER_ARGS
  //   Role: External command printing the screen color as #rrggbb or r,g,b.
  //   Override: INTIME_SAMPLER_COMMAND, INTIME_SAMPLER_ARGS (space separated).
  SAMPLER_COMMAND: null,
  SAMPLER_ARGS: [],

  // SAMPLER_TIMEOUT_MS
  //   Role: A sample taking longer is aborted and counts as a failure.
  SAMPLER_TIMEOUT_MS: 500,

  // SAMPLER_MAX_FAILURES
  //   Role: Consecutive failures before sampling turns itself off.
  SAMPLER_MAX_FAILURES: 5,

  // MIN_LUMINANCE_DELTA
  //   Role: Minimum luminance difference between text and background.
  //   Critical: 0–0.5; above 0.5 no color can satisfy every background.
  MIN_LUMINANCE_DELTA: 0.4,

  // ═══════════════════════════════════════════════════════════════
  // SETTINGS FILE
  // ═══════════════════════════════════════════════════════════════

  // SETTINGS_PATH
  //   Role: Location of config.json.
  //   Override: INTIME_CONFIG_PATH.
  SETTINGS_PATH: path.join(os.homedir(), '.config', 'intime', 'config.json')
};

/**
 * App constants with environment overrides applied
 */
export interface ResolvedConstants {
  constants: AppConstants;

  /** Overrides that were present but unusable */
  warnings: string[];
}

function nonEmpty(value: string | undefined): string | null {
  if (value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

/**
 * Apply INTIME_* environment overrides to the app constants
 *
 * Unusable values keep the default and produce a warning.
 *
 * @param env - Environment, usually `process.env` after dotenv has run
 * @param base - Constants to override
 * @returns Resolved constants and warnings
 */
export function resolveAppConstants(
  env: NodeJS.ProcessEnv,
  base: Readonly<AppConstants> = APP_CONSTANTS
): ResolvedConstants {
  const warnings: string[] = [];

  let logLevel = base.LOG_LEVEL;
  const levelName = nonEmpty(env.INTIME_LOG_LEVEL);
  if (levelName !== null) {
    const parsed = parseLogLevel(levelName, base.LOG_LEVELS);
    if (parsed === null) {
      warnings.push(`INTIME_LOG_LEVEL '${levelName}' is not a log level`);
    } else {
      logLevel = parsed;
    }
  }

  let alarmTimeoutSec = base.ALARM_TIMEOUT_SEC;
  const timeoutText = nonEmpty(env.INTIME_ALARM_TIMEOUT_SEC);
  if (timeoutText !== null) {
    const parsed = Number(timeoutText);
    if (!Number.isFinite(parsed) || parsed <= 0) {
      warnings.push(`INTIME_ALARM_TIMEOUT_SEC '${timeoutText}' must be a positive number`);
    } else {
      alarmTimeoutSec = parsed;
    }
  }

  const samplerArgs = nonEmpty(env.INTIME_SAMPLER_ARGS);

  return {
    constants: {
      ...base,
      LOG_LEVEL: logLevel,
      LOG_FILE: nonEmpty(env.INTIME_LOG_FILE) ?? base.LOG_FILE,
      SOCKET_PATH: nonEmpty(env.INTIME_SOCKET_PATH) ?? base.SOCKET_PATH,
      ALARM_TIMEOUT_SEC: alarmTimeoutSec,
      SAMPLER_COMMAND: nonEmpty(env.INTIME_SAMPLER_COMMAND) ?? base.SAMPLER_COMMAND,
      SAMPLER_ARGS: samplerArgs === null ? base.SAMPLER_ARGS : samplerArgs.split(/\s+/),
      SETTINGS_PATH: nonEmpty(env.INTIME_CONFIG_PATH) ?? base.SETTINGS_PATH
    },
    warnings
  };
}
