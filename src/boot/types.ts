/**
 * Boot type definitions
 */

import type { DisplayMode, Rgb } from '$types/common';
import type { AppConstants, OverlaySettings } from '$types/config';
import type { Logger } from '@logging';
import type { ControlChannel } from '@system/control';
import type { OverlayInstance } from '@system/instance';
import type { InstanceRegistry } from '@system/registry';

/**
 * Settings fields the command line can override
 */
export type SettingsOverrides = {
  -readonly [K in OverridableSetting]?: OverlaySettings[K];
};

type OverridableSetting =
  | 'color'
  | 'style'
  | 'font_size'
  | 'opacity'
  | 'position_mode'
  | 'position_preset'
  | 'position_x'
  | 'position_y';

/**
 * Startup options from the command line
 */
export interface BootOptions {
  mode: DisplayMode;

  /** Countdown/deadline duration text, e.g. "25m" */
  duration: string | null;

  /** Number of overlay instances, one per monitor */
  instances: number;

  /** Fixed text color; disables adaptive sampling */
  fixedColor: Rgb | null;

  /** Applied over the settings document at startup and on every reload */
  overrides: SettingsOverrides;
}

/**
 * Running control plane
 */
export interface Daemon {
  constants: AppConstants;
  logger: Logger;
  registry: InstanceRegistry;
  instances: OverlayInstance[];
  channel: ControlChannel;

  /** Stop instances and sampling, close and unlink the socket, flush logs */
  shutdown: () => Promise<void>;
}
