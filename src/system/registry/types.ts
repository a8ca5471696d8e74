/**
 * Instance registry and command routing types
 */

import type { AlarmRequest } from '@core/alarm';
import type { ToggleResult } from '@core/color';
import type { DisplayMode } from '$types/common';
import type { AlarmAck, OverlayInstance, ReloadResult, StatusPayload } from '@system/instance';

/**
 * Control command after parsing
 */
export type Command =
  | { name: 'reload_config' }
  | { name: 'status' }
  | { name: 'forbidden_alarm'; alarm: AlarmRequest }
  | { name: 'dismiss_alarm' }
  | { name: 'reset_deadline' }
  | { name: 'toggle_screen_sampling' };

export type CommandName = Command['name'];

/**
 * `local` runs on the receiving instance only, `broadcast` on every instance
 */
export type CommandRoute = 'local' | 'broadcast';

export type CommandResult = ReloadResult | StatusPayload | AlarmAck | ToggleResult | { mode: DisplayMode };

/**
 * Outcome of a broadcast command on one instance
 */
export type InstanceOutcome =
  | { instance: number; ok: true; result: CommandResult }
  | { instance: number; ok: false; error: string };

export type DispatchResult =
  | { route: 'local'; result: CommandResult }
  | { route: 'broadcast'; outcomes: InstanceOutcome[] };

/**
 * Registered overlay instances
 */
export interface InstanceRegistry {
  register: (instance: OverlayInstance) => void;
  unregister: (id: number) => boolean;
  get: (id: number) => OverlayInstance | null;
  list: () => OverlayInstance[];

  /**
   * Run a command according to its route
   * @param command - Parsed command
   * @param localId - Instance that owns the receiving connection
   */
  dispatch: (command: Command, localId: number) => Promise<DispatchResult>;
}
