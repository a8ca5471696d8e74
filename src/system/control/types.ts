/**
 * Control channel type definitions
 */

import type { Logger } from '@logging';
import type { InstanceRegistry } from '@system/registry';

/**
 * Handles one command line, always resolving to a reply line
 */
export type CommandHandler = (line: string) => Promise<string>;

export interface CommandHandlerDependencies {
  registry: InstanceRegistry;

  /** Instance that owns this channel; receives local-only commands */
  localId: number;
  logger: Logger;
}

/**
 * Control channel configuration
 */
export interface ControlChannelConfig {
  socketPath: string;

  /** Permission bits applied after binding */
  socketMode: number;

  /** Bound on reading one command from a connection */
  readTimeoutMs: number;
  maxCommandBytes: number;
}

/**
 * Unix socket command server
 */
export interface ControlChannel {
  /**
   * Bind and listen, reclaiming a stale socket file
   * @throws {SocketBindError} If the path is held by a live process or cannot be bound
   */
  start: () => Promise<void>;

  /** Close the server and connections and remove the socket file */
  stop: () => Promise<void>;
  isListening: () => boolean;
}
