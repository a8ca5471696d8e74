/**
 * Instance registry
 *
 * Holds the running overlay instances and routes every command through
 * one explicit table. A command missing from the table does not compile.
 */

import { ProtocolError } from '$types/errors';
import type { Logger } from '@logging';
import type { OverlayInstance } from '@system/instance';
import type {
  Command,
  CommandName,
  CommandResult,
  CommandRoute,
  DispatchResult,
  InstanceOutcome,
  InstanceRegistry
} from './types';

/**
 * Command routing table
 */
export const COMMAND_ROUTES: Readonly<Record<CommandName, CommandRoute>> = {
  status: 'local',
  toggle_screen_sampling: 'local',
  reload_config: 'broadcast',
  forbidden_alarm: 'broadcast',
  dismiss_alarm: 'broadcast',
  reset_deadline: 'broadcast'
};

/**
 * Run one command against one instance
 */
export async function execute(instance: OverlayInstance, command: Command): Promise<CommandResult> {
  switch (command.name) {
    case 'reload_config':
      return instance.reloadConfig();
    case 'status':
      return instance.status();
    case 'forbidden_alarm':
      return instance.triggerAlarm(command.alarm);
    case 'dismiss_alarm':
      return instance.dismissAlarm();
    case 'reset_deadline':
      return instance.resetDeadline();
    case 'toggle_screen_sampling':
      return instance.toggleSampling();
  }
}

/**
 * Create an empty registry
 *
 * @param logger - Logger for per-instance broadcast failures
 * @returns Instance registry
 */
export function createInstanceRegistry(logger: Logger): InstanceRegistry {
  const instances = new Map<number, OverlayInstance>();

  function register(instance: OverlayInstance): void {
    if (instances.has(instance.id)) {
      throw new Error(`Instance ${instance.id} is already registered`);
    }
    instances.set(instance.id, instance);
  }

  function unregister(id: number): boolean {
    return instances.delete(id);
  }

  function get(id: number): OverlayInstance | null {
    return instances.get(id) ?? null;
  }

  function list(): OverlayInstance[] {
    return Array.from(instances.values());
  }

  async function broadcast(command: Command): Promise<InstanceOutcome[]> {
    const outcomes: InstanceOutcome[] = [];
    for (const instance of list()) {
      try {
        outcomes.push({ instance: instance.id, ok: true, result: await execute(instance, command) });
      } catch (err) {
        const error = err instanceof Error ? err.message : String(err);
        logger.warning(`[Registry] ${command.name} failed on instance ${instance.id}: ${error}`);
        outcomes.push({ instance: instance.id, ok: false, error });
      }
    }
    return outcomes;
  }

  async function dispatch(command: Command, localId: number): Promise<DispatchResult> {
    if (COMMAND_ROUTES[command.name] === 'broadcast') {
      if (instances.size === 0) {
        throw new ProtocolError('no_instances', 'No instances registered');
      }
      return { route: 'broadcast', outcomes: await broadcast(command) };
    }

    const local = get(localId);
    if (local === null) {
      throw new ProtocolError('no_instances', `Instance ${localId} is not registered`);
    }
    return { route: 'local', result: await execute(local, command) };
  }

  return {
    register,
    unregister,
    get,
    list,
    dispatch
  };
}
