/**
 * Control protocol
 *
 * One command per connection, as `command` or `command:payload`.
 * Replies are `OK:<json>` or `ERROR:<reason>`.
 */

import { ProtocolError, UnknownCommandError } from '$types/errors';
import type { AlarmRequest } from '@core/alarm';
import type { Command, DispatchResult } from '@system/registry';
import type { CommandHandler, CommandHandlerDependencies } from './types';

const ALARM_USAGE = 'forbidden_alarm expects <class>|<title>|<message>';

/**
 * Parse a `forbidden_alarm` payload
 *
 * The first two pipes delimit class and title; everything after the
 * second pipe is the message, pipes included.
 *
 * @throws {ProtocolError} `invalid_alarm_payload` when a field is missing or the message is empty
 */
export function parseAlarmPayload(payload: string | null): AlarmRequest {
  if (payload === null) {
    throw new ProtocolError('invalid_alarm_payload', ALARM_USAGE);
  }
  const parts = payload.split('|');
  if (parts.length < 3) {
    throw new ProtocolError('invalid_alarm_payload', ALARM_USAGE);
  }

  const message = parts.slice(2).join('|').trim();
  if (message === '') {
    throw new ProtocolError('invalid_alarm_payload', 'Alarm message is empty');
  }
  return { sourceClass: parts[0].trim(), title: parts[1].trim(), message };
}

/**
 * Parse one command line
 *
 * Payloads on commands that take none are ignored.
 *
 * @throws {ProtocolError} On an empty line or a bad payload
 * @throws {UnknownCommandError} On an unrecognized command
 */
export function parseCommandLine(line: string): Command {
  const text = line.trim();
  if (text === '') {
    throw new ProtocolError('empty_command', 'Empty command');
  }

  const colon = text.indexOf(':');
  const name = colon < 0 ? text : text.slice(0, colon);
  const payload = colon < 0 ? null : text.slice(colon + 1);

  switch (name) {
    case 'forbidden_alarm':
      return { name, alarm: parseAlarmPayload(payload) };
    case 'reload_config':
    case 'status':
    case 'dismiss_alarm':
    case 'reset_deadline':
    case 'toggle_screen_sampling':
      return { name };
    default:
      throw new UnknownCommandError(name);
  }
}

/**
 * Format a successful dispatch as `OK:<json>`
 *
 * Broadcast replies carry one outcome per instance.
 */
export function formatOk(result: DispatchResult): string {
  const body = result.route === 'local' ? result.result : { instances: result.outcomes };
  return 'OK:' + JSON.stringify(body);
}

export function formatError(reason: string): string {
  return 'ERROR:' + reason;
}

/**
 * Create the command handler used by the control channel
 *
 * Never rejects: protocol errors become `ERROR:<reason>`, anything else
 * is logged and reported as `ERROR:internal_error`.
 *
 * @param deps - Registry, local instance id and logger
 * @returns Command handler
 */
export function createCommandHandler(deps: CommandHandlerDependencies): CommandHandler {
  const { registry, localId, logger } = deps;

  return async function handle(line: string): Promise<string> {
    try {
      const command = parseCommandLine(line);
      logger.debug(`[Control] ${command.name}`);
      return formatOk(await registry.dispatch(command, localId));
    } catch (err) {
      if (err instanceof ProtocolError) {
        logger.warning(`[Control] Rejected '${line.trim()}': ${err.message}`);
        return formatError(err.reason);
      }
      logger.critical(`[Control] Command '${line.trim()}' failed: ${err instanceof Error ? err.message : String(err)}`);
      return formatError('internal_error');
    }
  };
}
