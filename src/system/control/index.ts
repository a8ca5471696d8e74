export { createControlChannel, isSocketAlive } from './channel';
export { createCommandHandler, parseCommandLine, parseAlarmPayload, formatOk, formatError } from './protocol';
export type { CommandHandler, CommandHandlerDependencies, ControlChannel, ControlChannelConfig } from './types';
