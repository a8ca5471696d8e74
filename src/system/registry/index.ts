export { createInstanceRegistry, execute, COMMAND_ROUTES } from './registry';
export type {
  Command,
  CommandName,
  CommandRoute,
  CommandResult,
  InstanceOutcome,
  DispatchResult,
  InstanceRegistry
} from './types';
