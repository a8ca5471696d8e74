export { createStateMachine, createInitialDisplayState } from './display-state';
export { computeRemaining, computeUrgency, resolveTarget } from './helpers';
export type { DisplayState, DisplayView, StateMachine, StateMachineConfig, TickResult } from './types';
