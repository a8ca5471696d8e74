export { createOverlayInstance, DEADLINE_ALARM } from './instance';
export { DEFAULT_CADENCE, CADENCE_MS, buildStatus, engineValuesFrom } from './helpers';
export type {
  SettingsSource,
  CadenceInput,
  AnimationCadence,
  InstanceConfig,
  InstanceDependencies,
  StatusPayload,
  RenderSnapshot,
  ReloadResult,
  AlarmAck,
  OverlayInstance
} from './types';
