export { createScheduler, NODE_TIMERS } from './scheduler';
export { createSamplingWorker } from './sampling-worker';
export type {
  TimerAPI,
  TimerHandle,
  Job,
  Scheduler,
  ScreenSampler,
  SamplingWorker,
  SamplingWorkerConfig,
  Clock
} from './types';
