/**
 * Scheduler and sampling worker type definitions
 */

import type { EpochMs, Rgb } from '$types/common';
import type { SampleOutcome } from '@core/color';

export type TimerHandle = ReturnType<typeof setInterval>;

/**
 * Timer API used by the scheduler (injectable for tests)
 */
export interface TimerAPI {
  every: (intervalMs: number, callback: () => void) => TimerHandle;
  clear: (handle: TimerHandle) => void;
}

/**
 * Periodic job body. Runs to completion on the event loop.
 */
export type Job = () => void;

/**
 * Named periodic jobs
 */
export interface Scheduler {
  /** Install or replace a job; the old timer is cleared first */
  schedule: (name: string, intervalMs: number, job: Job) => void;
  cancel: (name: string) => boolean;
  intervalOf: (name: string) => number | null;
  stop: () => void;
  isStopped: () => boolean;
}

/**
 * Out-of-process screen color source
 */
export interface ScreenSampler {
  /** Resolve with one representative color, or reject */
  sample: (signal: AbortSignal) => Promise<Rgb>;
}

/**
 * Sampling worker configuration
 */
export interface SamplingWorkerConfig {
  /** Bound on a single sample; slower calls are aborted and count as failures */
  timeoutMs: number;
}

/**
 * Background sampler with a single-slot result handoff
 */
export interface SamplingWorker {
  /** Start a sample unless one is already in flight; false when not started */
  request: () => boolean;

  /** Take the pending outcome, leaving the slot empty */
  take: () => SampleOutcome | null;
  isBusy: () => boolean;

  /** Abort any sample in flight and drop the slot */
  stop: () => void;
}

export type Clock = () => EpochMs;
