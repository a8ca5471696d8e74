/**
 * Background screen sampling
 *
 * The sampler runs outside the tick: at most one call is in flight, and
 * its outcome lands in a single slot that the next state tick takes.
 * A newer outcome replaces one that was never taken.
 */

import type { Rgb } from '$types/common';
import { SamplerUnavailableError } from '$types/errors';
import type { SampleOutcome } from '@core/color';
import type { Logger } from '@logging';
import type { Clock, SamplingWorker, SamplingWorkerConfig, ScreenSampler } from './types';

/**
 * Create a sampling worker
 *
 * @param sampler - Screen color source
 * @param config - Per-sample timeout
 * @param deps - Clock and logger
 * @returns Sampling worker instance
 */
export function createSamplingWorker(
  sampler: ScreenSampler,
  config: SamplingWorkerConfig,
  deps: { clock: Clock; logger: Logger }
): SamplingWorker {
  let inFlight: { controller: AbortController; timer: ReturnType<typeof setTimeout> } | null = null;
  let slot: SampleOutcome | null = null;
  let stopped = false;

  function request(): boolean {
    if (stopped || inFlight !== null) {
      return false;
    }

    const controller = new AbortController();
    // Settles the race on timeout or stop even if the sampler ignores the signal
    const aborted = new Promise<never>(function(_resolve, reject) {
      controller.signal.addEventListener('abort', function() { reject(controller.signal.reason); }, { once: true });
    });
    const timer = setTimeout(function() {
      controller.abort(new SamplerUnavailableError(`Sampler timed out after ${config.timeoutMs}ms`));
    }, config.timeoutMs);
    const current = { controller, timer };
    inFlight = current;

    function settle(outcome: SampleOutcome): void {
      clearTimeout(timer);
      // Dropped when stopped meanwhile
      if (inFlight !== current) {
        return;
      }
      inFlight = null;
      slot = outcome;
      if (!outcome.ok) {
        deps.logger.debug(`[Sampler] ${outcome.error}`);
      }
    }

    let sampled: Promise<Rgb>;
    try {
      sampled = sampler.sample(controller.signal);
    } catch (err) {
      // A sampler that throws before returning a promise is a failed sample
      sampled = Promise.reject(err);
    }

    void Promise.race([sampled, aborted]).then(
      function(rgb) { settle({ ok: true, sample: { rgb, sampledAt: deps.clock() } }); },
      function(err: unknown) {
        settle({ ok: false, error: err instanceof Error ? err.message : String(err), at: deps.clock() });
      }
    );
    return true;
  }

  function take(): SampleOutcome | null {
    const outcome = slot;
    slot = null;
    return outcome;
  }

  function isBusy(): boolean {
    return inFlight !== null;
  }

  function stop(): void {
    stopped = true;
    if (inFlight !== null) {
      clearTimeout(inFlight.timer);
      inFlight.controller.abort();
      inFlight = null;
    }
    slot = null;
  }

  return {
    request,
    take,
    isBusy,
    stop
  };
}
