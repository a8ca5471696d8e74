/**
 * Periodic job scheduler
 *
 * Each named job has at most one timer. Replacing a job clears its old
 * timer before installing the new one, so a cadence change never leaves
 * two timers firing. A job that throws is logged and keeps its schedule.
 */

import type { Logger } from '@logging';
import type { Job, Scheduler, TimerAPI, TimerHandle } from './types';

interface Entry {
  handle: TimerHandle;
  intervalMs: number;
}

/**
 * Node timers, resolved at call time so fake timers apply
 */
export const NODE_TIMERS: TimerAPI = {
  every: function(intervalMs, callback) { return setInterval(callback, intervalMs); },
  clear: function(handle) { clearInterval(handle); }
};

/**
 * Create a scheduler
 *
 * @param timers - Timer API
 * @param logger - Logger for job failures
 * @returns Scheduler instance
 *
 * @example
 * const scheduler = createScheduler(NODE_TIMERS, logger);
 * scheduler.schedule('tick', 1000, onTick);
 * scheduler.schedule('animation', 100, animate); // replaces nothing, new job
 * scheduler.schedule('animation', 50, animate);  // replaces the 100 ms timer
 */
export function createScheduler(timers: TimerAPI, logger: Logger): Scheduler {
  const jobs = new Map<string, Entry>();
  let stopped = false;

  function runGuarded(name: string, job: Job): void {
    try {
      job();
    } catch (err) {
      logger.critical(`[Scheduler] Job '${name}' failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  function schedule(name: string, intervalMs: number, job: Job): void {
    if (stopped) {
      logger.warning(`[Scheduler] Ignoring '${name}' after stop`);
      return;
    }
    cancel(name);
    const handle = timers.every(intervalMs, function() { runGuarded(name, job); });
    jobs.set(name, { handle, intervalMs });
  }

  function cancel(name: string): boolean {
    const entry = jobs.get(name);
    if (!entry) {
      return false;
    }
    timers.clear(entry.handle);
    jobs.delete(name);
    return true;
  }

  function intervalOf(name: string): number | null {
    const entry = jobs.get(name);
    return entry ? entry.intervalMs : null;
  }

  function stop(): void {
    for (const name of Array.from(jobs.keys())) {
      cancel(name);
    }
    stopped = true;
  }

  function isStopped(): boolean {
    return stopped;
  }

  return {
    schedule,
    cancel,
    intervalOf,
    stop,
    isStopped
  };
}
