/**
 * Overlay instance
 *
 * Wires one state machine and one color engine to a scheduler:
 *
 * - `tick`      fixed cadence: takes the pending sample, advances the state
 * - `resample`  settings cadence: asks the sampling worker for a new sample
 * - `animation` cadence from the injected mapping, only while something animates
 *
 * Commands and jobs all run on the event loop, so a command never
 * interleaves with a tick.
 */

import type { DisplayMode } from '$types/common';
import type { OverlaySettings } from '$types/config';
import { stepAlarmIntensity } from '@core/alarm';
import type { AlarmRequest } from '@core/alarm';
import { createColorEngine, toHex } from '@core/color';
import type { OfferResult, ToggleResult } from '@core/color';
import { createStateMachine } from '@core/display-state';
import { createSamplingWorker, createScheduler } from '@core/scheduler';
import { formatHms } from '@utils/time';
import { DEFAULT_CADENCE, buildStatus, engineValuesFrom } from './helpers';
import type {
  AlarmAck,
  InstanceConfig,
  InstanceDependencies,
  OverlayInstance,
  ReloadResult,
  RenderSnapshot,
  StatusPayload
} from './types';

const JOB_TICK = 'tick';
const JOB_RESAMPLE = 'resample';
const JOB_ANIMATION = 'animation';

/**
 * Alarm raised when a deadline reaches zero
 */
export const DEADLINE_ALARM: AlarmRequest = {
  sourceClass: 'deadline',
  title: '',
  message: 'DEADLINE REACHED'
};

/**
 * Create an overlay instance in clock mode
 *
 * @param config - Settings, limits and optional fixed color
 * @param deps - Sampler, settings source, logger, timers and clock
 * @returns Overlay instance; call `start()` to begin ticking
 *
 * @example
 * const instance = createOverlayInstance(config, deps);
 * instance.enterMode('countdown', '25m');
 * instance.start();
 */
export function createOverlayInstance(config: InstanceConfig, deps: InstanceDependencies): OverlayInstance {
  const { logger, clock } = deps;
  const cadence = deps.cadence ?? DEFAULT_CADENCE;
  const tag = `[Instance ${config.id}]`;

  let settings: OverlaySettings = config.settings;
  let animationPhase = 0;
  let alarmIntensity = 0;
  let running = false;

  const machine = createStateMachine({
    alarmTimeoutMs: config.alarmTimeoutMs,
    expiryAlarm: DEADLINE_ALARM
  });
  const engine = createColorEngine({
    ...engineValuesFrom(settings),
    fixedColor: config.fixedColor,
    enabled: settings.screen_sampling.enabled,
    minLuminanceDelta: config.minLuminanceDelta,
    maxFailures: config.maxSamplerFailures
  });
  const scheduler = createScheduler(deps.timers, logger);
  const worker = createSamplingWorker(deps.sampler, { timeoutMs: config.samplerTimeoutMs }, { clock, logger });

  // ═══════════════════════════════════════════════════════════════
  // JOBS
  // ═══════════════════════════════════════════════════════════════

  function logOffer(result: OfferResult): void {
    if (result.kind === 'applied') {
      logger.debug(`${tag} Color ${toHex(result.rgb)} (distance ${result.distance.toFixed(1)})`);
    } else if (result.kind === 'failed' && result.degraded) {
      logger.warning(`${tag} Screen sampling disabled after ${result.failures} consecutive failures`);
    }
  }

  function tick(): void {
    const nowMs = clock();

    const outcome = worker.take();
    if (outcome !== null) {
      logOffer(engine.offer(outcome, nowMs));
    }

    const result = machine.tick(nowMs);
    if (result.finishedNow) {
      logger.info(`${tag} ${machine.view().mode} reached zero`);
    }
    if (result.expiryAlarmRaised) {
      logger.warning(`${tag} Deadline reached`);
    }
    if (result.alarmTimedOut) {
      logger.info(`${tag} Alarm auto-dismissed after ${config.alarmTimeoutMs / 1000}s`);
    }

    refreshAnimation();
  }

  function resample(): void {
    if (engine.isSampling()) {
      worker.request();
    }
  }

  function animate(): void {
    animationPhase = (animationPhase + 1) % Number.MAX_SAFE_INTEGER;
    alarmIntensity = stepAlarmIntensity(alarmIntensity, machine.view().alarm.active);
    refreshAnimation();
  }

  /**
   * Install, replace or cancel the animation job to match the current look
   */
  function refreshAnimation(): void {
    if (!running) {
      return;
    }
    const view = machine.view();
    const intervalMs = cadence({
      mode: view.mode,
      style: settings.style,
      alarmActive: view.alarm.active,
      alarmIntensity
    });

    if (intervalMs === scheduler.intervalOf(JOB_ANIMATION)) {
      return;
    }
    if (intervalMs === null) {
      scheduler.cancel(JOB_ANIMATION);
    } else {
      scheduler.schedule(JOB_ANIMATION, intervalMs, animate);
    }
  }

  function resampleIntervalMs(): number {
    return settings.screen_sampling.update_interval * 1000;
  }

  // ═══════════════════════════════════════════════════════════════
  // LIFECYCLE
  // ═══════════════════════════════════════════════════════════════

  function enterMode(mode: DisplayMode, duration: string | null): void {
    machine.start(mode, duration, clock());
    logger.info(`${tag} Mode ${mode}${duration === null ? '' : ' (' + duration + ')'}`);
    refreshAnimation();
  }

  function start(): void {
    if (running || scheduler.isStopped()) {
      return;
    }
    running = true;
    scheduler.schedule(JOB_TICK, config.tickIntervalMs, tick);
    scheduler.schedule(JOB_RESAMPLE, resampleIntervalMs(), resample);
    refreshAnimation();
  }

  function stop(): void {
    running = false;
    scheduler.stop();
    worker.stop();
  }

  // ═══════════════════════════════════════════════════════════════
  // COMMANDS
  // ═══════════════════════════════════════════════════════════════

  async function reloadConfig(): Promise<ReloadResult> {
    const next = await deps.settingsSource.load();
    const intervalChanged = next.screen_sampling.update_interval !== settings.screen_sampling.update_interval;

    settings = next;
    engine.reload(engineValuesFrom(next));
    if (intervalChanged && scheduler.intervalOf(JOB_RESAMPLE) !== null) {
      scheduler.schedule(JOB_RESAMPLE, resampleIntervalMs(), resample);
    }
    refreshAnimation();

    logger.info(`${tag} Settings reloaded`);
    return { color: settings.color, style: settings.style };
  }

  function status(): StatusPayload {
    return buildStatus(machine.view(), engine.getEffective(), engine.getStatus(), settings);
  }

  function triggerAlarm(request: AlarmRequest): AlarmAck {
    machine.triggerAlarm(request, clock());
    logger.info(`${tag} Alarm [${request.sourceClass}] ${request.title}: ${request.message}`);
    refreshAnimation();
    return { alarm: true, message: request.message };
  }

  function dismissAlarm(): AlarmAck {
    machine.dismissAlarm();
    refreshAnimation();
    return { alarm: false };
  }

  function resetDeadline(): { mode: DisplayMode } {
    machine.resetDeadline();
    refreshAnimation();
    return { mode: machine.view().mode };
  }

  function toggleSampling(): ToggleResult {
    const result = engine.toggle();
    if (result.changed) {
      logger.info(`${tag} Screen sampling ${result.enabled ? 'enabled' : 'disabled'}`);
    }
    return result;
  }

  function snapshot(): RenderSnapshot {
    const view = machine.view();
    return {
      mode: view.mode,
      remaining: view.remainingMs === null ? null : formatHms(view.remainingMs),
      urgency: view.urgency,
      finished: view.finished,
      alarm: view.alarm,
      color: toHex(engine.getEffective().rgb),
      animationPhase,
      alarmIntensity
    };
  }

  return {
    id: config.id,
    enterMode,
    start,
    stop,
    reloadConfig,
    status,
    triggerAlarm,
    dismissAlarm,
    resetDeadline,
    toggleSampling,
    snapshot
  };
}
