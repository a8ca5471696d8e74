/**
 * Adaptive overlay color
 *
 * Each sampled background color is mapped to a readable contrast color.
 * A new color is applied only when it is far enough from the current one
 * AND enough time has passed since the last change; either gate alone is
 * not enough. Repeated sampler failures degrade the engine to its last
 * color with sampling off until it is toggled back on.
 */

import type { EpochMs } from '$types/common';
import type {
  ColorEngine,
  ColorEngineConfig,
  ColorEngineReload,
  EffectiveColor,
  OfferResult,
  SampleOutcome,
  SamplingStatus,
  ToggleResult
} from './types';
import { colorDistance, computeContrastColor } from './helpers';

/**
 * Create a color engine
 *
 * @param config - Initial colors and sampling parameters
 * @returns Color engine instance
 *
 * @example
 * const engine = createColorEngine({ ...config, enabled: true });
 * engine.offer({ ok: true, sample: { rgb, sampledAt: now } }, now);
 * engine.getEffective().rgb;
 */
export function createColorEngine(config: ColorEngineConfig): ColorEngine {
  let baseColor = config.baseColor;
  let backgroundColor = config.backgroundColor;
  let updateIntervalMs = config.updateIntervalMs;
  let throttleThreshold = config.throttleThreshold;
  const locked = config.fixedColor !== null;

  let effective: EffectiveColor = { rgb: config.fixedColor ?? baseColor, changedAt: null };
  let enabled = config.enabled && !locked;
  let degraded = false;
  let failures = 0;

  function applyFailure(): OfferResult {
    failures++;
    if (failures >= config.maxFailures) {
      enabled = false;
      degraded = true;
    }
    return { kind: 'failed', failures, degraded };
  }

  /**
   * Offer a sampling outcome to the engine
   *
   * Outcomes arriving while sampling is off are ignored, so a sample
   * that was in flight when sampling got toggled off changes nothing.
   */
  function offer(outcome: SampleOutcome, nowMs: EpochMs): OfferResult {
    if (!enabled) {
      return { kind: 'ignored' };
    }
    if (!outcome.ok) {
      return applyFailure();
    }

    failures = 0;
    const candidate = computeContrastColor(
      outcome.sample.rgb,
      backgroundColor,
      config.minLuminanceDelta
    );
    const distance = colorDistance(candidate, effective.rgb);

    if (distance < throttleThreshold) {
      return { kind: 'suppressed', reason: 'distance', distance };
    }
    if (effective.changedAt !== null && nowMs - effective.changedAt < updateIntervalMs) {
      return { kind: 'suppressed', reason: 'interval', distance };
    }

    effective = { rgb: candidate, changedAt: nowMs };
    return { kind: 'applied', rgb: candidate, distance };
  }

  /**
   * Flip adaptive sampling. Turning it back on clears degradation.
   * A locked engine stays off.
   */
  function toggle(): ToggleResult {
    if (locked) {
      return { enabled: false, changed: false, locked: true };
    }
    enabled = !enabled;
    if (enabled) {
      degraded = false;
      failures = 0;
    }
    return { enabled, changed: true, locked: false };
  }

  /**
   * Apply reloaded settings.
   *
   * While sampling is off, a color frozen from earlier samples survives
   * a reload; only a changed base color, or a base color never replaced
   * by a sample, is shown. While adapting, the next sample decides.
   */
  function reload(values: ColorEngineReload): void {
    const baseChanged = values.baseColor.r !== baseColor.r ||
      values.baseColor.g !== baseColor.g ||
      values.baseColor.b !== baseColor.b;
    baseColor = values.baseColor;
    backgroundColor = values.backgroundColor;
    updateIntervalMs = values.updateIntervalMs;
    throttleThreshold = values.throttleThreshold;

    if (!locked && !enabled && (baseChanged || effective.changedAt === null)) {
      effective = { rgb: baseColor, changedAt: effective.changedAt };
    }
  }

  function getEffective(): EffectiveColor {
    return effective;
  }

  function getStatus(): SamplingStatus {
    return { enabled, degraded, failures, locked };
  }

  function isSampling(): boolean {
    return enabled;
  }

  return {
    offer,
    toggle,
    reload,
    getEffective,
    getStatus,
    isSampling
  };
}
