/**
 * Color engine type definitions
 *
 * The engine turns screen samples into a readable overlay color and
 * decides when the displayed color is allowed to change.
 */

import type { EpochMs, Rgb } from '$types/common';

/**
 * Color in HSV space
 */
export interface Hsv {
  /** Hue in degrees, 0 to 360 */
  h: number;

  /** Saturation, 0 to 1 */
  s: number;

  /** Value (brightness), 0 to 1 */
  v: number;
}

/**
 * Dominant color read from the screen region behind an overlay
 */
export interface ColorSample {
  rgb: Rgb;
  sampledAt: EpochMs;
}

/**
 * Result of one background sampling attempt
 */
export type SampleOutcome =
  | { ok: true; sample: ColorSample }
  | { ok: false; error: string; at: EpochMs };

/**
 * Color currently applied to the overlay
 */
export interface EffectiveColor {
  rgb: Rgb;

  /** When the color last changed, null if it never has */
  changedAt: EpochMs | null;
}

/**
 * Color engine configuration
 */
export interface ColorEngineConfig {
  // ───────────────────────────────────────────────────────────────
  // COLORS
  // ───────────────────────────────────────────────────────────────

  /** Color shown while adaptive sampling is off */
  baseColor: Rgb;

  /** Reference background used for the luminance contrast check */
  backgroundColor: Rgb;

  /** Explicit color override; locks the engine when set */
  fixedColor: Rgb | null;

  // ───────────────────────────────────────────────────────────────
  // SAMPLING
  // ───────────────────────────────────────────────────────────────

  /** Whether adaptive sampling starts enabled */
  enabled: boolean;

  /** Minimum time between two applied color changes */
  updateIntervalMs: number;

  /** Minimum perceptual distance for a change to be applied */
  throttleThreshold: number;

  /** Minimum luminance difference against the background, 0 to 0.5 */
  minLuminanceDelta: number;

  /** Consecutive failures after which sampling degrades to off */
  maxFailures: number;
}

/**
 * Values a settings reload may change on a running engine
 */
export type ColorEngineReload = Pick<
  ColorEngineConfig,
  'baseColor' | 'backgroundColor' | 'updateIntervalMs' | 'throttleThreshold'
>;

/**
 * What happened to an offered sample outcome
 */
export type OfferResult =
  | { kind: 'applied'; rgb: Rgb; distance: number }
  | { kind: 'suppressed'; reason: 'distance' | 'interval'; distance: number }
  | { kind: 'failed'; failures: number; degraded: boolean }
  | { kind: 'ignored' };

/**
 * Sampling status reported to clients
 */
export interface SamplingStatus {
  enabled: boolean;
  degraded: boolean;
  failures: number;
  locked: boolean;
}

/**
 * Result of toggling adaptive sampling
 */
export interface ToggleResult {
  enabled: boolean;
  changed: boolean;
  locked: boolean;
}

/**
 * Color engine instance
 */
export interface ColorEngine {
  offer: (outcome: SampleOutcome, nowMs: EpochMs) => OfferResult;
  toggle: () => ToggleResult;
  reload: (values: ColorEngineReload) => void;
  getEffective: () => EffectiveColor;
  getStatus: () => SamplingStatus;
  isSampling: () => boolean;
}
