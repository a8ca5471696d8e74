/**
 * Common type definitions used throughout the project
 */

/**
 * RGB triple, each channel an integer in [0, 255]
 */
export interface Rgb {
  r: number;
  g: number;
  b: number;
}

/**
 * Display mode of one overlay instance
 */
export type DisplayMode = 'clock' | 'countdown' | 'midnight' | 'deadline';

/**
 * Every display mode, in declaration order
 */
export const DISPLAY_MODES: readonly DisplayMode[] = ['clock', 'countdown', 'midnight', 'deadline'];

/**
 * Rendering style from the settings document
 */
export type DisplayStyle = 'normal' | 'bordered' | 'lightbulb';

/**
 * Timestamp in milliseconds since epoch
 */
export type EpochMs = number;

/**
 * Narrow an arbitrary string to a display mode
 */
export function isDisplayMode(value: string): value is DisplayMode {
  return DISPLAY_MODES.some(function(mode) { return mode === value; });
}
