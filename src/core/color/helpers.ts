/**
 * Color math: parsing, HSV conversion, luminance and perceptual distance
 */

import type { Rgb } from '$types/common';
import type { Hsv } from './types';

const HEX_PATTERN = /^#?([0-9a-f]{6})$/i;
const CHANNEL_MAX = 255;
const CONTRAST_STEPS = 20;

export const WHITE: Rgb = { r: 255, g: 255, b: 255 };
export const BLACK: Rgb = { r: 0, g: 0, b: 0 };

/**
 * Parse a `#rrggbb` string
 *
 * @param hex - Color string, leading `#` optional
 * @returns Parsed color, or null when malformed
 */
export function parseHexColor(hex: string): Rgb | null {
  const match = HEX_PATTERN.exec(hex.trim());
  if (!match) {
    return null;
  }
  const value = parseInt(match[1], 16);
  return {
    r: (value >> 16) & 0xff,
    g: (value >> 8) & 0xff,
    b: value & 0xff
  };
}

/**
 * Format a color as lowercase `#rrggbb`
 *
 * @example
 * toHex({ r: 255, g: 128, b: 0 }) // '#ff8000'
 */
export function toHex(rgb: Rgb): string {
  const channel = (n: number): string => n.toString(16).padStart(2, '0');
  return '#' + channel(rgb.r) + channel(rgb.g) + channel(rgb.b);
}

/**
 * Convert RGB (0-255) to HSV
 */
export function rgbToHsv(rgb: Rgb): Hsv {
  const r = rgb.r / CHANNEL_MAX;
  const g = rgb.g / CHANNEL_MAX;
  const b = rgb.b / CHANNEL_MAX;
  const max = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  const delta = max - min;

  let h = 0;
  if (delta > 0) {
    if (max === r) {
      h = 60 * (((g - b) / delta) % 6);
    } else if (max === g) {
      h = 60 * ((b - r) / delta + 2);
    } else {
      h = 60 * ((r - g) / delta + 4);
    }
  }
  if (h < 0) {
    h += 360;
  }

  return { h, s: max === 0 ? 0 : delta / max, v: max };
}

/**
 * Convert HSV to RGB, channels rounded to integers
 */
export function hsvToRgb(hsv: Hsv): Rgb {
  const h = ((hsv.h % 360) + 360) % 360;
  const c = hsv.v * hsv.s;
  const x = c * (1 - Math.abs(((h / 60) % 2) - 1));
  const m = hsv.v - c;

  let r = 0;
  let g = 0;
  let b = 0;
  if (h < 60) {
    r = c; g = x;
  } else if (h < 120) {
    r = x; g = c;
  } else if (h < 180) {
    g = c; b = x;
  } else if (h < 240) {
    g = x; b = c;
  } else if (h < 300) {
    r = x; b = c;
  } else {
    r = c; b = x;
  }

  return {
    r: Math.round((r + m) * CHANNEL_MAX),
    g: Math.round((g + m) * CHANNEL_MAX),
    b: Math.round((b + m) * CHANNEL_MAX)
  };
}

/**
 * Relative luminance (BT.709 weights) on a 0-1 scale
 */
export function relativeLuminance(rgb: Rgb): number {
  return (0.2126 * rgb.r + 0.7152 * rgb.g + 0.0722 * rgb.b) / CHANNEL_MAX;
}

/**
 * Perceptual distance between two colors ("redmean" weighting)
 *
 * Ranges from 0 to roughly 765 (black against white).
 */
export function colorDistance(a: Rgb, b: Rgb): number {
  const rMean = (a.r + b.r) / 2;
  const dr = a.r - b.r;
  const dg = a.g - b.g;
  const db = a.b - b.b;
  return Math.sqrt(
    (2 + rMean / 256) * dr * dr +
    4 * dg * dg +
    (2 + (255 - rMean) / 256) * db * db
  );
}

/**
 * Complementary color: hue rotated by 180 degrees
 */
export function complementary(rgb: Rgb): Rgb {
  const hsv = rgbToHsv(rgb);
  return hsvToRgb({ h: hsv.h + 180, s: hsv.s, v: hsv.v });
}

/**
 * Pick a readable text color for a sampled background
 *
 * Starts from the complementary hue. If its luminance sits within
 * `minDelta` of the background, brightness is stepped away from the
 * background (then saturation, when lightening) keeping the hue.
 * Falls back to white or black.
 *
 * @param sample - Dominant screen color
 * @param background - Reference background color
 * @param minDelta - Required luminance difference, at most 0.5
 * @returns Color that meets the luminance constraint
 */
export function computeContrastColor(sample: Rgb, background: Rgb, minDelta: number): Rgb {
  const target = rgbToHsv(complementary(sample));
  const bgLum = relativeLuminance(background);
  const readable = (c: Rgb): boolean => Math.abs(relativeLuminance(c) - bgLum) >= minDelta;
  const towardLight = bgLum < 0.5;

  for (let step = 0; step <= CONTRAST_STEPS; step++) {
    const t = step / CONTRAST_STEPS;
    const v = towardLight ? target.v + (1 - target.v) * t : target.v * (1 - t);
    const candidate = hsvToRgb({ h: target.h, s: target.s, v });
    if (readable(candidate)) {
      return candidate;
    }
  }

  if (towardLight) {
    // Saturated dark hues (pure blue) never get bright enough at full value
    for (let step = 1; step <= CONTRAST_STEPS; step++) {
      const s = target.s * (1 - step / CONTRAST_STEPS);
      const candidate = hsvToRgb({ h: target.h, s, v: 1 });
      if (readable(candidate)) {
        return candidate;
      }
    }
  }

  return towardLight ? WHITE : BLACK;
}
