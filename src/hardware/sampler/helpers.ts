/**
 * Sampler output parsing
 */

import type { Rgb } from '$types/common';
import { parseHexColor } from '@core/color';

const HEX_TOKEN = /#[0-9a-f]{6}\b/i;
const TRIPLE_TOKEN = /\b(\d{1,3})\s*,\s*(\d{1,3})\s*,\s*(\d{1,3})\b/;

/**
 * Extract the first color from sampler output
 *
 * Accepts `#rrggbb` anywhere in the text, otherwise an `r,g,b` triple.
 *
 * @param stdout - Raw command output
 * @returns Parsed color, or null when none is found
 */
export function parseColorOutput(stdout: string): Rgb | null {
  const hex = HEX_TOKEN.exec(stdout);
  if (hex) {
    return parseHexColor(hex[0]);
  }

  const triple = TRIPLE_TOKEN.exec(stdout);
  if (!triple) {
    return null;
  }
  const channels = [triple[1], triple[2], triple[3]].map(function(c) { return parseInt(c, 10); });
  if (channels.some(function(c) { return c > 255; })) {
    return null;
  }
  return { r: channels[0], g: channels[1], b: channels[2] };
}
