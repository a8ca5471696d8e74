/**
 * Command line option parsing for the control plane entry point
 */

import { Command, InvalidArgumentError } from 'commander';

import { isDisplayMode } from '$types/common';
import type { DisplayMode, DisplayStyle, Rgb } from '$types/common';
import type { PositionPreset } from '$types/config';
import { parseHexColor, toHex } from '@core/color';
import type { BootOptions, SettingsOverrides } from './types';

const STYLES: readonly DisplayStyle[] = ['normal', 'bordered', 'lightbulb'];
const PRESETS: readonly PositionPreset[] = ['center', 'top', 'bottom'];

function parseMode(value: string): DisplayMode {
  if (!isDisplayMode(value)) {
    throw new InvalidArgumentError('Expected clock, countdown, midnight or deadline.');
  }
  return value;
}

function parseColor(value: string): Rgb {
  const rgb = parseHexColor(value);
  if (rgb === null) {
    throw new InvalidArgumentError('Expected a #rrggbb color.');
  }
  return rgb;
}

function parseStyle(value: string): DisplayStyle {
  const style = STYLES.find(function(s) { return s === value; });
  if (style === undefined) {
    throw new InvalidArgumentError('Expected normal, bordered or lightbulb.');
  }
  return style;
}

function parsePreset(value: string): PositionPreset {
  const preset = PRESETS.find(function(p) { return p === value; });
  if (preset === undefined) {
    throw new InvalidArgumentError('Expected top, center or bottom.');
  }
  return preset;
}

function integerParser(min: number, max: number): (value: string) => number {
  return function(value: string): number {
    const n = Number(value);
    if (value.trim() === '' || !Number.isInteger(n) || n < min || n > max) {
      throw new InvalidArgumentError(`Expected an integer from ${min} to ${max}.`);
    }
    return n;
  };
}

function parseOpacity(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n) || n < 0 || n > 1) {
    throw new InvalidArgumentError('Expected a number from 0 to 1.');
  }
  return n;
}

interface ParsedOptions {
  mode: DisplayMode;
  duration?: string;
  instances: number;
  color?: Rgb;
  style?: DisplayStyle;
  fontSize?: number;
  opacity?: number;
  position?: PositionPreset;
  positionX?: number;
  positionY?: number;
}

function overridesFrom(opts: ParsedOptions): SettingsOverrides {
  const overrides: SettingsOverrides = {};
  if (opts.color !== undefined) overrides.color = toHex(opts.color);
  if (opts.style !== undefined) overrides.style = opts.style;
  if (opts.fontSize !== undefined) overrides.font_size = opts.fontSize;
  if (opts.opacity !== undefined) overrides.opacity = opts.opacity;
  if (opts.position !== undefined) {
    overrides.position_mode = 'preset';
    overrides.position_preset = opts.position;
  }
  if (opts.positionX !== undefined || opts.positionY !== undefined) {
    overrides.position_mode = 'custom';
    if (opts.positionX !== undefined) overrides.position_x = opts.positionX;
    if (opts.positionY !== undefined) overrides.position_y = opts.positionY;
  }
  return overrides;
}

/**
 * Parse argv into boot options
 *
 * Display options (style, font size, opacity, position, color) become
 * settings overrides that win over config.json.
 *
 * @param argv - Full process argv (node, script, ...args)
 * @returns Parsed options
 * @throws {CommanderError} On invalid or conflicting options (after printing usage)
 *
 * @example
 * ```typescript
 * parseBootOptions(['node', 'main.ts', '--mode', 'countdown', '--duration', '25m', '--position', 'top']);
 * // { mode: 'countdown', duration: '25m', instances: 1, fixedColor: null,
 * //   overrides: { position_mode: 'preset', position_preset: 'top' } }
 * ```
 */
export function parseBootOptions(argv: string[]): BootOptions {
  const program = new Command()
    .name('intime')
    .description('Overlay time display control plane')
    .option('-m, --mode <mode>', 'Start mode: clock, countdown, midnight or deadline', parseMode, 'clock')
    .option('-d, --duration <duration>', 'Countdown or deadline duration (e.g. 25m, 1h30m, 90)')
    .option('-n, --instances <count>', 'Number of overlay instances', integerParser(1, 16), 1)
    .option('-c, --color <hex>', 'Fixed text color (#rrggbb); disables screen sampling', parseColor)
    .option('-s, --style <style>', 'Visual style: normal, bordered or lightbulb', parseStyle)
    .option('--font-size <px>', 'Font size', integerParser(8, 400))
    .option('--opacity <value>', 'Text opacity (0 to 1)', parseOpacity)
    .option('--position <preset>', 'Position preset: top, center or bottom', parsePreset)
    .option('--position-x <px>', 'Custom X position in pixels', integerParser(0, 100000))
    .option('--position-y <px>', 'Custom Y position in pixels', integerParser(0, 100000))
    .exitOverride()
    .parse(argv);

  const opts = program.opts<ParsedOptions>();

  if (opts.position !== undefined && (opts.positionX !== undefined || opts.positionY !== undefined)) {
    program.error('error: cannot use --position together with --position-x/--position-y');
  }

  return {
    mode: opts.mode,
    duration: opts.duration ?? null,
    instances: opts.instances,
    fixedColor: opts.color ?? null,
    overrides: overridesFrom(opts)
  };
}
