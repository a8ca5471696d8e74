/**
 * Tests for command line option parsing
 */

import { CommanderError } from 'commander';

import { parseBootOptions } from './cli';

function argv(...args: string[]): string[] {
  return ['node', 'main.ts', ...args];
}

describe('parseBootOptions', () => {
  beforeEach(() => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  test('should default to one clock instance', () => {
    expect(parseBootOptions(argv())).toEqual({ mode: 'clock', duration: null, instances: 1, fixedColor: null, overrides: {} });
  });

  test('should parse mode, duration, instances and color', () => {
    const options = parseBootOptions(argv('--mode', 'countdown', '-d', '25m', '-n', '2', '--color', '#00ff80'));

    expect(options).toEqual({
      mode: 'countdown',
      duration: '25m',
      instances: 2,
      fixedColor: { r: 0, g: 255, b: 128 },
      overrides: { color: '#00ff80' }
    });
  });

  test('should reject an unknown mode', () => {
    expect(() => parseBootOptions(argv('--mode', 'stopwatch'))).toThrow(CommanderError);
  });

  test('should reject a zero instance count', () => {
    expect(() => parseBootOptions(argv('-n', '0'))).toThrow(CommanderError);
  });

  test('should turn display options into settings overrides', () => {
    const options = parseBootOptions(argv('--style', 'lightbulb', '--font-size', '120', '--opacity', '0.7', '--position', 'bottom'));

    expect(options.overrides).toEqual({
      style: 'lightbulb',
      font_size: 120,
      opacity: 0.7,
      position_mode: 'preset',
      position_preset: 'bottom'
    });
  });

  test('should switch to custom placement for coordinates', () => {
    expect(parseBootOptions(argv('--position-x', '100', '--position-y', '50')).overrides).toEqual({
      position_mode: 'custom',
      position_x: 100,
      position_y: 50
    });
    expect(parseBootOptions(argv('--position-y', '40')).overrides).toEqual({ position_mode: 'custom', position_y: 40 });
  });

  test('should reject a preset combined with coordinates', () => {
    expect(() => parseBootOptions(argv('--position', 'top', '--position-x', '10'))).toThrow(CommanderError);
  });

  test('should reject out-of-range display values', () => {
    expect(() => parseBootOptions(argv('--style', 'neon'))).toThrow(CommanderError);
    expect(() => parseBootOptions(argv('--opacity', '1.5'))).toThrow(CommanderError);
    expect(() => parseBootOptions(argv('--font-size', '12.5'))).toThrow(CommanderError);
    expect(() => parseBootOptions(argv('--position', 'top-left'))).toThrow(CommanderError);
  });

  test('should reject a malformed color', () => {
    expect(() => parseBootOptions(argv('--color', 'blue'))).toThrow(CommanderError);
  });
});
