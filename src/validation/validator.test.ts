/**
 * Tests for settings validator
 */

import type { OverlaySettings } from '$types/config';

import { readSettings } from './validator';

const DEFAULTS: OverlaySettings = {
  color: '#FFFFFF',
  font_size: 78,
  opacity: 0.5,
  style: 'normal',
  background_color: '#000000',
  position_mode: 'preset',
  position_preset: 'center',
  position_x: 0,
  position_y: 0,
  screen_sampling: { enabled: false, update_interval: 0.5, throttle_threshold: 15 }
};

describe('readSettings', () => {
  it('should return defaults for an empty document', () => {
    const result = readSettings({}, DEFAULTS);

    expect(result.valid).toBe(true);
    expect(result.settings).toEqual(DEFAULTS);
    expect(result.warnings).toHaveLength(0);
  });

  it('should apply valid overrides', () => {
    const result = readSettings({ color: '#00ff00', style: 'lightbulb', opacity: 0.8 }, DEFAULTS);

    expect(result.valid).toBe(true);
    expect(result.settings.color).toBe('#00ff00');
    expect(result.settings.style).toBe('lightbulb');
    expect(result.settings.opacity).toBe(0.8);
    expect(result.settings.font_size).toBe(78);
  });

  it('should merge screen_sampling field by field', () => {
    const result = readSettings({ screen_sampling: { enabled: true } }, DEFAULTS);

    expect(result.settings.screen_sampling).toEqual({ enabled: true, update_interval: 0.5, throttle_threshold: 15 });
  });

  it('should keep defaults for invalid fields and report them', () => {
    const result = readSettings({ opacity: 2, style: 'neon', color: 'white' }, DEFAULTS);

    expect(result.valid).toBe(false);
    expect(result.settings.opacity).toBe(0.5);
    expect(result.settings.style).toBe('normal');
    expect(result.settings.color).toBe('#FFFFFF');
    expect(result.errors.map(function(e) { return e.field; })).toEqual(['color', 'opacity', 'style']);
  });

  it('should reject a non-object screen_sampling block', () => {
    const result = readSettings({ screen_sampling: true }, DEFAULTS);

    expect(result.valid).toBe(false);
    expect(result.errors[0]).toEqual({
      level: 'CRITICAL',
      field: 'screen_sampling',
      message: 'screen_sampling must be an object'
    });
  });

  it('should validate nested sampling ranges', () => {
    const result = readSettings({ screen_sampling: { update_interval: 0, throttle_threshold: 200 } }, DEFAULTS);

    expect(result.errors[0].field).toBe('screen_sampling.update_interval');
    expect(result.warnings[0].field).toBe('screen_sampling.throttle_threshold');
    expect(result.settings.screen_sampling.throttle_threshold).toBe(200);
  });

  it('should warn about unknown keys', () => {
    const result = readSettings({ colour: '#ffffff' }, DEFAULTS);

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([{ level: 'WARNING', field: 'colour', message: 'Unknown setting ignored' }]);
  });

  it('should accept every style and position preset', () => {
    for (const style of ['normal', 'bordered', 'lightbulb']) {
      expect(readSettings({ style }, DEFAULTS).valid).toBe(true);
    }
    for (const preset of ['center', 'top', 'bottom']) {
      expect(readSettings({ position_preset: preset }, DEFAULTS).settings.position_preset).toBe(preset);
    }
  });

  it('should reject corner presets', () => {
    const result = readSettings({ position_preset: 'top-left' }, DEFAULTS);

    expect(result.valid).toBe(false);
    expect(result.settings.position_preset).toBe('center');
  });

  it('should skip underscore comment keys silently', () => {
    const result = readSettings({ _comment: 'generated', _docs: 'see README' }, DEFAULTS);

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([]);
  });

  it('should reject documents that are not objects', () => {
    const result = readSettings([1, 2], DEFAULTS);

    expect(result.valid).toBe(false);
    expect(result.settings).toBe(DEFAULTS);
  });
});
