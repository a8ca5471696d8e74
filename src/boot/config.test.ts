/**
 * Tests for app constants and environment overrides
 */

import { APP_CONSTANTS, DEFAULT_SETTINGS, resolveAppConstants } from './config';
import { readSettings } from '@validation';

describe('DEFAULT_SETTINGS', () => {
  test('should pass settings validation without warnings', () => {
    const result = readSettings({ ...DEFAULT_SETTINGS }, DEFAULT_SETTINGS);

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([]);
  });

  test('should start with sampling off', () => {
    expect(DEFAULT_SETTINGS.screen_sampling.enabled).toBe(false);
  });
});

describe('resolveAppConstants', () => {
  test('should return base constants when no override is set', () => {
    const { constants, warnings } = resolveAppConstants({});

    expect(constants).toEqual(APP_CONSTANTS);
    expect(warnings).toEqual([]);
  });

  test('should apply path and command overrides', () => {
    const { constants } = resolveAppConstants({
      INTIME_SOCKET_PATH: '/tmp/other.sock',
      INTIME_LOG_FILE: '/tmp/intime.log',
      INTIME_CONFIG_PATH: '/tmp/config.json',
      INTIME_SAMPLER_COMMAND: 'grab-color',
      INTIME_SAMPLER_ARGS: ' --center  --size 40 '
    });

    expect(constants.SOCKET_PATH).toBe('/tmp/other.sock');
    expect(constants.LOG_FILE).toBe('/tmp/intime.log');
    expect(constants.SETTINGS_PATH).toBe('/tmp/config.json');
    expect(constants.SAMPLER_COMMAND).toBe('grab-color');
    expect(constants.SAMPLER_ARGS).toEqual(['--center', '--size', '40']);
  });

  test('should treat blank overrides as unset', () => {
    const { constants } = resolveAppConstants({ INTIME_SOCKET_PATH: '   ', INTIME_SAMPLER_COMMAND: '' });

    expect(constants.SOCKET_PATH).toBe(APP_CONSTANTS.SOCKET_PATH);
    expect(constants.SAMPLER_COMMAND).toBeNull();
  });

  test('should parse log level names', () => {
    expect(resolveAppConstants({ INTIME_LOG_LEVEL: 'debug' }).constants.LOG_LEVEL).toBe(0);
    expect(resolveAppConstants({ INTIME_LOG_LEVEL: 'WARNING' }).constants.LOG_LEVEL).toBe(2);
  });

  test('should warn and keep default for unknown log level', () => {
    const { constants, warnings } = resolveAppConstants({ INTIME_LOG_LEVEL: 'loud' });

    expect(constants.LOG_LEVEL).toBe(APP_CONSTANTS.LOG_LEVEL);
    expect(warnings).toEqual(["INTIME_LOG_LEVEL 'loud' is not a log level"]);
  });

  test('should accept a positive alarm timeout', () => {
    expect(resolveAppConstants({ INTIME_ALARM_TIMEOUT_SEC: '12.5' }).constants.ALARM_TIMEOUT_SEC).toBe(12.5);
  });

  test('should reject a non-positive alarm timeout', () => {
    const { constants, warnings } = resolveAppConstants({ INTIME_ALARM_TIMEOUT_SEC: '0' });

    expect(constants.ALARM_TIMEOUT_SEC).toBe(30);
    expect(warnings).toEqual(["INTIME_ALARM_TIMEOUT_SEC '0' must be a positive number"]);
  });

  test('should not mutate the base constants', () => {
    resolveAppConstants({ INTIME_SOCKET_PATH: '/tmp/other.sock' });

    expect(APP_CONSTANTS.SOCKET_PATH).toBe('/tmp/intime_widget.sock');
  });
});
