import { createInstanceRegistry, COMMAND_ROUTES } from './registry';
import type { OverlayInstance, StatusPayload } from '@system/instance';
import type { Logger } from '@logging';
import { ProtocolError } from '$types/errors';

function createMockLogger(): Logger {
  return {
    log: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warning: vi.fn(),
    critical: vi.fn(),
    setLevel: vi.fn(),
    getLevel: vi.fn(),
    initialize: vi.fn(),
    close: vi.fn()
  };
}

const STATUS: StatusPayload = {
  mode: 'clock',
  alarm: false,
  urgency: 0,
  finished: false,
  color: '#ffffff',
  sampling: { enabled: false, degraded: false, failures: 0, locked: false },
  config: {
    color: '#FFFFFF',
    font_size: 78,
    opacity: 0.5,
    style: 'normal',
    position_mode: 'preset',
    position_preset: 'center'
  }
};

function fakeInstance(id: number): OverlayInstance {
  return {
    id,
    enterMode: vi.fn(),
    start: vi.fn(),
    stop: vi.fn(),
    reloadConfig: vi.fn(() => Promise.resolve({ color: '#FFFFFF', style: 'normal' as const })),
    status: vi.fn(() => STATUS),
    triggerAlarm: vi.fn(() => ({ alarm: true, message: 'Back to work' })),
    dismissAlarm: vi.fn(() => ({ alarm: false })),
    resetDeadline: vi.fn(() => ({ mode: 'clock' as const })),
    toggleSampling: vi.fn(() => ({ enabled: true, changed: true, locked: false })),
    snapshot: vi.fn()
  };
}

describe('createInstanceRegistry', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = createMockLogger();
  });

  describe('COMMAND_ROUTES', () => {
    it('should keep status and sampling toggle local', () => {
      expect(COMMAND_ROUTES.status).toBe('local');
      expect(COMMAND_ROUTES.toggle_screen_sampling).toBe('local');
    });

    it('should broadcast the other four commands', () => {
      expect(COMMAND_ROUTES).toEqual({
        status: 'local',
        toggle_screen_sampling: 'local',
        reload_config: 'broadcast',
        forbidden_alarm: 'broadcast',
        dismiss_alarm: 'broadcast',
        reset_deadline: 'broadcast'
      });
    });
  });

  it('should register and look up instances', () => {
    const registry = createInstanceRegistry(logger);
    const a = fakeInstance(0);
    registry.register(a);

    expect(registry.get(0)).toBe(a);
    expect(registry.get(1)).toBeNull();
    expect(() => registry.register(fakeInstance(0))).toThrow('Instance 0 is already registered');
    expect(registry.unregister(0)).toBe(true);
    expect(registry.list()).toEqual([]);
  });

  it('should run local commands on the receiving instance only', async () => {
    const registry = createInstanceRegistry(logger);
    const a = fakeInstance(0);
    const b = fakeInstance(1);
    registry.register(a);
    registry.register(b);

    const result = await registry.dispatch({ name: 'toggle_screen_sampling' }, 1);

    expect(result).toEqual({ route: 'local', result: { enabled: true, changed: true, locked: false } });
    expect(b.toggleSampling).toHaveBeenCalledTimes(1);
    expect(a.toggleSampling).not.toHaveBeenCalled();
  });

  it('should broadcast to every instance in registration order', async () => {
    const registry = createInstanceRegistry(logger);
    const a = fakeInstance(0);
    const b = fakeInstance(1);
    registry.register(a);
    registry.register(b);

    const alarm = { sourceClass: 'Work', title: 'Focus', message: 'Back to work' };
    const result = await registry.dispatch({ name: 'forbidden_alarm', alarm }, 0);

    expect(result).toEqual({
      route: 'broadcast',
      outcomes: [
        { instance: 0, ok: true, result: { alarm: true, message: 'Back to work' } },
        { instance: 1, ok: true, result: { alarm: true, message: 'Back to work' } }
      ]
    });
    expect(a.triggerAlarm).toHaveBeenCalledWith(alarm);
    expect(b.triggerAlarm).toHaveBeenCalledWith(alarm);
  });

  it('should report a failing instance without stopping the broadcast', async () => {
    const registry = createInstanceRegistry(logger);
    const a = fakeInstance(0);
    const b = fakeInstance(1);
    a.reloadConfig = vi.fn(() => Promise.reject(new Error('config.json: bad json')));
    registry.register(a);
    registry.register(b);

    const result = await registry.dispatch({ name: 'reload_config' }, 0);

    expect(result).toEqual({
      route: 'broadcast',
      outcomes: [
        { instance: 0, ok: false, error: 'config.json: bad json' },
        { instance: 1, ok: true, result: { color: '#FFFFFF', style: 'normal' } }
      ]
    });
    expect(logger.warning).toHaveBeenCalledWith('[Registry] reload_config failed on instance 0: config.json: bad json');
  });

  it('should reject commands when nothing is registered', async () => {
    const registry = createInstanceRegistry(logger);

    await expect(registry.dispatch({ name: 'dismiss_alarm' }, 0)).rejects.toThrow(ProtocolError);
    await expect(registry.dispatch({ name: 'status' }, 0)).rejects.toMatchObject({ reason: 'no_instances' });
  });
});
