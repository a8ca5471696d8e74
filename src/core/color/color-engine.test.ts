import { createColorEngine } from './color-engine';
import type { ColorEngineConfig, SampleOutcome } from './types';
import type { Rgb } from '$types/common';

const RED: Rgb = { r: 255, g: 0, b: 0 };
const YELLOW: Rgb = { r: 255, g: 255, b: 0 };
const CYAN: Rgb = { r: 0, g: 255, b: 255 };

function sample(rgb: Rgb, at: number): SampleOutcome {
  return { ok: true, sample: { rgb, sampledAt: at } };
}

function failure(at: number): SampleOutcome {
  return { ok: false, error: 'capture failed', at };
}

describe('createColorEngine', () => {
  const config: ColorEngineConfig = {
    baseColor: { r: 255, g: 255, b: 255 },
    backgroundColor: { r: 0, g: 0, b: 0 },
    fixedColor: null,
    enabled: true,
    updateIntervalMs: 1000,
    throttleThreshold: 50,
    minLuminanceDelta: 0.4,
    maxFailures: 3
  };

  it('should start from the base color', () => {
    const engine = createColorEngine(config);
    expect(engine.getEffective()).toEqual({ rgb: config.baseColor, changedAt: null });
    expect(engine.getStatus()).toEqual({ enabled: true, degraded: false, failures: 0, locked: false });
  });

  it('should apply the first distinct sample immediately', () => {
    const engine = createColorEngine(config);
    const result = engine.offer(sample(RED, 1000), 1000);

    expect(result.kind).toBe('applied');
    expect(engine.getEffective()).toEqual({ rgb: CYAN, changedAt: 1000 });
  });

  it('should suppress a distant color until the interval has elapsed', () => {
    const engine = createColorEngine(config);
    engine.offer(sample(RED, 1000), 1000);

    const early = engine.offer(sample(YELLOW, 1500), 1500);
    expect(early).toMatchObject({ kind: 'suppressed', reason: 'interval' });
    expect(engine.getEffective().rgb).toEqual(CYAN);

    const later = engine.offer(sample(YELLOW, 2000), 2000);
    expect(later.kind).toBe('applied');
    expect(engine.getEffective()).toEqual({ rgb: { r: 102, g: 102, b: 255 }, changedAt: 2000 });
  });

  it('should suppress a nearby color however long it has been', () => {
    const engine = createColorEngine(config);
    engine.offer(sample(RED, 1000), 1000);

    const result = engine.offer(sample({ r: 250, g: 0, b: 0 }, 60000), 60000);
    expect(result).toMatchObject({ kind: 'suppressed', reason: 'distance' });
    expect(engine.getEffective()).toEqual({ rgb: CYAN, changedAt: 1000 });
  });

  it('should keep the color and count failures', () => {
    const engine = createColorEngine(config);
    engine.offer(sample(RED, 1000), 1000);

    expect(engine.offer(failure(2000), 2000)).toEqual({ kind: 'failed', failures: 1, degraded: false });
    expect(engine.getEffective().rgb).toEqual(CYAN);
  });

  it('should reset the failure count on success', () => {
    const engine = createColorEngine(config);
    engine.offer(failure(1000), 1000);
    engine.offer(failure(2000), 2000);
    engine.offer(sample(RED, 3000), 3000);

    expect(engine.getStatus().failures).toBe(0);
  });

  it('should degrade after repeated failures and ignore later samples', () => {
    const engine = createColorEngine(config);
    engine.offer(failure(1000), 1000);
    engine.offer(failure(2000), 2000);
    const third = engine.offer(failure(3000), 3000);

    expect(third).toEqual({ kind: 'failed', failures: 3, degraded: true });
    expect(engine.isSampling()).toBe(false);
    expect(engine.offer(sample(RED, 4000), 4000)).toEqual({ kind: 'ignored' });
    expect(engine.getEffective().rgb).toEqual(config.baseColor);
  });

  it('should clear degradation when toggled back on', () => {
    const engine = createColorEngine(config);
    for (let i = 1; i <= 3; i++) {
      engine.offer(failure(i * 1000), i * 1000);
    }

    expect(engine.toggle()).toEqual({ enabled: true, changed: true, locked: false });
    expect(engine.getStatus()).toEqual({ enabled: true, degraded: false, failures: 0, locked: false });
  });

  it('should freeze the color when toggled off', () => {
    const engine = createColorEngine(config);
    engine.offer(sample(RED, 1000), 1000);

    expect(engine.toggle()).toEqual({ enabled: false, changed: true, locked: false });
    expect(engine.offer(sample(YELLOW, 5000), 5000)).toEqual({ kind: 'ignored' });
    expect(engine.getEffective().rgb).toEqual(CYAN);
  });

  it('should stay locked with a fixed color', () => {
    const engine = createColorEngine({ ...config, fixedColor: RED });

    expect(engine.isSampling()).toBe(false);
    expect(engine.toggle()).toEqual({ enabled: false, changed: false, locked: true });
    expect(engine.getEffective().rgb).toEqual(RED);
    expect(engine.offer(sample(YELLOW, 1000), 1000)).toEqual({ kind: 'ignored' });
  });

  describe('reload', () => {
    const values = {
      baseColor: { r: 0, g: 255, b: 0 },
      backgroundColor: { r: 0, g: 0, b: 0 },
      updateIntervalMs: 1000,
      throttleThreshold: 50
    };

    it('should show the new base color while sampling is off', () => {
      const engine = createColorEngine({ ...config, enabled: false });
      engine.reload(values);
      expect(engine.getEffective().rgb).toEqual(values.baseColor);
    });

    it('should keep a frozen adapted color when the base color is unchanged', () => {
      const engine = createColorEngine(config);
      engine.offer(sample(RED, 1000), 1000);
      engine.toggle();

      engine.reload({ ...values, baseColor: config.baseColor });

      expect(engine.getEffective()).toEqual({ rgb: CYAN, changedAt: 1000 });
    });

    it('should keep the color frozen by degradation across a reload', () => {
      const engine = createColorEngine(config);
      engine.offer(sample(RED, 1000), 1000);
      engine.offer(failure(2000), 2000);
      engine.offer(failure(3000), 3000);
      engine.offer(failure(4000), 4000);
      expect(engine.getStatus().degraded).toBe(true);

      engine.reload({ ...values, baseColor: config.baseColor });

      expect(engine.getEffective().rgb).toEqual(CYAN);
    });

    it('should show a changed base color over a frozen adapted color', () => {
      const engine = createColorEngine(config);
      engine.offer(sample(RED, 1000), 1000);
      engine.toggle();

      engine.reload(values);

      expect(engine.getEffective().rgb).toEqual(values.baseColor);
    });

    it('should keep the adapted color while sampling', () => {
      const engine = createColorEngine(config);
      engine.offer(sample(RED, 1000), 1000);
      engine.reload(values);
      expect(engine.getEffective().rgb).toEqual(CYAN);
    });

    it('should apply new debounce parameters', () => {
      const engine = createColorEngine(config);
      engine.offer(sample(RED, 1000), 1000);
      engine.reload({ ...values, updateIntervalMs: 100 });

      expect(engine.offer(sample(YELLOW, 1200), 1200).kind).toBe('applied');
    });

    it('should not override a fixed color', () => {
      const engine = createColorEngine({ ...config, fixedColor: RED });
      engine.reload(values);
      expect(engine.getEffective().rgb).toEqual(RED);
    });
  });
});
