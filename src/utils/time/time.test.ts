/**
 * Tests for time utility functions
 */

import { now, nowMs } from './time';

describe('Time Utilities', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('now', () => {
    it('should return whole seconds since epoch', () => {
      vi.useFakeTimers();
      vi.setSystemTime(1_700_000_000_750);
      expect(now()).toBe(1_700_000_000);
    });
  });

  describe('nowMs', () => {
    it('should return milliseconds since epoch', () => {
      vi.useFakeTimers();
      vi.setSystemTime(1_700_000_000_750);
      expect(nowMs()).toBe(1_700_000_000_750);
    });
  });
});
