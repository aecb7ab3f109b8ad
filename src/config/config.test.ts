/**
 * Tests for configuration module
 */

import CONFIG, { DEFAULTS, RECOMMENDED_RANGES, LOG_LEVELS } from './config';

describe('Configuration', () => {
  describe('LOG_LEVELS', () => {
    it('should use the standard numeric codes', () => {
      expect(LOG_LEVELS).toEqual({ DEBUG: 0, INFO: 1, WARNING: 2, CRITICAL: 3 });
    });
  });

  describe('DEFAULTS', () => {
    it('should default to a valid log level', () => {
      expect(Object.values(LOG_LEVELS)).toContain(DEFAULTS.LOG_LEVEL);
    });

    it('should default multi-pass filters to simple averages', () => {
      expect(DEFAULTS.MULTI_PASS_TYPE).toBe('simple');
    });

    it('should derive gaussian sigma from a third of the window', () => {
      expect(DEFAULTS.GAUSSIAN_STD_DEV_DIVISOR).toBe(3);
    });

    it('should have a positive console buffer', () => {
      expect(DEFAULTS.CONSOLE_BUFFER_SIZE).toBeGreaterThan(0);
    });
  });

  describe('RECOMMENDED_RANGES', () => {
    it('should have ordered bounds', () => {
      expect(RECOMMENDED_RANGES.WINDOW_SIZE.min).toBeLessThan(RECOMMENDED_RANGES.WINDOW_SIZE.max);
      expect(RECOMMENDED_RANGES.ALPHA.min).toBeLessThan(RECOMMENDED_RANGES.ALPHA.max);
      expect(RECOMMENDED_RANGES.PASSES.min).toBeLessThan(RECOMMENDED_RANGES.PASSES.max);
    });

    it('should keep alpha recommendations inside the hard (0, 1] limit', () => {
      expect(RECOMMENDED_RANGES.ALPHA.min).toBeGreaterThan(0);
      expect(RECOMMENDED_RANGES.ALPHA.max).toBeLessThanOrEqual(1);
    });
  });

  describe('CONFIG', () => {
    it('should combine all sections', () => {
      expect(CONFIG.DEFAULTS).toBe(DEFAULTS);
      expect(CONFIG.RECOMMENDED_RANGES).toBe(RECOMMENDED_RANGES);
      expect(CONFIG.LOG_LEVELS).toBe(LOG_LEVELS);
    });
  });
});
