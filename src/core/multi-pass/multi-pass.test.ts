import { createMultiPassFilter, createMultiPassFilter2D } from './multi-pass';
import { createSimpleMovingAverageFilter } from '@core/moving-average';
import { ConfigurationError } from '$types/errors';

describe('multi-pass filter', () => {
  it('should equal a single moving average with one pass', () => {
    const multi = createMultiPassFilter({ windowSize: 3, passes: 1 });
    const single = createSimpleMovingAverageFilter({ windowSize: 3 });

    for (const sample of [5, 1, 8, 2, 9, 4]) {
      expect(multi.update(sample)).toBe(single.update(sample));
    }
  });

  it('should feed each pass the previous pass output', () => {
    const filter = createMultiPassFilter({ windowSize: 2, passes: 2 });
    // pass 1: 0, 2, 6; pass 2: 0, 1, 4
    expect(filter.update(0)).toBe(0);
    expect(filter.update(4)).toBe(1);
    expect(filter.update(8)).toBe(4);
  });

  it('should default to the simple variant', () => {
    const filter = createMultiPassFilter({ windowSize: 3, passes: 2 });
    expect(filter.kind).toBe('multi-pass');
    expect(filter.update(6)).toBe(6);
  });

  it('should use the configured inner variant', () => {
    const filter = createMultiPassFilter({ windowSize: 3, passes: 2, average: 'median' });
    filter.update(1);
    filter.update(100);
    // pass 1: 1, 50.5, 2; pass 2: 1, 25.75, 2
    expect(filter.update(2)).toBe(2);
  });

  it('should reset every pass', () => {
    const filter = createMultiPassFilter({ windowSize: 4, passes: 3 });
    filter.update(1000);
    filter.update(-1000);
    filter.reset();
    expect(filter.update(7)).toBe(7);
  });

  it('should reject invalid parameters', () => {
    expect(() => createMultiPassFilter({ windowSize: 3, passes: 0 })).toThrow(ConfigurationError);
    expect(() => createMultiPassFilter({ windowSize: 0, passes: 2 })).toThrow(ConfigurationError);
  });

  it('should reject an invalid stdDev whatever the inner variant', () => {
    expect(() => createMultiPassFilter({ windowSize: 3, passes: 2, stdDev: -1 })).toThrow(ConfigurationError);
    expect(() => createMultiPassFilter({ windowSize: 3, passes: 2, average: 'median', stdDev: 0 })).toThrow(ConfigurationError);
    expect(() => createMultiPassFilter({ windowSize: 3, passes: 2, average: 'gaussian', stdDev: NaN })).toThrow(ConfigurationError);
    expect(() => createMultiPassFilter2D({ windowSize: 3, passes: 2, stdDevY: -1 })).toThrow(ConfigurationError);
  });

  it('should accept a positive stdDev on non-gaussian passes', () => {
    const filter = createMultiPassFilter({ windowSize: 2, passes: 2, average: 'simple', stdDev: 1 });
    filter.update(0);
    filter.update(4);
    expect(filter.update(8)).toBe(4);
  });

  it('should default y parameters to x in 2D', () => {
    const filter = createMultiPassFilter2D({ windowSize: 2, passes: 2 });
    filter.update([0, 0]);
    filter.update([4, 4]);
    expect(filter.update([8, 8])).toEqual([4, 4]);
  });

  it('should honor passesY and windowSizeY in 2D', () => {
    const filter = createMultiPassFilter2D({ windowSize: 2, passes: 2, windowSizeY: 1, passesY: 1 });
    filter.update([0, 0]);
    filter.update([4, 4]);
    expect(filter.update([8, 8])).toEqual([4, 8]);
  });
});
