import { createFilter } from './filter-factory';
import type { FilterSpec } from './types';
import { ConfigurationError } from '$types/errors';

describe('createFilter', () => {
  const specs: FilterSpec[] = [
    { type: 'offset', offset: 1 },
    { type: 'simple', windowSize: 3 },
    { type: 'weighted', windowSize: 3 },
    { type: 'gaussian', windowSize: 3 },
    { type: 'median', windowSize: 3 },
    { type: 'exponential', alpha: 0.5 },
    { type: 'cumulative' },
    { type: 'fixation', threshold: 1 },
    { type: 'multi-pass', windowSize: 3, passes: 2 }
  ];

  it('should create every kind in 1D and 2D', () => {
    for (const spec of specs) {
      const filter1D = createFilter(spec, 1);
      const filter2D = createFilter(spec, 2);

      expect(filter1D.kind).toBe(spec.type);
      expect(filter1D.dimension).toBe(1);
      expect(filter2D.kind).toBe(spec.type);
      expect(filter2D.dimension).toBe(2);
    }
  });

  it('should pass parameters through', () => {
    const ema = createFilter({ type: 'exponential', alpha: 0.5 }, 1);
    ema.update(0);
    expect(ema.update(10)).toBe(5);
  });

  it('should pass y-axis parameters to 2D filters', () => {
    const sma = createFilter({ type: 'simple', windowSize: 1, windowSizeY: 2 }, 2);
    sma.update([0, 0]);
    expect(sma.update([4, 4])).toEqual([4, 2]);
  });

  it('should create independent instances', () => {
    const spec: FilterSpec = { type: 'cumulative' };
    const first = createFilter(spec, 1);
    const second = createFilter(spec, 1);

    first.update(10);
    expect(second.update(2)).toBe(2);
  });

  it('should reject invalid parameters', () => {
    expect(() => createFilter({ type: 'simple', windowSize: 0 }, 1)).toThrow(ConfigurationError);
    expect(() => createFilter({ type: 'exponential', alpha: 0 }, 2)).toThrow(ConfigurationError);
  });
});
