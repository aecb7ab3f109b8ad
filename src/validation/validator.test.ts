import { validatePipelineDescription } from './validator';

function fields(entries: { field: string }[]): string[] {
  return entries.map(function (entry) { return entry.field; });
}

describe('validatePipelineDescription', () => {
  describe('valid descriptions', () => {
    it('should return valid with the typed description', () => {
      const result = validatePipelineDescription({
        dimension: 1,
        filters: [{ type: 'gaussian', windowSize: 5 }, { type: 'exponential', alpha: 0.3 }]
      });

      expect(result.valid).toBe(true);
      expect(result.errors).toHaveLength(0);
      expect(result.warnings).toHaveLength(0);
      expect(result.description).toEqual({
        dimension: 1,
        filters: [{ type: 'gaussian', windowSize: 5 }, { type: 'exponential', alpha: 0.3 }]
      });
    });

    it('should keep y-axis parameters for 2D pipelines', () => {
      const result = validatePipelineDescription({
        dimension: 2,
        filters: [{ type: 'exponential', alpha: 0.5, alphaY: 0.25 }]
      });

      expect(result.valid).toBe(true);
      expect(result.description?.filters[0]).toEqual({ type: 'exponential', alpha: 0.5, alphaY: 0.25 });
    });

    it('should accept every filter kind', () => {
      const result = validatePipelineDescription({
        dimension: 1,
        filters: [
          { type: 'offset', offset: -2 },
          { type: 'simple', windowSize: 3 },
          { type: 'weighted', windowSize: 3 },
          { type: 'gaussian', windowSize: 7, stdDev: 2 },
          { type: 'median', windowSize: 5 },
          { type: 'exponential', alpha: 0.2 },
          { type: 'cumulative' },
          { type: 'fixation', threshold: 0.5 },
          { type: 'multi-pass', windowSize: 4, passes: 3, average: 'gaussian', stdDev: 1 }
        ]
      });

      expect(result.errors).toEqual([]);
      expect(result.warnings).toEqual([]);
      expect(result.description?.filters).toHaveLength(9);
    });
  });

  describe('description shape', () => {
    it('should reject a non-object description', () => {
      const result = validatePipelineDescription([1, 2]);

      expect(result.valid).toBe(false);
      expect(result.errors[0].message).toBe('description must be an object');
      expect(result.description).toBeUndefined();
    });

    it('should require dimension 1 or 2', () => {
      const missing = validatePipelineDescription({ filters: [{ type: 'cumulative' }] });
      const wrong = validatePipelineDescription({ dimension: 3, filters: [{ type: 'cumulative' }] });

      expect(missing.errors[0].message).toBe('dimension is required');
      expect(wrong.errors[0].message).toBe('dimension must be 1 or 2 (got 3)');
    });

    it('should require a non-empty filters array', () => {
      const missing = validatePipelineDescription({ dimension: 1 });
      const empty = validatePipelineDescription({ dimension: 1, filters: [] });

      expect(missing.errors[0].message).toBe('filters must be an array');
      expect(empty.errors[0].message).toBe('filters must contain at least one filter');
    });

    it('should warn about unknown top-level fields', () => {
      const result = validatePipelineDescription({ dimension: 1, filters: [{ type: 'cumulative' }], name: 'x' });

      expect(result.valid).toBe(true);
      expect(result.warnings[0].message).toBe('name is not a description field and is ignored');
    });
  });

  describe('filter entries', () => {
    it('should reject an entry without a type', () => {
      const result = validatePipelineDescription({ dimension: 1, filters: [{ windowSize: 3 }] });
      expect(result.errors[0].message).toBe('filters[0].type is required');
    });

    it('should reject an unknown type', () => {
      const result = validatePipelineDescription({ dimension: 1, filters: [{ type: 'kalman' }] });
      expect(fields(result.errors)).toEqual(['filters[0].type']);
    });

    it('should reject entries that are not objects', () => {
      const result = validatePipelineDescription({ dimension: 1, filters: ['simple'] });
      expect(result.errors[0].message).toBe('filters[0] must be an object');
    });

    it('should report a missing required parameter', () => {
      const result = validatePipelineDescription({ dimension: 1, filters: [{ type: 'fixation' }] });
      expect(result.errors[0].message).toBe('filters[0].threshold is required');
    });

    it('should report hard limit violations with field paths', () => {
      const result = validatePipelineDescription({
        dimension: 1,
        filters: [
          { type: 'simple', windowSize: 0 },
          { type: 'exponential', alpha: 0 },
          { type: 'exponential', alpha: 1.5 },
          { type: 'gaussian', windowSize: 3, stdDev: -1 },
          { type: 'fixation', threshold: -1 },
          { type: 'multi-pass', windowSize: 3, passes: 0 }
        ]
      });

      expect(result.valid).toBe(false);
      expect(fields(result.errors)).toEqual([
        'filters[0].windowSize',
        'filters[1].alpha',
        'filters[2].alpha',
        'filters[3].stdDev',
        'filters[4].threshold',
        'filters[5].passes'
      ]);
      expect(result.errors[1].message).toBe('filters[1].alpha must be greater than 0 (got 0)');
      expect(result.errors[2].message).toBe('filters[2].alpha must be between 0 and 1 (got 1.5)');
      expect(result.errors[4].message).toBe('filters[4].threshold must be at least 0 (got -1)');
      expect(result.description).toBeUndefined();
    });

    it('should reject a fractional window size', () => {
      const result = validatePipelineDescription({ dimension: 1, filters: [{ type: 'median', windowSize: 2.5 }] });
      expect(result.errors[0].message).toBe('filters[0].windowSize must be an integer (got 2.5)');
    });

    it('should reject an unknown multi-pass average', () => {
      const result = validatePipelineDescription({
        dimension: 1,
        filters: [{ type: 'multi-pass', windowSize: 3, passes: 2, average: 'mode' }]
      });
      expect(result.errors[0].message).toBe(
        'filters[0].average must be one of simple, weighted, gaussian, median (got mode)'
      );
    });

    it('should reject parameters of the wrong type', () => {
      const result = validatePipelineDescription({ dimension: 1, filters: [{ type: 'simple', windowSize: '5' }] });
      expect(result.errors[0].message).toBe('filters[0].windowSize must be a number (got string)');
    });
  });

  describe('warnings', () => {
    it('should warn when a value leaves the recommended range', () => {
      const result = validatePipelineDescription({
        dimension: 1,
        filters: [{ type: 'simple', windowSize: 600 }, { type: 'multi-pass', windowSize: 3, passes: 8 }]
      });

      expect(result.valid).toBe(true);
      expect(fields(result.warnings)).toEqual(['filters[0].windowSize', 'filters[1].passes']);
      expect(result.warnings[0].message).toBe('filters[0].windowSize is outside recommended range 1-500 (got 600)');
    });

    it('should warn about y-axis parameters in a 1D pipeline and drop them', () => {
      const result = validatePipelineDescription({
        dimension: 1,
        filters: [{ type: 'simple', windowSize: 3, windowSizeY: 5 }]
      });

      expect(result.valid).toBe(true);
      expect(result.warnings[0].message).toBe('filters[0].windowSizeY only applies to 2D pipelines and is ignored');
      expect(result.description?.filters[0]).toEqual({ type: 'simple', windowSize: 3 });
    });

    it('should warn about parameters the filter does not read', () => {
      const result = validatePipelineDescription({
        dimension: 2,
        filters: [{ type: 'cumulative', windowSize: 3 }]
      });
      expect(result.warnings[0].message).toBe('filters[0].windowSize is not a parameter of cumulative filters and is ignored');
    });

    it('should warn about stdDev on non-gaussian passes', () => {
      const result = validatePipelineDescription({
        dimension: 1,
        filters: [{ type: 'multi-pass', windowSize: 3, passes: 2, stdDev: 1 }]
      });
      expect(result.warnings[0].message).toBe('filters[0].stdDev only applies to gaussian passes and is ignored');
    });
  });
});
