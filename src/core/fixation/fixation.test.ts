import { createFixationFilter, createFixationFilter2D } from './fixation';
import { ConfigurationError } from '$types/errors';

describe('fixation filters', () => {
  describe('createFixationFilter', () => {
    it('should seed the reference with the first sample', () => {
      const filter = createFixationFilter({ threshold: 5 });
      expect(filter.update(3)).toBe(3);
    });

    it('should hold the reference inside the deadband', () => {
      const filter = createFixationFilter({ threshold: 2 });
      filter.update(10);
      expect(filter.update(11.5)).toBe(10);
      expect(filter.update(8.5)).toBe(10);
    });

    it('should move the reference at or beyond the threshold', () => {
      const filter = createFixationFilter({ threshold: 2 });
      filter.update(10);
      expect(filter.update(12)).toBe(12);
      expect(filter.update(13)).toBe(12);
      expect(filter.update(9)).toBe(9);
    });

    it('should compare against the reference, not the previous sample', () => {
      const filter = createFixationFilter({ threshold: 2 });
      filter.update(0);
      expect(filter.update(1.5)).toBe(0);
      expect(filter.update(3)).toBe(3);
    });

    it('should pass every sample through with threshold 0', () => {
      const filter = createFixationFilter({ threshold: 0 });
      filter.update(1);
      expect(filter.update(1)).toBe(1);
      expect(filter.update(1.25)).toBe(1.25);
    });

    it('should re-seed after reset', () => {
      const filter = createFixationFilter({ threshold: 100 });
      filter.update(0);
      filter.reset();
      expect(filter.update(50)).toBe(50);
    });

    it('should reject a negative threshold', () => {
      expect(() => createFixationFilter({ threshold: -1 })).toThrow(ConfigurationError);
    });
  });

  describe('createFixationFilter2D', () => {
    it('should hold the reference within the radius', () => {
      const filter = createFixationFilter2D({ threshold: 5 });
      expect(filter.update([0, 0])).toEqual([0, 0]);
      expect(filter.update([3, 3.9])).toEqual([0, 0]);
    });

    it('should move when the Euclidean distance reaches the threshold', () => {
      const filter = createFixationFilter2D({ threshold: 5 });
      filter.update([0, 0]);
      expect(filter.update([3, 4])).toEqual([3, 4]);
      expect(filter.update([4, 4])).toEqual([3, 4]);
    });

    it('should not move on one axis alone when the distance is inside', () => {
      const filter = createFixationFilter2D({ threshold: 5 });
      filter.update([10, 10]);
      expect(filter.update([14.9, 10])).toEqual([10, 10]);
    });

    it('should not alias the caller sample', () => {
      const filter = createFixationFilter2D({ threshold: 1 });
      const sample: [number, number] = [1, 2];
      const output = filter.update(sample);
      sample[0] = 99;
      expect(output).toEqual([1, 2]);
    });

    it('should return a new tuple on every held update', () => {
      const filter = createFixationFilter2D({ threshold: 5 });
      const first = filter.update([0, 0]);
      const held = filter.update([1, 1]);
      const heldAgain = filter.update([2, 2]);

      expect(held).toEqual([0, 0]);
      expect(heldAgain).toEqual([0, 0]);
      expect(held).not.toBe(first);
      expect(heldAgain).not.toBe(held);
    });

    it('should re-seed after reset', () => {
      const filter = createFixationFilter2D({ threshold: 100 });
      filter.update([0, 0]);
      filter.reset();
      expect(filter.update([7, 8])).toEqual([7, 8]);
    });
  });
});
