import { MAD_SCALE, median, modifiedZScore, robustStats } from '@/lib/detect/robust_stats';

describe('robust statistics', () => {
  describe('median', () => {
    it('should return the middle value of an odd-sized population', () => {
      expect(median([3, 1, 2])).toBe(2);
    });

    it('should average the two middle values of an even-sized population', () => {
      expect(median([4, 1, 3, 2])).toBe(2.5);
    });

    it('should return null for an empty population', () => {
      expect(median([])).toBeNull();
    });
  });

  describe('robustStats', () => {
    it('should scale the MAD by 1.4826', () => {
      const stats = robustStats([1, 2, 3, 4, 100]);

      expect(stats).not.toBeNull();
      expect(stats?.median).toBe(3);
      expect(stats?.scaledMad).toBeCloseTo(MAD_SCALE, 10);
    });

    it('should not let one extreme value inflate the dispersion', () => {
      const withoutOutlier = robustStats([1, 2, 3, 4, 5]);
      const withOutlier = robustStats([1, 2, 3, 4, 5000]);

      expect(withOutlier?.scaledMad).toBeCloseTo(withoutOutlier?.scaledMad ?? NaN, 10);
    });

    it('should be undefined for an empty population', () => {
      expect(robustStats([])).toBeNull();
    });

    it('should be undefined when there is no dispersion', () => {
      expect(robustStats([5, 5, 5])).toBeNull();
      expect(robustStats([7])).toBeNull();
    });

    it('should be undefined when most values are identical', () => {
      // Deviations are [0, 0, 0, 4], so the MAD is zero
      expect(robustStats([1, 1, 1, 5])).toBeNull();
    });
  });

  describe('modifiedZScore', () => {
    it('should measure distance from the median in scaled-MAD units', () => {
      const stats = { median: 3, scaledMad: MAD_SCALE };

      expect(modifiedZScore(100, stats)).toBeCloseTo(97 / 1.4826, 10);
      expect(modifiedZScore(3, stats)).toBe(0);
      expect(modifiedZScore(1, stats)).toBeLessThan(0);
    });
  });
});
