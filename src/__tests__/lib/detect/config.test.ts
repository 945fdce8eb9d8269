import { resolveScanConfig, scanConfigFromEnv } from '@/lib/detect/config';
import { ScanConfigError } from '@/lib/errors';

describe('scan configuration', () => {
  describe('resolveScanConfig', () => {
    it('should fill every value with its default', () => {
      expect(resolveScanConfig()).toEqual({
        volumeCeiling: 1500,
        revenueZThreshold: 3.0,
        spikeMultiplier: 5.0,
        consistencyRatio: 0.9,
        consistencyMinRows: 30,
        minViableTotal: 10000,
        defaultThreshold: 0.3
      });
    });

    it('should apply partial overrides', () => {
      const config = resolveScanConfig({ volumeCeiling: 2000, minViableTotal: 0 });

      expect(config.volumeCeiling).toBe(2000);
      expect(config.minViableTotal).toBe(0);
      expect(config.spikeMultiplier).toBe(5.0);
    });

    it('should return a frozen configuration', () => {
      expect(Object.isFrozen(resolveScanConfig())).toBe(true);
    });

    it('should reject invalid values', () => {
      expect(() => resolveScanConfig({ volumeCeiling: -1 })).toThrow(ScanConfigError);
      expect(() => resolveScanConfig({ consistencyRatio: 1.5 })).toThrow(/consistencyRatio/);
      expect(() => resolveScanConfig({ consistencyMinRows: 2.5 })).toThrow(ScanConfigError);
    });

    it('should list every invalid field', () => {
      try {
        resolveScanConfig({ volumeCeiling: 0, defaultThreshold: 2 });
        throw new Error('expected resolveScanConfig to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(ScanConfigError);
        if (error instanceof ScanConfigError) {
          expect(error.issues).toHaveLength(2);
          expect(error.issues[0]).toMatch(/^volumeCeiling: /);
          expect(error.issues[1]).toMatch(/^defaultThreshold: /);
        }
      }
    });
  });

  describe('scanConfigFromEnv', () => {
    it('should read SCAN_* variables', () => {
      const config = scanConfigFromEnv({
        SCAN_VOLUME_CEILING: '2000',
        SCAN_CONSISTENCY_MIN_ROWS: '50',
        SCAN_THRESHOLD: '0.5'
      });

      expect(config.volumeCeiling).toBe(2000);
      expect(config.consistencyMinRows).toBe(50);
      expect(config.defaultThreshold).toBe(0.5);
      expect(config.revenueZThreshold).toBe(3.0);
    });

    it('should ignore blank variables', () => {
      expect(scanConfigFromEnv({ SCAN_SPIKE_MULTIPLIER: '  ' }).spikeMultiplier).toBe(5.0);
    });

    it('should reject values that are not numbers', () => {
      expect(() => scanConfigFromEnv({ SCAN_MIN_VIABLE_TOTAL: 'lots' })).toThrow(ScanConfigError);
    });
  });
});
