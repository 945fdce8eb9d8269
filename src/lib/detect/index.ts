// Main detection library exports
export { AnomalyScanEngine } from './engine';
import { AnomalyScanEngine } from './engine';
import { ScanConfigOverrides, scanConfigFromEnv } from './config';

// Type exports
export type {
  DetectionRule,
  DetectionContext,
  Detector,
  DetectorFinding,
  ScanEngine,
  ScanStatistics
} from './types';
export type { ScanConfig, ScanConfigOverrides } from './config';

export { resolveScanConfig, scanConfigFromEnv, scanConfigSchema } from './config';
export { computeOverallScore, fuseFindings, applyViabilityFilter, FLAG_KIND_ORDER } from './fusion';
export { median, robustStats, modifiedZScore, MAD_SCALE } from './robust_stats';
export type { RobustStats } from './robust_stats';

// Individual detector exports
export { VolumeImpossibilityDetector } from './detectors/volume_impossibility';
export { RevenueOutliersDetector } from './detectors/revenue_outliers';
export { BillingSpikesDetector } from './detectors/billing_spikes';
export { SuspiciousConsistencyDetector } from './detectors/suspicious_consistency';

export function createScanEngine(overrides: ScanConfigOverrides = {}): AnomalyScanEngine {
  return new AnomalyScanEngine(overrides);
}

// Engine configured from SCAN_* environment variables
export function createScanEngineFromEnv(env: NodeJS.ProcessEnv = process.env): AnomalyScanEngine {
  return new AnomalyScanEngine(scanConfigFromEnv(env));
}
