import { AggregateTables, FlagKind, ScanResult } from '../../types/scanner';
import { DataUnavailableError, UnknownDetectionRuleError } from '../errors';
import {
  DetectionContext,
  DetectionRule,
  Detector,
  DetectorFinding,
  ScanEngine,
  ScanStatistics
} from './types';
import { ScanConfig, ScanConfigOverrides, resolveScanConfig } from './config';
import { FLAG_KIND_ORDER, applyViabilityFilter, fuseFindings } from './fusion';

import { VolumeImpossibilityDetector } from './detectors/volume_impossibility';
import { RevenueOutliersDetector } from './detectors/revenue_outliers';
import { BillingSpikesDetector } from './detectors/billing_spikes';
import { SuspiciousConsistencyDetector } from './detectors/suspicious_consistency';

export class AnomalyScanEngine implements ScanEngine {
  public readonly config: ScanConfig;

  private readonly detectors = new Map<string, Detector>([
    [VolumeImpossibilityDetector.RULE_ID, new VolumeImpossibilityDetector()],
    [RevenueOutliersDetector.RULE_ID, new RevenueOutliersDetector()],
    [BillingSpikesDetector.RULE_ID, new BillingSpikesDetector()],
    [SuspiciousConsistencyDetector.RULE_ID, new SuspiciousConsistencyDetector()]
  ]);

  private readonly rules: DetectionRule[] = [
    {
      id: VolumeImpossibilityDetector.RULE_ID,
      name: 'Volume Impossibility',
      description: 'Flags months whose claim count exceeds what one billing entity can plausibly produce',
      scope: 'FIXED_LIMIT',
      tables: ['monthly']
    },
    {
      id: RevenueOutliersDetector.RULE_ID,
      name: 'Revenue Outlier',
      description: 'Flags entities whose paid-per-claim rate is far above the population median',
      scope: 'POPULATION',
      tables: ['monthly']
    },
    {
      id: BillingSpikesDetector.RULE_ID,
      name: 'Billing Spike',
      description: 'Flags months whose paid amount is a large multiple of the entity\'s own monthly mean',
      scope: 'SELF_HISTORY',
      tables: ['monthly']
    },
    {
      id: SuspiciousConsistencyDetector.RULE_ID,
      name: 'Suspicious Consistency',
      description: 'Flags entities billing most line items at one identical paid amount',
      scope: 'SELF_HISTORY',
      tables: ['procedureAmounts']
    }
  ];

  constructor(overrides: ScanConfigOverrides = {}) {
    this.config = resolveScanConfig(overrides);
  }

  public scan(tables: AggregateTables, threshold: number = this.config.defaultThreshold): ScanResult[] {
    console.log('🔍 Running anomaly scan...');

    const startTime = Date.now();
    const context = this.buildContext(tables);

    const findings: DetectorFinding[] = [];
    for (const ruleId of FLAG_KIND_ORDER) {
      findings.push(...this.runIsolated(ruleId, context));
    }

    const results = fuseFindings(findings, threshold);

    console.log(`🏁 Scan completed in ${Date.now() - startTime}ms`);
    console.log(`📊 ${results.length} entities at or above threshold ${threshold}`);

    return results;
  }

  public runDetection(ruleId: string, tables: AggregateTables): DetectorFinding[] {
    const detector = this.detectors.get(ruleId);

    if (!detector) {
      throw new UnknownDetectionRuleError(ruleId);
    }

    console.log(`🔍 Running ${ruleId} detector...`);

    const findings = detector.detect(this.buildContext(tables));
    console.log(`✅ ${ruleId}: ${findings.length} flags`);

    return findings;
  }

  public getAvailableRules(): DetectionRule[] {
    return this.rules.map(rule => ({ ...rule, tables: [...rule.tables] }));
  }

  public getScanStatistics(results: readonly ScanResult[]): ScanStatistics {
    const flagsByKind: Record<FlagKind, number> = {
      VOLUME_IMPOSSIBILITY: 0,
      REVENUE_OUTLIER: 0,
      BILLING_SPIKE: 0,
      SUSPICIOUS_CONSISTENCY: 0
    };

    let totalFlags = 0;
    let scoreSum = 0;
    let maxScore = 0;

    for (const result of results) {
      for (const flag of result.flags) {
        flagsByKind[flag.kind] += 1;
        totalFlags += 1;
      }
      scoreSum += result.overallScore;
      maxScore = Math.max(maxScore, result.overallScore);
    }

    return {
      totalResults: results.length,
      totalFlags,
      flagsByKind,
      averageScore: results.length > 0 ? Math.round((scoreSum / results.length) * 1000) / 1000 : 0,
      maxScore
    };
  }

  private buildContext(tables: AggregateTables): DetectionContext {
    if (!tables.monthly) {
      throw new DataUnavailableError('MonthlyAggregate table is required for a scan', 'MonthlyAggregate');
    }

    if (tables.monthly.length === 0) {
      console.warn('⚠️ MonthlyAggregate table is empty, monthly detectors will not flag anything');
    }

    if (!tables.procedureAmounts) {
      console.warn('⚠️ ProcedureAmountAggregate table missing, consistency detection skipped');
    }

    const filtered = applyViabilityFilter(
      { monthly: tables.monthly, procedureAmounts: tables.procedureAmounts ?? [] },
      this.config.minViableTotal
    );

    return { ...filtered, config: this.config };
  }

  // A failing detector degrades to "no flags" rather than failing the scan
  private runIsolated(ruleId: FlagKind, context: DetectionContext): DetectorFinding[] {
    const detector = this.detectors.get(ruleId);
    if (!detector) return [];

    try {
      console.log(`  ⚡ Running ${ruleId} detector...`);
      const findings = detector.detect(context);

      if (findings.length > 0) {
        console.log(`  ✅ ${ruleId}: ${findings.length} flags`);
      }

      return findings;
    } catch (error) {
      console.error(`  ❌ ${ruleId} detector failed:`, error);
      return [];
    }
  }
}
