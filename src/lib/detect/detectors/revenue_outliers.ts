import { DetectionContext, Detector, DetectorFinding } from '../types';
import { formatMoney, round, totalsByEntity } from '../aggregate';
import { modifiedZScore, robustStats } from '../robust_stats';

/**
 * Cross-entity pricing check: paid-per-claim against the population median,
 * in scaled-MAD units. Works on the per-claim rate so that entities differing
 * only in volume are not flagged.
 */
export class RevenueOutliersDetector implements Detector {
  static readonly RULE_ID = 'REVENUE_OUTLIER' as const;

  public detect(context: DetectionContext): DetectorFinding[] {
    const rates: Array<{ entityId: string; paidPerClaim: number; paid: number; claims: number }> = [];

    for (const [entityId, totals] of totalsByEntity(context.monthly)) {
      if (totals.claims === 0) continue; // ratio undefined
      rates.push({
        entityId,
        paidPerClaim: totals.paid / totals.claims,
        paid: totals.paid,
        claims: totals.claims
      });
    }

    const stats = robustStats(rates.map(r => r.paidPerClaim));
    if (!stats) return [];

    const threshold = context.config.revenueZThreshold;
    const findings: DetectorFinding[] = [];

    for (const rate of rates) {
      const zscore = modifiedZScore(rate.paidPerClaim, stats);
      if (zscore <= threshold) continue;

      findings.push({
        entityId: rate.entityId,
        flag: {
          kind: RevenueOutliersDetector.RULE_ID,
          description: `Paid per claim ${formatMoney(rate.paidPerClaim)} is ${zscore.toFixed(1)} robust std devs above peer median ${formatMoney(stats.median)}`,
          severity: Math.min(1.0, zscore / 10.0),
          evidence: {
            paid_per_claim: round(rate.paidPerClaim, 2),
            peer_median_paid_per_claim: round(stats.median, 2),
            modified_zscore: round(zscore, 2),
            total_paid: round(rate.paid, 2),
            total_claims: rate.claims
          }
        }
      });
    }

    return findings;
  }
}
