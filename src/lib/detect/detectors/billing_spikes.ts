import { DetectionContext, Detector, DetectorFinding } from '../types';
import { formatMoney, monthsByEntity, round } from '../aggregate';

// Fewer months cannot establish a baseline
const MIN_HISTORY_MONTHS = 3;

export class BillingSpikesDetector implements Detector {
  static readonly RULE_ID = 'BILLING_SPIKE' as const;

  public detect(context: DetectionContext): DetectorFinding[] {
    const multiplier = context.config.spikeMultiplier;
    const findings: DetectorFinding[] = [];

    for (const [entityId, months] of monthsByEntity(context.monthly)) {
      if (months.size < MIN_HISTORY_MONTHS) continue;

      let total = 0;
      for (const totals of months.values()) total += totals.paidAmount;
      const mean = total / months.size;
      if (mean <= 0) continue;

      for (const [period, totals] of months) {
        const ratio = totals.paidAmount / mean;
        if (ratio <= multiplier) continue;

        findings.push({
          entityId,
          flag: {
            kind: BillingSpikesDetector.RULE_ID,
            description: `Monthly paid ${formatMoney(totals.paidAmount)} in ${period} is ${ratio.toFixed(1)}x their average ${formatMoney(mean)}`,
            severity: Math.min(1.0, ratio / 10.0),
            evidence: {
              month: period,
              amount: round(totals.paidAmount, 2),
              baseline_mean: round(mean, 2),
              ratio: round(ratio, 2)
            }
          }
        });
      }
    }

    return findings;
  }
}
