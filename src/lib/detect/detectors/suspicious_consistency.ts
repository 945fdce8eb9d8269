import { DetectionContext, Detector, DetectorFinding } from '../types';
import { formatMoney, round } from '../aggregate';

interface AmountProfile {
  counts: Map<number, number>;
  totalRows: number;
}

export class SuspiciousConsistencyDetector implements Detector {
  static readonly RULE_ID = 'SUSPICIOUS_CONSISTENCY' as const;

  public detect(context: DetectionContext): DetectorFinding[] {
    const { consistencyRatio, consistencyMinRows } = context.config;
    const findings: DetectorFinding[] = [];

    for (const [entityId, profile] of this.profileAmounts(context)) {
      if (profile.totalRows < consistencyMinRows) continue;

      const top = this.mostFrequentAmount(profile.counts);
      if (!top) continue;

      const ratio = top.count / profile.totalRows;
      if (ratio <= consistencyRatio) continue;

      findings.push({
        entityId,
        flag: {
          kind: SuspiciousConsistencyDetector.RULE_ID,
          description: `${Math.round(ratio * 100)}% of ${profile.totalRows} line items paid identical amount ${formatMoney(top.amount)}, suggests templated or copy-paste billing`,
          severity: Math.min(1.0, ratio),
          evidence: {
            consistency_ratio: round(ratio, 3),
            top_amount: top.amount,
            top_amount_count: top.count,
            total_rows: profile.totalRows
          }
        }
      });
    }

    return findings;
  }

  private profileAmounts(context: DetectionContext): Map<string, AmountProfile> {
    const profiles = new Map<string, AmountProfile>();

    for (const row of context.procedureAmounts) {
      // Zero-paid rows are a data artifact, not a billing pattern
      if (row.paidAmount === 0) continue;

      let profile = profiles.get(row.entityId);
      if (!profile) {
        profile = { counts: new Map(), totalRows: 0 };
        profiles.set(row.entityId, profile);
      }
      profile.counts.set(row.paidAmount, (profile.counts.get(row.paidAmount) ?? 0) + row.rowCount);
      profile.totalRows += row.rowCount;
    }

    return profiles;
  }

  private mostFrequentAmount(counts: Map<number, number>): { amount: number; count: number } | null {
    let best: { amount: number; count: number } | null = null;

    for (const [amount, count] of counts) {
      if (!best || count > best.count || (count === best.count && amount < best.amount)) {
        best = { amount, count };
      }
    }

    return best;
  }
}
