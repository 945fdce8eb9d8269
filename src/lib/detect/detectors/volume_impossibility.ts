import { DetectionContext, Detector, DetectorFinding } from '../types';
import { formatCount, monthsByEntity } from '../aggregate';

export class VolumeImpossibilityDetector implements Detector {
  static readonly RULE_ID = 'VOLUME_IMPOSSIBILITY' as const;

  public detect(context: DetectionContext): DetectorFinding[] {
    const ceiling = context.config.volumeCeiling;
    const findings: DetectorFinding[] = [];

    for (const [entityId, months] of monthsByEntity(context.monthly)) {
      for (const [period, totals] of months) {
        if (totals.claimCount <= ceiling) continue;

        // Linear ramp, saturating at 3x the ceiling
        const severity = Math.min(1.0, totals.claimCount / (3 * ceiling));

        findings.push({
          entityId,
          flag: {
            kind: VolumeImpossibilityDetector.RULE_ID,
            description: `${formatCount(totals.claimCount)} claims in ${period} (max plausible: ${formatCount(ceiling)})`,
            severity,
            evidence: {
              month: period,
              claims: totals.claimCount,
              ceiling
            }
          }
        });
      }
    }

    return findings;
  }
}
