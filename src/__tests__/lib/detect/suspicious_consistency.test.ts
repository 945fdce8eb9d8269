import { SuspiciousConsistencyDetector } from '@/lib/detect/detectors/suspicious_consistency';
import { resolveScanConfig } from '@/lib/detect/config';
import { DetectionContext } from '@/lib/detect/types';
import { ProcedureAmountAggregate } from '@/types/scanner';
import { CLEAN_ID, CONSISTENCY_ID, buildProcedureAmountAggregate } from '../../fixtures/claims';

function contextFor(procedureAmounts: ProcedureAmountAggregate[]): DetectionContext {
  return { monthly: [], procedureAmounts, config: resolveScanConfig() };
}

describe('SuspiciousConsistencyDetector', () => {
  let detector: SuspiciousConsistencyDetector;

  beforeEach(() => {
    detector = new SuspiciousConsistencyDetector();
  });

  describe('detect', () => {
    it('should flag an entity billing 40 of 44 rows at one amount', () => {
      const findings = detector.detect(contextFor(buildProcedureAmountAggregate()));
      const flagged = findings.filter(f => f.entityId === CONSISTENCY_ID);

      expect(flagged).toHaveLength(1);
      expect(flagged[0].flag.kind).toBe('SUSPICIOUS_CONSISTENCY');
      expect(flagged[0].flag.severity).toBeCloseTo(40 / 44, 10);
      expect(flagged[0].flag.description).toBe(
        '91% of 44 line items paid identical amount $99.99, suggests templated or copy-paste billing'
      );
      expect(flagged[0].flag.evidence).toEqual({
        consistency_ratio: 0.909,
        top_amount: 99.99,
        top_amount_count: 40,
        total_rows: 44
      });
    });

    it('should not flag natural price variation', () => {
      const findings = detector.detect(contextFor(buildProcedureAmountAggregate()));

      expect(findings.some(f => f.entityId === CLEAN_ID)).toBe(false);
    });

    it('should never flag entities below the minimum row count', () => {
      const findings = detector.detect(contextFor([
        { entityId: 'FEW', paidAmount: 50, rowCount: 29 }
      ]));

      expect(findings).toEqual([]);
    });

    it('should exclude zero-amount rows before computing the ratio', () => {
      const findings = detector.detect(contextFor([
        { entityId: 'Z', paidAmount: 0, rowCount: 100 },
        { entityId: 'Z', paidAmount: 75, rowCount: 31 }
      ]));

      expect(findings).toHaveLength(1);
      expect(findings[0].flag.evidence.total_rows).toBe(31);
      expect(findings[0].flag.evidence.top_amount).toBe(75);
      expect(findings[0].flag.severity).toBe(1.0);
    });

    it('should not count zero-amount rows toward the minimum', () => {
      const findings = detector.detect(contextFor([
        { entityId: 'Z', paidAmount: 0, rowCount: 100 },
        { entityId: 'Z', paidAmount: 75, rowCount: 29 }
      ]));

      expect(findings).toEqual([]);
    });

    it('should require the ratio to exceed the fraction, not equal it', () => {
      const findings = detector.detect(contextFor([
        { entityId: 'EDGE', paidAmount: 20, rowCount: 90 },
        { entityId: 'EDGE', paidAmount: 30, rowCount: 10 }
      ]));

      expect(findings).toEqual([]);
    });

    it('should pick a deterministic top amount on ties', () => {
      const findings = detector.detect({
        monthly: [],
        procedureAmounts: [
          { entityId: 'TIE', paidAmount: 80, rowCount: 20 },
          { entityId: 'TIE', paidAmount: 40, rowCount: 20 }
        ],
        config: resolveScanConfig({ consistencyRatio: 0.4 })
      });

      expect(findings).toHaveLength(1);
      expect(findings[0].flag.evidence.top_amount).toBe(40);
    });
  });
});
