import { formatScanResultLine, formatScanResultsCsv } from '@/lib/formatters/scan_results';
import { FlagKind, RedFlag, ScanResult } from '@/types/scanner';

function flag(kind: FlagKind, severity: number): RedFlag {
  return { kind, description: 'test flag', severity, evidence: {} };
}

describe('scan result formatters', () => {
  const results: ScanResult[] = [
    {
      entityId: 'A1',
      overallScore: 0.7,
      flags: [flag('VOLUME_IMPOSSIBILITY', 1), flag('VOLUME_IMPOSSIBILITY', 0.5), flag('BILLING_SPIKE', 0.6)]
    },
    {
      entityId: 'B,2',
      overallScore: 0.4917,
      flags: [flag('SUSPICIOUS_CONSISTENCY', 0.58)]
    }
  ];

  describe('formatScanResultsCsv', () => {
    it('should write one ranked row per entity', () => {
      expect(formatScanResultsCsv(results)).toBe(
        'rank,entity_id,score,num_flags,flag_kinds\n' +
        '1,A1,0.700,3,VOLUME_IMPOSSIBILITY; BILLING_SPIKE\n' +
        '2,"B,2",0.492,1,SUSPICIOUS_CONSISTENCY\n'
      );
    });

    it('should quote fields containing commas, quotes or newlines', () => {
      const csv = formatScanResultsCsv([
        { entityId: 'A,"1"', overallScore: 0.5, flags: [flag('BILLING_SPIKE', 0.25)] },
        { entityId: 'B\n2', overallScore: 0.45, flags: [flag('REVENUE_OUTLIER', 0.5)] }
      ]);

      expect(csv).toBe(
        'rank,entity_id,score,num_flags,flag_kinds\n' +
        '1,"A,""1""",0.500,1,BILLING_SPIKE\n' +
        '2,"B\n2",0.450,1,REVENUE_OUTLIER\n'
      );
    });

    it('should write only the header for no results', () => {
      expect(formatScanResultsCsv([])).toBe('rank,entity_id,score,num_flags,flag_kinds\n');
    });
  });

  describe('formatScanResultLine', () => {
    it('should show rank, score percentage and distinct flag kinds', () => {
      expect(formatScanResultLine(results[0], 1)).toBe(
        '  1. Entity A1 | Score: 70% | Flags: 3 (VOLUME_IMPOSSIBILITY, BILLING_SPIKE)'
      );
      expect(formatScanResultLine(results[1], 12)).toBe(
        ' 12. Entity B,2 | Score: 49% | Flags: 1 (SUSPICIOUS_CONSISTENCY)'
      );
    });
  });
});
