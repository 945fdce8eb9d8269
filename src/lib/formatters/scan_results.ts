import Papa from 'papaparse';
import { FlagKind, ScanResult } from '../../types/scanner';

export const SCAN_RESULTS_CSV_HEADER = ['rank', 'entity_id', 'score', 'num_flags', 'flag_kinds'] as const;

function distinctKinds(result: ScanResult): FlagKind[] {
  return [...new Set(result.flags.map(flag => flag.kind))];
}

/**
 * Serializes ranked scan results, one row per entity, ranks starting at 1.
 */
export function formatScanResultsCsv(results: readonly ScanResult[]): string {
  const data = results.map((result, index) => [
    String(index + 1),
    result.entityId,
    result.overallScore.toFixed(3),
    String(result.flags.length),
    distinctKinds(result).join('; ')
  ]);

  const csv = Papa.unparse({ fields: [...SCAN_RESULTS_CSV_HEADER], data }, { newline: '\n' });
  return csv + '\n';
}

export function formatScanResultLine(result: ScanResult, rank: number): string {
  const score = Math.round(result.overallScore * 100);
  const kinds = distinctKinds(result).join(', ');

  return `${String(rank).padStart(3)}. Entity ${result.entityId} | Score: ${score}% | Flags: ${result.flags.length} (${kinds})`;
}
