import { EntityId } from '../../types/common';
import {
  FlagKind,
  MonthlyAggregate,
  ProcedureAmountAggregate,
  RedFlag,
  ScanResult
} from '../../types/scanner';
import { DetectorFinding } from './types';
import { totalsByEntity } from './aggregate';

export const FLAG_KIND_ORDER: readonly FlagKind[] = [
  'VOLUME_IMPOSSIBILITY',
  'REVENUE_OUTLIER',
  'BILLING_SPIKE',
  'SUSPICIOUS_CONSISTENCY'
];

const MAX_SEVERITY_WEIGHT = 0.5;
const DISTINCT_KIND_WEIGHT = 0.2;

export interface ScanTables {
  monthly: readonly MonthlyAggregate[];
  procedureAmounts: readonly ProcedureAmountAggregate[];
}

/**
 * Drops every entity whose summed paid amount is below `minViableTotal` from
 * both tables. Entities missing from the monthly table count as zero paid.
 */
export function applyViabilityFilter(tables: ScanTables, minViableTotal: number): ScanTables {
  const totals = totalsByEntity(tables.monthly);
  const isViable = (entityId: EntityId) => (totals.get(entityId)?.paid ?? 0) >= minViableTotal;

  return {
    monthly: tables.monthly.filter(row => isViable(row.entityId)),
    procedureAmounts: tables.procedureAmounts.filter(row => isViable(row.entityId))
  };
}

/**
 * min(1, 0.5 * max severity + 0.2 * distinct kinds). Corroboration by
 * independent detector kinds outweighs repetition from one detector.
 *
 * TODO: recalibrate the weights against labelled outcomes; they are kept
 * as-is for compatibility with existing score thresholds.
 */
export function computeOverallScore(flags: readonly RedFlag[]): number {
  if (flags.length === 0) return 0;

  const maxSeverity = Math.max(...flags.map(f => f.severity));
  const distinctKinds = new Set(flags.map(f => f.kind)).size;

  return Math.min(1.0, maxSeverity * MAX_SEVERITY_WEIGHT + distinctKinds * DISTINCT_KIND_WEIGHT);
}

export function compareScanResults(a: ScanResult, b: ScanResult): number {
  if (a.overallScore !== b.overallScore) return b.overallScore - a.overallScore;
  return a.entityId < b.entityId ? -1 : a.entityId > b.entityId ? 1 : 0;
}

/**
 * Groups findings per entity, scores them, drops entities under `threshold`
 * and ranks the rest. The result does not depend on the order findings
 * arrive in, other than the relative order of flags of the same kind.
 */
export function fuseFindings(findings: readonly DetectorFinding[], threshold: number): ScanResult[] {
  const byEntity = new Map<EntityId, RedFlag[]>();

  for (const { entityId, flag } of findings) {
    const flags = byEntity.get(entityId);
    if (flags) flags.push(flag);
    else byEntity.set(entityId, [flag]);
  }

  const results: ScanResult[] = [];

  for (const [entityId, flags] of byEntity) {
    const ordered = [...flags].sort(
      (a, b) => FLAG_KIND_ORDER.indexOf(a.kind) - FLAG_KIND_ORDER.indexOf(b.kind)
    );
    const overallScore = computeOverallScore(ordered);
    if (overallScore < threshold) continue;

    results.push(Object.freeze({ entityId, overallScore, flags: Object.freeze(ordered) }));
  }

  return results.sort(compareScanResults);
}
