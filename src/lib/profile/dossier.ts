import { EntityId } from '../../types/common';
import {
  ClaimsSummary,
  Dossier,
  EntityProfile,
  MonthlyAggregate,
  MonthlyTimelineEntry,
  ScanResult
} from '../../types/scanner';
import { monthsByEntity } from '../detect/aggregate';
import { UnknownEntityError } from '../errors';
import { compareEntityToPeers } from './peer_comparison';

export interface DossierRequest {
  entityId: EntityId;
  monthly: readonly MonthlyAggregate[];
  scanResult?: ScanResult;
  peerGroups?: ReadonlyMap<EntityId, string>;
  profile?: EntityProfile;
}

export function buildDossier(request: DossierRequest): Dossier {
  const { entityId, monthly, peerGroups, profile } = request;
  console.log(`📁 Building dossier for entity ${entityId}...`);

  const months = monthsByEntity(monthly).get(entityId);
  if (!months || months.size === 0) {
    throw new UnknownEntityError(entityId);
  }

  const timeline: MonthlyTimelineEntry[] = [...months.entries()].map(([period, totals]) => ({
    period,
    claimCount: totals.claimCount,
    paidAmount: totals.paidAmount,
    ...(totals.beneficiaryCount !== undefined ? { beneficiaryCount: totals.beneficiaryCount } : {})
  }));

  const scanResult: ScanResult = request.scanResult ?? { entityId, overallScore: 0, flags: [] };

  return {
    entityId,
    ...(profile ? { profile } : {}),
    scanResult,
    claimsSummary: summarizeClaims(timeline),
    timeline,
    peerComparison: compareEntityToPeers(entityId, monthly, peerGroups)
  };
}

function summarizeClaims(timeline: MonthlyTimelineEntry[]): ClaimsSummary {
  let totalClaims = 0;
  let totalPaid = 0;
  let totalBeneficiaries: number | undefined;
  let peak = timeline[0];

  for (const entry of timeline) {
    totalClaims += entry.claimCount;
    totalPaid += entry.paidAmount;
    if (entry.beneficiaryCount !== undefined) {
      totalBeneficiaries = (totalBeneficiaries ?? 0) + entry.beneficiaryCount;
    }
    // Earliest month wins a tie
    if (entry.paidAmount > peak.paidAmount) peak = entry;
  }

  return {
    totalClaims,
    totalPaid,
    ...(totalBeneficiaries !== undefined ? { totalBeneficiaries } : {}),
    activeMonths: timeline.length,
    firstMonth: timeline[0].period,
    lastMonth: timeline[timeline.length - 1].period,
    avgPaidPerClaim: totalClaims > 0 ? totalPaid / totalClaims : null,
    peakMonth: {
      period: peak.period,
      claimCount: peak.claimCount,
      paidAmount: peak.paidAmount
    }
  };
}
