import { CalendarMonth, EntityId, MoneyDollars } from './common';

export interface MonthlyAggregate {
  entityId: EntityId;
  period: CalendarMonth;
  claimCount: number;
  paidAmount: MoneyDollars;
  beneficiaryCount?: number;
}

export interface ProcedureAmountAggregate {
  entityId: EntityId;
  paidAmount: MoneyDollars;
  rowCount: number;
}

export interface AggregateTables {
  monthly: readonly MonthlyAggregate[] | null | undefined;
  procedureAmounts?: readonly ProcedureAmountAggregate[] | null;
}

export type FlagKind =
  | 'VOLUME_IMPOSSIBILITY'
  | 'REVENUE_OUTLIER'
  | 'BILLING_SPIKE'
  | 'SUSPICIOUS_CONSISTENCY';

export type EvidenceValue = number | string;

export interface RedFlag {
  readonly kind: FlagKind;
  readonly description: string;
  readonly severity: number;
  readonly evidence: Readonly<Record<string, EvidenceValue>>;
}

export interface ScanResult {
  readonly entityId: EntityId;
  readonly overallScore: number;
  readonly flags: readonly RedFlag[];
}

export interface PeerComparison {
  peerCount: number;
  entityTotal: MoneyDollars;
  peerMean: MoneyDollars;
  peerMedian: MoneyDollars;
  zScore?: number;
  percentileRank: number;
}

export type PeerComparisonOutcome =
  | { status: 'available'; comparison: PeerComparison; peerGroup?: string }
  | { status: 'unavailable'; reason: string };

export interface EntityProfile {
  name?: string;
  specialty?: string;
  state?: string;
  city?: string;
}

export interface MonthlyTimelineEntry {
  period: CalendarMonth;
  claimCount: number;
  paidAmount: MoneyDollars;
  beneficiaryCount?: number;
}

export interface ClaimsSummary {
  totalClaims: number;
  totalPaid: MoneyDollars;
  totalBeneficiaries?: number;
  activeMonths: number;
  firstMonth: CalendarMonth;
  lastMonth: CalendarMonth;
  avgPaidPerClaim: MoneyDollars | null;
  peakMonth: {
    period: CalendarMonth;
    claimCount: number;
    paidAmount: MoneyDollars;
  };
}

export interface Dossier {
  entityId: EntityId;
  profile?: EntityProfile;
  scanResult: ScanResult;
  claimsSummary: ClaimsSummary;
  timeline: MonthlyTimelineEntry[];
  peerComparison: PeerComparisonOutcome;
}
