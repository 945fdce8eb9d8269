import { EntityId } from '../../types/common';
import {
  AggregateTables,
  FlagKind,
  MonthlyAggregate,
  ProcedureAmountAggregate,
  RedFlag,
  ScanResult
} from '../../types/scanner';
import { ScanConfig } from './config';

export interface DetectionRule {
  id: FlagKind;
  name: string;
  description: string;
  scope: 'POPULATION' | 'SELF_HISTORY' | 'FIXED_LIMIT';
  tables: Array<'monthly' | 'procedureAmounts'>;
}

/**
 * Read-only view of one scan's inputs. Tables have already been through the
 * viability pre-filter.
 */
export interface DetectionContext {
  monthly: readonly MonthlyAggregate[];
  procedureAmounts: readonly ProcedureAmountAggregate[];
  config: ScanConfig;
}

export interface DetectorFinding {
  entityId: EntityId;
  flag: RedFlag;
}

export interface Detector {
  detect(context: DetectionContext): DetectorFinding[];
}

export interface ScanStatistics {
  totalResults: number;
  totalFlags: number;
  flagsByKind: Record<FlagKind, number>;
  averageScore: number;
  maxScore: number;
}

export interface ScanEngine {
  scan(tables: AggregateTables, threshold?: number): ScanResult[];
  runDetection(ruleId: string, tables: AggregateTables): DetectorFinding[];
  getAvailableRules(): DetectionRule[];
}
