import { CalendarMonth, EntityId, MoneyDollars } from '../../types/common';
import { MonthlyAggregate } from '../../types/scanner';

export interface EntityTotals {
  claims: number;
  paid: MoneyDollars;
  beneficiaries?: number;
}

export interface MonthTotals {
  claimCount: number;
  paidAmount: MoneyDollars;
  beneficiaryCount?: number;
}

export function totalsByEntity(monthly: readonly MonthlyAggregate[]): Map<EntityId, EntityTotals> {
  const totals = new Map<EntityId, EntityTotals>();

  for (const row of monthly) {
    const current = totals.get(row.entityId) ?? { claims: 0, paid: 0 };
    current.claims += row.claimCount;
    current.paid += row.paidAmount;
    if (row.beneficiaryCount !== undefined) {
      current.beneficiaries = (current.beneficiaries ?? 0) + row.beneficiaryCount;
    }
    totals.set(row.entityId, current);
  }

  return totals;
}

/**
 * Per-entity monthly totals, months in chronological order. Duplicate
 * (entity, month) rows are summed.
 */
export function monthsByEntity(
  monthly: readonly MonthlyAggregate[]
): Map<EntityId, Map<CalendarMonth, MonthTotals>> {
  const byEntity = new Map<EntityId, Map<CalendarMonth, MonthTotals>>();

  for (const row of monthly) {
    let months = byEntity.get(row.entityId);
    if (!months) {
      months = new Map();
      byEntity.set(row.entityId, months);
    }

    const current = months.get(row.period) ?? { claimCount: 0, paidAmount: 0 };
    current.claimCount += row.claimCount;
    current.paidAmount += row.paidAmount;
    if (row.beneficiaryCount !== undefined) {
      current.beneficiaryCount = (current.beneficiaryCount ?? 0) + row.beneficiaryCount;
    }
    months.set(row.period, current);
  }

  for (const [entityId, months] of byEntity) {
    const ordered = [...months.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    byEntity.set(entityId, new Map(ordered));
  }

  return byEntity;
}

export function formatCount(n: number): string {
  return n.toLocaleString('en-US');
}

export function formatMoney(amount: MoneyDollars): string {
  return `$${amount.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;
}

export function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
