import { EntityId, MoneyDollars } from '../../types/common';
import { MonthlyAggregate, PeerComparisonOutcome } from '../../types/scanner';
import { totalsByEntity } from '../detect/aggregate';
import { median } from '../detect/robust_stats';
import { UnknownEntityError } from '../errors';

/**
 * Ranks one entity's total against a peer population of totals for the same
 * metric. The population is expected to include the entity itself.
 *
 * Uses mean and sample standard deviation rather than median/MAD: the figures
 * are a peer ranking for readers, not a detection trigger.
 */
export function comparePeers(
  entityTotal: MoneyDollars,
  population: readonly MoneyDollars[]
): PeerComparisonOutcome {
  const peerMedian = median(population);
  if (peerMedian === null) {
    return { status: 'unavailable', reason: 'No peers found for comparison' };
  }

  const peerCount = population.length;
  const peerMean = population.reduce((sum, v) => sum + v, 0) / peerCount;
  const atOrBelow = population.filter(v => v <= entityTotal).length;

  let zScore: number | undefined;
  if (peerCount > 1) {
    const variance = population.reduce((sum, v) => sum + (v - peerMean) ** 2, 0) / (peerCount - 1);
    const std = Math.sqrt(variance);
    if (std > 0) zScore = (entityTotal - peerMean) / std;
  }

  return {
    status: 'available',
    comparison: {
      peerCount,
      entityTotal,
      peerMean,
      peerMedian,
      percentileRank: (atOrBelow / peerCount) * 100,
      ...(zScore !== undefined ? { zScore } : {})
    }
  };
}

/**
 * Compares an entity's total paid with its peers. With `peerGroups` (entity
 * to group key, e.g. specialty) only entities sharing the entity's key are
 * peers; without it the whole table is the population.
 */
export function compareEntityToPeers(
  entityId: EntityId,
  monthly: readonly MonthlyAggregate[],
  peerGroups?: ReadonlyMap<EntityId, string>
): PeerComparisonOutcome {
  const totals = totalsByEntity(monthly);
  const own = totals.get(entityId);
  if (!own) throw new UnknownEntityError(entityId);

  if (!peerGroups) {
    return comparePeers(own.paid, [...totals.values()].map(t => t.paid));
  }

  const group = peerGroups.get(entityId)?.trim();
  if (!group) {
    return { status: 'unavailable', reason: `No peer group value available for entity ${entityId}` };
  }

  const population: MoneyDollars[] = [];
  for (const [peerId, peerTotals] of totals) {
    if (peerGroups.get(peerId)?.trim() === group) population.push(peerTotals.paid);
  }

  const outcome = comparePeers(own.paid, population);
  return outcome.status === 'available' ? { ...outcome, peerGroup: group } : outcome;
}
