/**
 * Waterfall Tier Allocator
 *
 * Hands the period's limit to tiers strictly in priority order.
 * A tier only sees what every higher tier left behind.
 */

import { PriorityTier, TierAllocation } from '../../types';
import { tiersInPriorityOrder } from '../../utils/tiers';

/**
 * @param globalLimit - Units available this period
 * @param tierDemand - Σ qty_remaining per tier; missing tiers count as 0
 * @returns One entry per tier, highest priority first, including zero rows
 */
export function allocateTiers(
  globalLimit: number,
  tierDemand: Partial<Record<PriorityTier, number>>
): TierAllocation[] {
  let remainingLimit = globalLimit;
  const allocations: TierAllocation[] = [];

  // Visit every tier, even after the limit is exhausted, so reports list all of them
  for (const tier of tiersInPriorityOrder()) {
    const demand = tierDemand[tier] ?? 0;
    const allocated = Math.min(demand, remainingLimit);
    remainingLimit -= allocated;
    allocations.push({ tier, demand, allocated });
  }

  return allocations;
}
