/**
 * Constraint Resolver
 *
 * Pure function deriving a period's global build limit from the two
 * subcomponent supplies and a one-period lookahead reservation.
 */

import { ConstraintResolution, LookaheadSignal, SupplyRecord } from '../../types';

/** Units buildable from a supply record: the scarcer subcomponent wins */
export function buildableUnits(supply: SupplyRecord): number {
  return Math.min(supply.subcomponentAQty, supply.subcomponentBQty);
}

/**
 * Resolve the global build limit for one period.
 *
 * base = min(A, B). When next period's known demand exceeds its forecast
 * supply by D > 0, min(D, base) is held back from this period.
 * A null lookahead (last period, or lookahead disabled) reserves nothing.
 */
export function resolveGlobalLimit(
  supply: SupplyRecord,
  lookahead: LookaheadSignal | null
): ConstraintResolution {
  const baseLimit = buildableUnits(supply);

  let reservedQty = 0;
  if (lookahead) {
    const deficit = lookahead.nextDemand - lookahead.nextSupply;
    if (deficit > 0) {
      reservedQty = Math.min(deficit, baseLimit);
    }
  }

  const constrainingSubcomponent =
    reservedQty > 0
      ? 'lookahead'
      : supply.subcomponentAQty <= supply.subcomponentBQty
        ? 'A'
        : 'B';

  return {
    period: supply.period,
    baseLimit,
    reservedQty,
    globalLimit: baseLimit - reservedQty,
    constrainingSubcomponent,
  };
}
