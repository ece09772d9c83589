/**
 * Period Rollover
 *
 * Builds each period's backlog from what the previous period left unfilled
 * plus the orders first requested in this period. Orders are carried as the
 * same instances, so identity, age and remaining quantity pass through as-is.
 */

import { DemandOrder, compareFifo } from '../../models/demand-order';
import { compareTiers } from '../../utils/tiers';

/** Tier rank first, then FIFO within the tier */
export function compareBacklog(a: DemandOrder, b: DemandOrder): number {
  return compareTiers(a.priorityTier, b.priorityTier) || compareFifo(a, b);
}

/**
 * Open a period: carried backlog plus arrivals, minus anything already Full.
 */
export function openBacklog(carried: DemandOrder[], arriving: DemandOrder[]): DemandOrder[] {
  return [...carried, ...arriving]
    .filter((order) => order.qtyRemaining > 0)
    .sort(compareBacklog);
}

/**
 * Close a period: every order still owed units moves to the next backlog.
 */
export function rolloverBacklog(backlog: DemandOrder[]): DemandOrder[] {
  return backlog.filter((order) => order.qtyRemaining > 0);
}
