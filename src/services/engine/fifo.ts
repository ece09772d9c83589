/**
 * FIFO Backlog Distributor
 *
 * Pours a tier's allocation into its orders, oldest request first.
 * Mutates the orders it is given (via DemandOrder.grant).
 */

import { FifoGrant } from '../../types';
import { DemandOrder, compareFifo } from '../../models/demand-order';

/**
 * Distribute `tierAllocation` units across `orders`.
 *
 * Sort: period_requested ascending, then order_id ascending.
 * Each order takes min(its remaining, what is left); the first order that
 * cannot be filled completely is the last one touched.
 *
 * @returns Grants in the order they were made (zero grants are omitted)
 */
export function distributeFifo(tierAllocation: number, orders: DemandOrder[]): FifoGrant[] {
  const grants: FifoGrant[] = [];
  let tierRemaining = tierAllocation;

  const queue = orders
    .filter((order) => order.qtyRemaining > 0)
    .sort(compareFifo);

  for (const order of queue) {
    if (tierRemaining <= 0) break;

    const grant = Math.min(order.qtyRemaining, tierRemaining);
    order.grant(grant);
    tierRemaining -= grant;
    grants.push({ orderId: order.orderId, granted: grant });
  }

  return grants;
}
