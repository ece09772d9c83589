/**
 * Record builders shared by the JSON and CSV ingestion paths.
 */

import {
  CustomerTier,
  DeliveryLine,
  DemandLine,
  PriorityTier,
  SupplyLine,
  SupplyRecord,
} from '../../types';
import { DemandOrder } from '../../models/demand-order';
import { createSupplyRecord } from '../../models/supply-record';
import { DuplicateOrderIdError, DuplicateSupplyPeriodError, UnknownPriorityTierError } from '../../utils/errors';
import { toPeriodKey, weekKeyForDate } from '../../utils/periods';
import { toPriorityTier } from '../../utils/tiers';
import { checkedAdd } from '../engine/arithmetic';
import { DEFAULTS } from '../engine/constants';

export interface EngineInputs {
  supply: SupplyRecord[];
  orders: DemandOrder[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Supply
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Roll dated deliveries up into one supply record per ISO week.
 * A subcomponent with no deliveries in a week counts as 0.
 */
export function aggregateDeliveries(deliveries: DeliveryLine[]): SupplyRecord[] {
  const totals = new Map<number, { a: number; b: number }>();

  for (const delivery of deliveries) {
    const period = weekKeyForDate(delivery.delivery_date);
    const entry = totals.get(period) ?? { a: 0, b: 0 };
    if (delivery.product_type === 'A') {
      entry.a = checkedAdd(entry.a, delivery.quantity, 'delivery aggregation');
    } else {
      entry.b = checkedAdd(entry.b, delivery.quantity, 'delivery aggregation');
    }
    totals.set(period, entry);
  }

  return [...totals.entries()]
    .sort(([a], [b]) => a - b)
    .map(([period, { a, b }]) => createSupplyRecord(period, a, b));
}

/**
 * Validate weekly supply lines and merge in aggregated deliveries.
 * Each period may be supplied exactly once across both sources.
 */
export function buildSupplyRecords(lines: SupplyLine[], deliveries: DeliveryLine[] = []): SupplyRecord[] {
  const records = [
    ...lines.map((line) =>
      createSupplyRecord(toPeriodKey(line.period), line.subcomponent_a_qty, line.subcomponent_b_qty)
    ),
    ...aggregateDeliveries(deliveries),
  ];

  const seen = new Set<number>();
  for (const record of records) {
    if (seen.has(record.period)) {
      throw new DuplicateSupplyPeriodError(record.period);
    }
    seen.add(record.period);
  }

  return records.sort((a, b) => a.period - b.period);
}

// ─────────────────────────────────────────────────────────────────────────────
// Demand
// ─────────────────────────────────────────────────────────────────────────────

interface MasterEntry {
  tier: PriorityTier;
  segment: string;
}

function indexCustomers(customers: CustomerTier[]): Map<string, MasterEntry> {
  const index = new Map<string, MasterEntry>();
  for (const customer of customers) {
    const tier = toPriorityTier(customer.priority_tier);
    if (tier === null) {
      throw new UnknownPriorityTierError(`customer:${customer.customer_id}`, customer.priority_tier);
    }
    index.set(customer.customer_id, { tier, segment: customer.segment });
  }
  return index;
}

/**
 * Build DemandOrders from demand lines.
 *
 * Tier comes from the line, else from the customer master; an order with
 * neither is rejected rather than defaulted. Segment falls back the same way,
 * ending at 'Unknown'.
 */
export function buildOrderBook(lines: DemandLine[], customers: CustomerTier[] = []): DemandOrder[] {
  const master = indexCustomers(customers);
  const seen = new Set<string>();
  const orders: DemandOrder[] = [];

  for (const line of lines) {
    if (seen.has(line.order_id)) {
      throw new DuplicateOrderIdError(line.order_id);
    }
    seen.add(line.order_id);

    const fromMaster = master.get(line.customer_id);
    let tier: PriorityTier | null;
    if (line.priority_tier !== undefined) {
      tier = toPriorityTier(line.priority_tier);
      if (tier === null) throw new UnknownPriorityTierError(line.order_id, line.priority_tier);
    } else {
      tier = fromMaster?.tier ?? null;
      if (tier === null) throw new UnknownPriorityTierError(line.order_id);
    }

    orders.push(
      new DemandOrder({
        orderId: line.order_id,
        customerId: line.customer_id,
        segment: line.segment ?? fromMaster?.segment ?? DEFAULTS.SEGMENT,
        priorityTier: tier,
        periodRequested: toPeriodKey(line.period_requested),
        qtyOrdered: line.qty_ordered,
      })
    );
  }

  return orders;
}
