/**
 * Allocation Engine - Main Orchestrator
 *
 * Runs, for each period in chronological order:
 * 1. Open backlog (carried remainders + new orders)
 * 2. Resolve the global build limit
 * 3. Waterfall the limit across tiers
 * 4. FIFO each tier's share into its orders
 * 5. Snapshot results and roll the remainder forward
 *
 * Periods depend on each other through the backlog and the lookahead, so they
 * are never run out of order. Nothing here performs I/O; the only side effect
 * is DemandOrder.grant() on the orders passed in.
 */

import {
  AllocationResult,
  ConstraintResolution,
  LookaheadSignal,
  PeriodSummary,
  PriorityTier,
  SupplyRecord,
  TierAllocation,
} from '../../types';
import { DemandOrder } from '../../models/demand-order';
import { emptySupply } from '../../models/supply-record';
import { AllocationInvariantError } from '../../utils/errors';
import { checkedAdd, checkedSum } from './arithmetic';
import { DEFAULTS, ENGINE_VERSION } from './constants';
import { buildableUnits, resolveGlobalLimit } from './constraints';
import { allocateTiers } from './waterfall';
import { distributeFifo } from './fifo';
import { openBacklog, rolloverBacklog } from './rollover';

// Re-export for external use
export { ENGINE_VERSION, DEFAULTS };
export { resolveGlobalLimit, buildableUnits } from './constraints';
export { allocateTiers } from './waterfall';
export { distributeFifo } from './fifo';
export { openBacklog, rolloverBacklog } from './rollover';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface PeriodState {
  period: number;
  globalLimit: number;
  remainingLimit: number;
  backlog: DemandOrder[];
}

export interface PeriodInput {
  supply: SupplyRecord;
  carried: DemandOrder[];
  arriving: DemandOrder[];
  lookahead: LookaheadSignal | null;
}

export interface PeriodOutcome {
  state: PeriodState;
  resolution: ConstraintResolution;
  tiers: TierAllocation[];
  summary: PeriodSummary;
  results: AllocationResult[];
  carried: DemandOrder[];
}

export interface AllocationRunOptions {
  lookahead?: boolean;
}

export interface AllocationRun {
  engineVersion: string;
  lookahead: boolean;
  periods: PeriodSummary[];
  tiers: Array<{ period: number; allocations: TierAllocation[] }>;
  results: AllocationResult[];
  backlog: DemandOrder[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Single period
// ─────────────────────────────────────────────────────────────────────────────

function toResult(period: number, order: DemandOrder, grantedThisPeriod: number): AllocationResult {
  return {
    period,
    order_id: order.orderId,
    customer_id: order.customerId,
    segment: order.segment,
    priority_tier: order.priorityTier,
    period_requested: order.periodRequested,
    qty_ordered: order.qtyOrdered,
    qty_allocated: order.qtyAllocated,
    qty_allocated_this_period: grantedThisPeriod,
    qty_remaining: order.qtyRemaining,
    status: order.status,
  };
}

/**
 * Run one period. Takes the carried backlog in, returns the next one out.
 */
export function runPeriod(input: PeriodInput): PeriodOutcome {
  const { supply } = input;
  const period = supply.period;

  // STEP 1: Open backlog
  const backlog = openBacklog(input.carried, input.arriving);
  const allocatedBefore = backlog.map((order) => order.qtyAllocated);

  const tierDemand: Partial<Record<PriorityTier, number>> = {};
  const ordersByTier = new Map<PriorityTier, DemandOrder[]>();
  for (const order of backlog) {
    tierDemand[order.priorityTier] = checkedAdd(
      tierDemand[order.priorityTier] ?? 0,
      order.qtyRemaining,
      'tier demand'
    );
    const bucket = ordersByTier.get(order.priorityTier);
    if (bucket) {
      bucket.push(order);
    } else {
      ordersByTier.set(order.priorityTier, [order]);
    }
  }

  const totalDemand = checkedSum(backlog.map((order) => order.qtyRemaining), 'total demand');
  const newDemand = checkedSum(input.arriving.map((order) => order.qtyOrdered), 'new demand');

  // STEP 2: Resolve limit
  const resolution = resolveGlobalLimit(supply, input.lookahead);
  const state: PeriodState = {
    period,
    globalLimit: resolution.globalLimit,
    remainingLimit: resolution.globalLimit,
    backlog,
  };

  // STEP 3: Waterfall
  const tiers = allocateTiers(resolution.globalLimit, tierDemand);

  // STEP 4: FIFO within each tier (tiers given 0 are still visited and grant nothing)
  for (const tierAllocation of tiers) {
    const grants = distributeFifo(tierAllocation.allocated, ordersByTier.get(tierAllocation.tier) ?? []);
    const placed = checkedSum(grants.map((g) => g.granted), 'tier placement');

    if (placed !== tierAllocation.allocated) {
      throw new AllocationInvariantError(
        `Tier ${tierAllocation.tier} placed ${placed} of ${tierAllocation.allocated} units in period ${period}`,
        { period, tier: tierAllocation.tier, placed, allocated: tierAllocation.allocated }
      );
    }
    state.remainingLimit -= placed;
  }

  // STEP 5: Snapshot and roll over
  const results = backlog.map((order, i) =>
    toResult(period, order, order.qtyAllocated - allocatedBefore[i])
  );
  const totalAllocated = checkedSum(results.map((r) => r.qty_allocated_this_period), 'period allocation');
  const carried = rolloverBacklog(backlog);

  const summary: PeriodSummary = {
    period,
    global_limit: resolution.globalLimit,
    total_demand: totalDemand,
    total_allocated: totalAllocated,
    constraining_subcomponent: resolution.constrainingSubcomponent,
    base_limit: resolution.baseLimit,
    reserved_qty: resolution.reservedQty,
    new_demand: newDemand,
    backlog_carried: checkedSum(carried.map((order) => order.qtyRemaining), 'carried backlog'),
    subcomponent_a_qty: supply.subcomponentAQty,
    subcomponent_b_qty: supply.subcomponentBQty,
  };

  return { state, resolution, tiers, summary, results, carried };
}

// ─────────────────────────────────────────────────────────────────────────────
// Full horizon
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Sorted, de-duplicated periods named by supply or demand.
 */
export function buildHorizon(supply: SupplyRecord[], orders: DemandOrder[]): number[] {
  const periods = new Set<number>();
  for (const record of supply) periods.add(record.period);
  for (const order of orders) periods.add(order.periodRequested);
  return [...periods].sort((a, b) => a - b);
}

/**
 * Run the engine across every period, oldest first.
 *
 * A period with orders but no supply record has zero supply. Orders are
 * mutated in place; build fresh ones to re-run the same scenario.
 *
 * @param supply - One record per period (validated by ingestion)
 * @param orders - Every order, all periods (ids unique, validated by ingestion)
 */
export function runAllocation(
  supply: SupplyRecord[],
  orders: DemandOrder[],
  options: AllocationRunOptions = {}
): AllocationRun {
  const lookahead = options.lookahead ?? DEFAULTS.LOOKAHEAD;
  const horizon = buildHorizon(supply, orders);

  const supplyByPeriod = new Map<number, SupplyRecord>();
  for (const record of supply) supplyByPeriod.set(record.period, record);

  const arrivalsByPeriod = new Map<number, DemandOrder[]>();
  const demandByPeriod = new Map<number, number>();
  for (const order of orders) {
    const arrivals = arrivalsByPeriod.get(order.periodRequested);
    if (arrivals) {
      arrivals.push(order);
    } else {
      arrivalsByPeriod.set(order.periodRequested, [order]);
    }
    demandByPeriod.set(
      order.periodRequested,
      checkedAdd(demandByPeriod.get(order.periodRequested) ?? 0, order.qtyOrdered, 'period demand')
    );
  }

  const supplyFor = (period: number): SupplyRecord =>
    supplyByPeriod.get(period) ?? emptySupply(period);

  const run: AllocationRun = {
    engineVersion: ENGINE_VERSION,
    lookahead,
    periods: [],
    tiers: [],
    results: [],
    backlog: [],
  };

  let carried: DemandOrder[] = [];

  horizon.forEach((period, index) => {
    const next = index + 1 < horizon.length ? horizon[index + 1] : null;
    const signal: LookaheadSignal | null =
      lookahead && next !== null
        ? { nextDemand: demandByPeriod.get(next) ?? 0, nextSupply: buildableUnits(supplyFor(next)) }
        : null;

    const outcome = runPeriod({
      supply: supplyFor(period),
      carried,
      arriving: arrivalsByPeriod.get(period) ?? [],
      lookahead: signal,
    });

    run.periods.push(outcome.summary);
    run.tiers.push({ period, allocations: outcome.tiers });
    run.results.push(...outcome.results);
    carried = outcome.carried;
  });

  run.backlog = carried;
  return run;
}
