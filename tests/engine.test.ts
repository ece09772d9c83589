import { describe, it, expect } from 'vitest';
import { DemandOrder } from '../src/models/demand-order';
import { createSupplyRecord } from '../src/models/supply-record';
import {
  allocateTiers,
  buildHorizon,
  distributeFifo,
  openBacklog,
  resolveGlobalLimit,
  rolloverBacklog,
  runAllocation,
  runPeriod,
} from '../src/services/engine';
import { checkedAdd, checkedSum } from '../src/services/engine/arithmetic';
import { AllocationResult, PriorityTier, PRIORITY_TIERS } from '../src/types';
import { AllocationInvariantError, ArithmeticOverflowError, InvalidInputError } from '../src/utils/errors';
import { compareTiers } from '../src/utils/tiers';

function order(
  orderId: string,
  priorityTier: PriorityTier,
  periodRequested: number,
  qtyOrdered: number,
  customerId = 'CUST-1'
): DemandOrder {
  return new DemandOrder({
    orderId,
    customerId,
    segment: 'Test',
    priorityTier,
    periodRequested,
    qtyOrdered,
  });
}

describe('Allocation Engine', () => {
  describe('DemandOrder', () => {
    it('starts Unfulfilled and moves through Partial to Full', () => {
      const o = order('O-1', 'P1', 1, 10);
      expect(o.status).toBe('Unfulfilled');
      expect(o.qtyRemaining).toBe(10);

      o.grant(4);
      expect(o.status).toBe('Partial');
      expect(o.qtyAllocated).toBe(4);
      expect(o.qtyRemaining).toBe(6);

      o.grant(6);
      expect(o.status).toBe('Full');
      expect(o.qtyRemaining).toBe(0);
    });

    it('treats a zero grant as a no-op', () => {
      const o = order('O-1', 'P1', 1, 10);
      o.grant(0);
      expect(o.qtyAllocated).toBe(0);
      expect(o.status).toBe('Unfulfilled');
    });

    it('refuses to grant more than remains', () => {
      const o = order('O-1', 'P1', 1, 10);
      o.grant(8);
      expect(() => o.grant(3)).toThrow(AllocationInvariantError);
      expect(o.qtyAllocated).toBe(8);
    });

    it('refuses negative or fractional grants', () => {
      const o = order('O-1', 'P1', 1, 10);
      expect(() => o.grant(-1)).toThrow(AllocationInvariantError);
      expect(() => o.grant(1.5)).toThrow(AllocationInvariantError);
    });

    it('rejects invalid quantities at construction', () => {
      expect(() => order('O-1', 'P1', 1, 0)).toThrow(InvalidInputError);
      expect(() => order('O-1', 'P1', 1, 2.5)).toThrow(InvalidInputError);
      expect(() => order('O-1', 'P1', -1, 5)).toThrow(InvalidInputError);
      expect(
        () =>
          new DemandOrder({
            orderId: 'O-1',
            customerId: 'C',
            segment: 'S',
            priorityTier: 'P1',
            periodRequested: 1,
            qtyOrdered: 5,
            qtyAllocated: 6,
          })
      ).toThrow(InvalidInputError);
    });
  });

  describe('resolveGlobalLimit', () => {
    it('takes the scarcer subcomponent as the limit', () => {
      const result = resolveGlobalLimit(createSupplyRecord(1, 120, 100), null);
      expect(result).toEqual({
        period: 1,
        baseLimit: 100,
        reservedQty: 0,
        globalLimit: 100,
        constrainingSubcomponent: 'B',
      });
    });

    it('reports A when A is scarcer or tied', () => {
      expect(resolveGlobalLimit(createSupplyRecord(1, 80, 100), null).constrainingSubcomponent).toBe('A');
      expect(resolveGlobalLimit(createSupplyRecord(1, 50, 50), null).constrainingSubcomponent).toBe('A');
    });

    it('reserves the forecast deficit of the next period', () => {
      const result = resolveGlobalLimit(createSupplyRecord(1, 100, 100), {
        nextDemand: 130,
        nextSupply: 90,
      });
      expect(result.reservedQty).toBe(40);
      expect(result.globalLimit).toBe(60);
      expect(result.constrainingSubcomponent).toBe('lookahead');
    });

    it('never reserves more than the base limit', () => {
      const result = resolveGlobalLimit(createSupplyRecord(1, 30, 50), {
        nextDemand: 200,
        nextSupply: 0,
      });
      expect(result.reservedQty).toBe(30);
      expect(result.globalLimit).toBe(0);
    });

    it('reserves nothing when next period is covered', () => {
      const result = resolveGlobalLimit(createSupplyRecord(1, 100, 100), {
        nextDemand: 50,
        nextSupply: 90,
      });
      expect(result.reservedQty).toBe(0);
      expect(result.globalLimit).toBe(100);
      expect(result.constrainingSubcomponent).toBe('A');
    });

    it('stays at zero with no supply even when a deficit is forecast', () => {
      const result = resolveGlobalLimit(createSupplyRecord(1, 0, 0), {
        nextDemand: 10,
        nextSupply: 0,
      });
      expect(result.globalLimit).toBe(0);
      expect(result.reservedQty).toBe(0);
      expect(result.constrainingSubcomponent).toBe('A');
    });
  });

  describe('allocateTiers', () => {
    it('fills higher tiers first and lists every tier', () => {
      const result = allocateTiers(100, { P1: 80, P2: 40 });

      expect(result).toHaveLength(PRIORITY_TIERS.length);
      expect(result.map((t) => t.tier)).toEqual([...PRIORITY_TIERS]);
      expect(result[0]).toEqual({ tier: 'P1', demand: 80, allocated: 80 });
      expect(result[1]).toEqual({ tier: 'P2', demand: 40, allocated: 20 });
      expect(result.slice(2).every((t) => t.allocated === 0)).toBe(true);
    });

    it('gives zero to every tier when the limit is zero', () => {
      const result = allocateTiers(0, { P1: 10, P5: 10 });
      expect(result.every((t) => t.allocated === 0)).toBe(true);
    });

    it('skips tiers without demand without consuming the limit', () => {
      const result = allocateTiers(50, { P2: 0, P3: 30 });
      expect(result[1]).toEqual({ tier: 'P2', demand: 0, allocated: 0 });
      expect(result[2]).toEqual({ tier: 'P3', demand: 30, allocated: 30 });
    });

    it('starves lower tiers once the limit is exhausted', () => {
      const result = allocateTiers(80, { P1: 80, P2: 10 });
      expect(result[0].allocated).toBe(80);
      expect(result[1].allocated).toBe(0);
    });
  });

  describe('distributeFifo', () => {
    it('fills oldest requests first, then by order id', () => {
      const newer = order('O-1', 'P1', 2, 10);
      const olderB = order('O-3', 'P1', 1, 10);
      const olderA = order('O-2', 'P1', 1, 10);

      const grants = distributeFifo(15, [newer, olderB, olderA]);

      expect(grants).toEqual([
        { orderId: 'O-2', granted: 10 },
        { orderId: 'O-3', granted: 5 },
      ]);
      expect(olderA.status).toBe('Full');
      expect(olderB.status).toBe('Partial');
      expect(newer.status).toBe('Unfulfilled');
    });

    it('does nothing with a zero allocation', () => {
      const o = order('O-1', 'P1', 1, 10);
      expect(distributeFifo(0, [o])).toEqual([]);
      expect(o.qtyAllocated).toBe(0);
    });

    it('skips orders that are already full', () => {
      const done = new DemandOrder({
        orderId: 'O-1',
        customerId: 'C',
        segment: 'S',
        priorityTier: 'P1',
        periodRequested: 1,
        qtyOrdered: 5,
        qtyAllocated: 5,
      });
      const open = order('O-2', 'P1', 1, 5);

      expect(distributeFifo(3, [done, open])).toEqual([{ orderId: 'O-2', granted: 3 }]);
    });

    it('breaks ties by code unit, not locale', () => {
      const lower = order('b-order', 'P1', 1, 5);
      const upper = order('B-order', 'P1', 1, 5);

      distributeFifo(1, [lower, upper]);

      expect(upper.qtyAllocated).toBe(1);
      expect(lower.qtyAllocated).toBe(0);
    });

    it('leaves the caller array order alone', () => {
      const list = [order('O-2', 'P1', 2, 5), order('O-1', 'P1', 1, 5)];
      distributeFifo(10, list);
      expect(list.map((o) => o.orderId)).toEqual(['O-2', 'O-1']);
    });
  });

  describe('rollover', () => {
    it('opens a backlog ordered by tier then age, without full orders', () => {
      const carried = order('C-1', 'P2', 1, 10);
      carried.grant(4);
      const full = order('F-1', 'P1', 1, 3);
      full.grant(3);
      const arriving = [order('N-2', 'P1', 2, 5), order('N-1', 'P2', 2, 5)];

      const backlog = openBacklog([carried, full], arriving);

      expect(backlog.map((o) => o.orderId)).toEqual(['N-2', 'C-1', 'N-1']);
    });

    it('carries the same instances with their remaining quantity', () => {
      const partial = order('O-1', 'P1', 1, 10);
      partial.grant(7);
      const done = order('O-2', 'P1', 1, 2);
      done.grant(2);

      const next = rolloverBacklog([partial, done]);

      expect(next).toHaveLength(1);
      expect(next[0]).toBe(partial);
      expect(next[0].qtyRemaining).toBe(3);
      expect(next[0].periodRequested).toBe(1);
    });
  });

  describe('runPeriod', () => {
    it('allocates the two-tier shortage scenario', () => {
      const o1 = order('O1', 'P1', 1, 50);
      const o2 = order('O2', 'P1', 1, 30);
      const o3 = order('O3', 'P2', 1, 40);

      const outcome = runPeriod({
        supply: createSupplyRecord(1, 100, 120),
        carried: [],
        arriving: [o1, o2, o3],
        lookahead: null,
      });

      expect(outcome.tiers.slice(0, 2)).toEqual([
        { tier: 'P1', demand: 80, allocated: 80 },
        { tier: 'P2', demand: 40, allocated: 20 },
      ]);
      expect(o1.status).toBe('Full');
      expect(o2.status).toBe('Full');
      expect(o3.qtyAllocated).toBe(20);
      expect(o3.status).toBe('Partial');

      expect(outcome.summary).toEqual({
        period: 1,
        global_limit: 100,
        total_demand: 120,
        total_allocated: 100,
        constraining_subcomponent: 'A',
        base_limit: 100,
        reserved_qty: 0,
        new_demand: 120,
        backlog_carried: 20,
        subcomponent_a_qty: 100,
        subcomponent_b_qty: 120,
      });
      expect(outcome.state.remainingLimit).toBe(0);
      expect(outcome.carried).toEqual([o3]);
      expect(outcome.results.find((r) => r.order_id === 'O3')).toEqual({
        period: 1,
        order_id: 'O3',
        customer_id: 'CUST-1',
        segment: 'Test',
        priority_tier: 'P2',
        period_requested: 1,
        qty_ordered: 40,
        qty_allocated: 20,
        qty_allocated_this_period: 20,
        qty_remaining: 20,
        status: 'Partial',
      });
    });

    it('leaves unused limit when demand is short', () => {
      const outcome = runPeriod({
        supply: createSupplyRecord(1, 100, 100),
        carried: [],
        arriving: [order('O1', 'P4', 1, 30)],
        lookahead: null,
      });
      expect(outcome.summary.total_allocated).toBe(30);
      expect(outcome.state.remainingLimit).toBe(70);
      expect(outcome.carried).toEqual([]);
    });
  });

  describe('runAllocation', () => {
    function scenario(): DemandOrder[] {
      return [
        order('X1', 'P2', 1, 40),
        order('X2', 'P1', 1, 30),
        order('X3', 'P2', 2, 25),
        order('X4', 'P1', 2, 20),
        order('X5', 'P1', 3, 10),
      ];
    }

    const supply = [
      createSupplyRecord(1, 60, 80),
      createSupplyRecord(2, 50, 40),
      createSupplyRecord(3, 100, 100),
    ];

    it('carries backlog across periods ahead of newer orders', () => {
      const run = runAllocation(supply, scenario(), { lookahead: false });

      expect(run.periods.map((p) => [p.period, p.global_limit, p.total_demand, p.total_allocated, p.backlog_carried])).toEqual([
        [1, 60, 70, 60, 10],
        [2, 40, 55, 40, 15],
        [3, 100, 25, 25, 0],
      ]);
      expect(run.periods.map((p) => p.constraining_subcomponent)).toEqual(['A', 'B', 'A']);
      expect(run.results).toHaveLength(7);

      const x1InPeriod2 = run.results.find((r) => r.period === 2 && r.order_id === 'X1');
      expect(x1InPeriod2).toMatchObject({
        qty_allocated: 40,
        qty_allocated_this_period: 10,
        status: 'Full',
      });
      const x3InPeriod2 = run.results.find((r) => r.period === 2 && r.order_id === 'X3');
      expect(x3InPeriod2).toMatchObject({ qty_allocated: 10, qty_remaining: 15, status: 'Partial' });
      expect(run.backlog).toEqual([]);
    });

    it('holds back capacity when the next period is short', () => {
      const run = runAllocation(supply, scenario(), { lookahead: true });

      expect(run.periods[0]).toMatchObject({
        global_limit: 55,
        base_limit: 60,
        reserved_qty: 5,
        constraining_subcomponent: 'lookahead',
        total_allocated: 55,
      });
      expect(run.periods[1]).toMatchObject({ global_limit: 40, reserved_qty: 0, total_allocated: 40 });
      expect(run.periods[2]).toMatchObject({ global_limit: 100, total_allocated: 30, backlog_carried: 0 });

      const x3InPeriod2 = run.results.find((r) => r.period === 2 && r.order_id === 'X3');
      expect(x3InPeriod2).toMatchObject({ qty_allocated_this_period: 5, qty_remaining: 20 });
    });

    it('defaults to lookahead on', () => {
      const run = runAllocation(supply, scenario());
      expect(run.lookahead).toBe(true);
      expect(run.periods[0].reserved_qty).toBe(5);
    });

    it('treats a period without a supply record as zero supply', () => {
      const late = order('L1', 'P1', 4, 12);
      const run = runAllocation(supply, [...scenario(), late], { lookahead: false });

      expect(run.periods.map((p) => p.period)).toEqual([1, 2, 3, 4]);
      expect(run.periods[3]).toMatchObject({ global_limit: 0, total_demand: 12, total_allocated: 0 });
      expect(run.backlog).toEqual([late]);
      expect(late.status).toBe('Unfulfilled');
    });

    it('builds the horizon from supply and demand periods', () => {
      expect(buildHorizon([createSupplyRecord(5, 1, 1)], [order('A', 'P1', 2, 1), order('B', 'P1', 5, 1)])).toEqual([2, 5]);
    });

    it('fails on running totals beyond the safe integer range', () => {
      const huge = [
        order('H1', 'P1', 1, Number.MAX_SAFE_INTEGER),
        order('H2', 'P1', 1, Number.MAX_SAFE_INTEGER),
      ];
      expect(() => runAllocation([createSupplyRecord(1, 10, 10)], huge)).toThrow(ArithmeticOverflowError);
    });
  });

  describe('properties', () => {
    // Deterministic pseudo-random scenario: 6 periods, 40 orders over 4 tiers
    function randomScenario() {
      let seed = 20260105;
      const next = (max: number) => {
        seed = (Math.imul(seed, 1103515245) + 12345) >>> 0;
        return (seed >>> 16) % max;
      };
      const tiers: PriorityTier[] = ['P1', 'P2', 'P5', 'P9'];

      const supply = [1, 2, 3, 4, 5, 6].map((period) =>
        createSupplyRecord(period, 20 + next(120), 20 + next(120))
      );
      const orders = Array.from({ length: 40 }, (_, i) =>
        order(`R-${String(i).padStart(3, '0')}`, tiers[next(tiers.length)], 1 + next(6), 1 + next(40), `C-${next(5)}`)
      );
      return { supply, orders };
    }

    const { supply, orders } = randomScenario();
    const run = runAllocation(supply, orders);

    function rowsFor(period: number): AllocationResult[] {
      return run.results.filter((r) => r.period === period);
    }

    it('never allocates more than the limit, and exactly the limit when short', () => {
      for (const summary of run.periods) {
        const allocated = rowsFor(summary.period).reduce((sum, r) => sum + r.qty_allocated_this_period, 0);
        expect(allocated).toBe(summary.total_allocated);
        expect(allocated).toBeLessThanOrEqual(summary.global_limit);
        expect(allocated === summary.global_limit).toBe(summary.total_demand >= summary.global_limit);
      }
    });

    it('keeps every order within 0..qty_ordered and conserves units', () => {
      for (const row of run.results) {
        expect(row.qty_allocated).toBeGreaterThanOrEqual(0);
        expect(row.qty_allocated).toBeLessThanOrEqual(row.qty_ordered);
        expect(row.qty_allocated + row.qty_remaining).toBe(row.qty_ordered);
      }
    });

    it('never lowers an order allocation and carries remainders unchanged', () => {
      const byOrder = new Map<string, AllocationResult[]>();
      for (const row of run.results) {
        byOrder.set(row.order_id, [...(byOrder.get(row.order_id) ?? []), row]);
      }

      for (const rows of byOrder.values()) {
        for (let i = 1; i < rows.length; i++) {
          const prev = rows[i - 1];
          const curr = rows[i];
          expect(curr.period).toBeGreaterThan(prev.period);
          expect(curr.qty_allocated).toBeGreaterThanOrEqual(prev.qty_allocated);
          expect(curr.qty_remaining + curr.qty_allocated_this_period).toBe(prev.qty_remaining);
        }
      }
    });

    it('starves lower tiers while a higher tier still has remaining demand', () => {
      for (const summary of run.periods) {
        const rows = rowsFor(summary.period);
        for (const higher of rows) {
          if (higher.qty_remaining === 0) continue;
          const lowerRows = rows.filter((r) => compareTiers(higher.priority_tier, r.priority_tier) < 0);
          expect(lowerRows.every((r) => r.qty_allocated_this_period === 0)).toBe(true);
        }
      }
    });

    it('fills older orders in a tier before newer ones', () => {
      for (const summary of run.periods) {
        const rows = rowsFor(summary.period);
        for (const older of rows) {
          if (older.qty_remaining === 0) continue;
          const newer = rows.filter(
            (r) => r.priority_tier === older.priority_tier && r.period_requested > older.period_requested
          );
          expect(newer.every((r) => r.qty_allocated_this_period === 0)).toBe(true);
        }
      }
    });

    it('produces identical results for identical fresh inputs', () => {
      const first = randomScenario();
      const second = randomScenario();
      expect(runAllocation(first.supply, first.orders).results).toEqual(
        runAllocation(second.supply, second.orders).results
      );
    });
  });

  describe('checked arithmetic', () => {
    it('adds within range', () => {
      expect(checkedAdd(2, 3)).toBe(5);
      expect(checkedSum([1, 2, 3, 4])).toBe(10);
      expect(checkedSum([])).toBe(0);
    });

    it('throws instead of losing precision', () => {
      expect(() => checkedAdd(Number.MAX_SAFE_INTEGER, 1)).toThrow(ArithmeticOverflowError);
    });
  });
});
