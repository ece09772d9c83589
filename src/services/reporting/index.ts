/**
 * Reporting Sink
 *
 * Shapes engine output for consumers: a flat allocation report (CSV), the
 * cumulative commit summary, per-subcomponent standing, per-tier fill rates
 * and a plain-text period table.
 *
 * All functions are pure and deterministic.
 */

import Papa from 'papaparse';
import {
  AllocationResult,
  CommitSummaryRow,
  ComponentStandingRow,
  PeriodSummary,
  PriorityTier,
  Subcomponent,
  TierFillRate,
} from '../../types';
import { formatPeriodKey } from '../../utils/periods';
import { compareTiers } from '../../utils/tiers';
import { checkedAdd } from '../engine/arithmetic';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export const REPORT_COLUMNS = [
  'period',
  'order_id',
  'customer_id',
  'segment',
  'priority_tier',
  'period_requested',
  'qty_ordered',
  'qty_allocated',
  'qty_allocated_this_period',
  'qty_remaining',
  'status',
] as const satisfies ReadonlyArray<keyof AllocationResult>;

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

// ─────────────────────────────────────────────────────────────────────────────
// Allocation report
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Report order: period, then tier, then customer, then order id.
 */
export function sortReportRows(results: AllocationResult[]): AllocationResult[] {
  return [...results].sort(
    (a, b) =>
      a.period - b.period ||
      compareTiers(a.priority_tier, b.priority_tier) ||
      compareText(a.customer_id, b.customer_id) ||
      compareText(a.order_id, b.order_id)
  );
}

export function formatReportCsv(results: AllocationResult[]): string {
  const rows = sortReportRows(results).map((row) =>
    REPORT_COLUMNS.map((column) => row[column])
  );
  return Papa.unparse({ fields: [...REPORT_COLUMNS], data: rows }, { newline: '\n' });
}

// ─────────────────────────────────────────────────────────────────────────────
// Commit summary
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Running totals per period. Backlog is commit minus demand, so it is zero
 * when everything asked for so far has shipped and negative otherwise.
 * The constraint column is '-' when the period committed all of its demand.
 */
export function buildCommitSummary(periods: PeriodSummary[]): CommitSummaryRow[] {
  let cumulativeDemand = 0;
  let cumulativeCommit = 0;

  return [...periods]
    .sort((a, b) => a.period - b.period)
    .map((summary) => {
      cumulativeDemand = checkedAdd(cumulativeDemand, summary.new_demand, 'cumulative demand');
      cumulativeCommit = checkedAdd(cumulativeCommit, summary.total_allocated, 'cumulative commit');

      return {
        period: summary.period,
        new_demand: summary.new_demand,
        commit: summary.total_allocated,
        cumulative_demand: cumulativeDemand,
        cumulative_commit: cumulativeCommit,
        cumulative_backlog: cumulativeCommit - cumulativeDemand,
        constraint:
          summary.total_allocated === summary.total_demand ? '-' : summary.constraining_subcomponent,
      };
    });
}

// ─────────────────────────────────────────────────────────────────────────────
// Component standing
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Cumulative supply of one subcomponent against cumulative new demand.
 * A negative standing means that input alone could not have covered what
 * was ordered so far.
 */
export function buildComponentStanding(
  periods: PeriodSummary[],
  subcomponent: Subcomponent
): ComponentStandingRow[] {
  let cumulativeSupply = 0;
  let cumulativeTarget = 0;

  return [...periods]
    .sort((a, b) => a.period - b.period)
    .map((summary) => {
      const supply = subcomponent === 'A' ? summary.subcomponent_a_qty : summary.subcomponent_b_qty;
      cumulativeSupply = checkedAdd(cumulativeSupply, supply, `cumulative supply ${subcomponent}`);
      cumulativeTarget = checkedAdd(cumulativeTarget, summary.new_demand, 'cumulative target');
      const standing = cumulativeSupply - cumulativeTarget;

      return {
        period: summary.period,
        supply,
        cumulative_supply: cumulativeSupply,
        cumulative_target: cumulativeTarget,
        standing,
        short: standing < 0,
      };
    });
}

// ─────────────────────────────────────────────────────────────────────────────
// Fill rates
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Ordered vs allocated per tier, using each order's latest snapshot.
 * Only tiers that appear in the results are listed.
 */
export function computeTierFillRates(results: AllocationResult[]): TierFillRate[] {
  const latest = new Map<string, AllocationResult>();
  for (const row of results) {
    const seen = latest.get(row.order_id);
    if (!seen || row.period > seen.period) {
      latest.set(row.order_id, row);
    }
  }

  const totals = new Map<PriorityTier, { ordered: number; allocated: number }>();
  for (const row of latest.values()) {
    const entry = totals.get(row.priority_tier) ?? { ordered: 0, allocated: 0 };
    entry.ordered = checkedAdd(entry.ordered, row.qty_ordered, 'tier ordered');
    entry.allocated = checkedAdd(entry.allocated, row.qty_allocated, 'tier allocated');
    totals.set(row.priority_tier, entry);
  }

  return [...totals.entries()]
    .sort(([a], [b]) => compareTiers(a, b))
    .map(([tier, { ordered, allocated }]) => ({
      priority_tier: tier,
      qty_ordered: ordered,
      qty_allocated: allocated,
      fill_rate: ordered > 0 ? allocated / ordered : 1,
    }));
}

// ─────────────────────────────────────────────────────────────────────────────
// Text
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Fixed-width period table for terminals and logs.
 */
export function formatPeriodTable(periods: PeriodSummary[]): string {
  const header = ['Period', 'Limit', 'Demand', 'Allocated', 'Carried', 'Constraint'];
  const rows = periods.map((p) => [
    formatPeriodKey(p.period),
    String(p.global_limit),
    String(p.total_demand),
    String(p.total_allocated),
    String(p.backlog_carried),
    p.constraining_subcomponent,
  ]);

  const widths = header.map((title, col) =>
    Math.max(title.length, ...rows.map((row) => row[col].length))
  );
  const line = (cells: string[]) =>
    cells.map((c, col) => c.padEnd(widths[col])).join('  ').trimEnd();

  return [line(header), ...rows.map(line)].join('\n');
}
