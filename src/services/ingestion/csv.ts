/**
 * CSV ingestion.
 *
 * Parses supply, demand and customer-master snapshots with papaparse, then
 * validates every row with the same zod schemas the JSON API uses. Header
 * names are matched case-insensitively and a few legacy column names are
 * accepted (week, customer, quantity, priority).
 */

import Papa from 'papaparse';
import { z } from 'zod';
import {
  CustomerTier,
  CustomerTierSchema,
  DeliveryLine,
  DeliveryLineSchema,
  DemandLine,
  DemandLineSchema,
  SupplyLine,
  SupplyLineSchema,
} from '../../types';
import { InvalidInputError, UnknownPriorityTierError } from '../../utils/errors';
import { toPriorityTier } from '../../utils/tiers';
import { EngineInputs, buildOrderBook, buildSupplyRecords } from './records';

type CsvRow = Record<string, string>;

const HEADER_ALIASES: Record<string, string> = {
  customer: 'customer_id',
  priority: 'priority_tier',
  tier: 'priority_tier',
  market_segment: 'segment',
};

const PRODUCT_ALIASES: Record<string, 'A' | 'B'> = {
  a: 'A',
  b: 'B',
  subcomponent_1: 'A',
  subcomponent_2: 'B',
};

function readRows(text: string, label: string): { rows: CsvRow[]; fields: string[] } {
  const parsed = Papa.parse<CsvRow>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => {
      const key = header.trim().toLowerCase();
      return HEADER_ALIASES[key] ?? key;
    },
  });

  if (parsed.errors.length > 0) {
    throw new InvalidInputError(`${label} CSV could not be parsed`, {
      errors: parsed.errors.map((e) => ({ row: e.row, message: e.message })),
    });
  }

  return { rows: parsed.data, fields: parsed.meta.fields ?? [] };
}

/** '' → undefined, integer-looking text → number, anything else untouched */
function cell(value: string | undefined): string | number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (trimmed === '') return undefined;
  return /^-?\d+(\.\d+)?$/.test(trimmed) ? Number(trimmed) : trimmed;
}

/** Free-text cells stay strings: '' → undefined, otherwise trimmed */
function text(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/** Row numbers in errors are 1-based and count the header line */
function validateRows<T>(
  rows: CsvRow[],
  label: string,
  toCandidate: (row: CsvRow) => unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T[] {
  const valid: T[] = [];
  const failures: Array<{ row: number; message: string }> = [];

  rows.forEach((row, i) => {
    const result = schema.safeParse(toCandidate(row));
    if (result.success) {
      valid.push(result.data);
    } else {
      failures.push({
        row: i + 2,
        message: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
      });
    }
  });

  if (failures.length > 0) {
    throw new InvalidInputError(`${label} CSV has ${failures.length} invalid row(s)`, { rows: failures });
  }

  return valid;
}

// ─────────────────────────────────────────────────────────────────────────────
// Parsers
// ─────────────────────────────────────────────────────────────────────────────

export interface ParsedSupply {
  lines: SupplyLine[];
  deliveries: DeliveryLine[];
}

/**
 * Supply snapshots come in two shapes: weekly totals
 * (period, subcomponent_a_qty, subcomponent_b_qty) or dated deliveries
 * (delivery_date, product_type, quantity). The header decides which.
 */
export function parseSupplyCsv(text: string): ParsedSupply {
  const { rows, fields } = readRows(text, 'Supply');

  if (fields.includes('delivery_date')) {
    const deliveries = validateRows(
      rows,
      'Supply',
      (row) => ({
        delivery_date: row.delivery_date?.trim(),
        product_type: PRODUCT_ALIASES[(row.product_type ?? '').trim().toLowerCase()] ?? row.product_type,
        quantity: cell(row.quantity),
      }),
      DeliveryLineSchema
    );
    return { lines: [], deliveries };
  }

  const lines = validateRows(
    rows,
    'Supply',
    (row) => ({
      period: cell(row.period ?? row.week),
      subcomponent_a_qty: cell(row.subcomponent_a_qty),
      subcomponent_b_qty: cell(row.subcomponent_b_qty),
    }),
    SupplyLineSchema
  );
  return { lines, deliveries: [] };
}

/**
 * Demand rows. A tier cell that is present but not a known tier is an
 * UnknownPriorityTierError, never a silent default.
 */
export function parseDemandCsv(csvText: string): DemandLine[] {
  const { rows } = readRows(csvText, 'Demand');

  return validateRows(
    rows,
    'Demand',
    (row) => {
      const orderId = row.order_id?.trim() ?? '';
      const rawTier = cell(row.priority_tier);
      let tier: string | undefined;
      if (rawTier !== undefined) {
        const resolved = toPriorityTier(rawTier);
        if (resolved === null) throw new UnknownPriorityTierError(orderId, rawTier);
        tier = resolved;
      }

      return {
        order_id: orderId,
        customer_id: row.customer_id?.trim(),
        segment: text(row.segment),
        priority_tier: tier,
        period_requested: cell(row.period_requested ?? row.week),
        qty_ordered: cell(row.qty_ordered ?? row.quantity),
      };
    },
    DemandLineSchema
  );
}

export function parseCustomersCsv(csvText: string): CustomerTier[] {
  const { rows } = readRows(csvText, 'Customer master');

  return validateRows(
    rows,
    'Customer master',
    (row) => {
      const customerId = row.customer_id?.trim() ?? '';
      const rawTier = cell(row.priority_tier);
      let tier: string | undefined;
      if (rawTier !== undefined) {
        const resolved = toPriorityTier(rawTier);
        if (resolved === null) throw new UnknownPriorityTierError(`customer:${customerId}`, rawTier);
        tier = resolved;
      }

      return {
        customer_id: customerId,
        priority_tier: tier,
        segment: text(row.segment),
      };
    },
    CustomerTierSchema
  );
}

export interface CsvSnapshot {
  supplyCsv: string;
  demandCsv: string;
  customersCsv?: string;
}

/**
 * Validated engine inputs from CSV snapshot text.
 */
export function ingestCsv(snapshot: CsvSnapshot): EngineInputs {
  const supply = parseSupplyCsv(snapshot.supplyCsv);
  const demand = parseDemandCsv(snapshot.demandCsv);
  const customers = snapshot.customersCsv ? parseCustomersCsv(snapshot.customersCsv) : [];

  return {
    supply: buildSupplyRecords(supply.lines, supply.deliveries),
    orders: buildOrderBook(demand, customers),
  };
}
