import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────
// Priority tiers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Closed set of priority tiers, highest priority first.
 * Position in this tuple is the tier's rank; never compare labels as strings.
 */
export const PRIORITY_TIERS = ['P1', 'P2', 'P3', 'P4', 'P5', 'P6', 'P7', 'P8', 'P9'] as const;

export type PriorityTier = typeof PRIORITY_TIERS[number];

export const PriorityTierEnum = z.enum(PRIORITY_TIERS);

// ─────────────────────────────────────────────────────────────────────────────
// API Request schemas (Zod)
// ─────────────────────────────────────────────────────────────────────────────

const ISO_WEEK_LABEL = /^\d{4}-W\d{2}$/;

/** Period key: a plain integer (week index) or an ISO week label such as 2026-W03 */
export const PeriodInputSchema = z.union([
  z.number().int().nonnegative(),
  z.string().regex(ISO_WEEK_LABEL, 'expected an ISO week label like 2026-W03'),
]);

/** Tier as a label (P1..P9) or its numeric rank (1..9) */
export const PriorityTierInputSchema = z.union([
  PriorityTierEnum,
  z.number().int().min(1).max(PRIORITY_TIERS.length),
]);

const Quantity = z.number().int().nonnegative();

export const SupplyLineSchema = z.object({
  period: PeriodInputSchema,
  subcomponent_a_qty: Quantity,
  subcomponent_b_qty: Quantity,
});

export const DemandLineSchema = z.object({
  order_id: z.string().min(1),
  customer_id: z.string().min(1),
  segment: z.string().min(1).optional(),
  priority_tier: PriorityTierInputSchema.optional(),
  period_requested: PeriodInputSchema,
  qty_ordered: z.number().int().positive(),
});

export const CustomerTierSchema = z.object({
  customer_id: z.string().min(1),
  priority_tier: PriorityTierInputSchema,
  segment: z.string().min(1).default('Unknown'),
});

export const DeliveryLineSchema = z.object({
  delivery_date: z.string().date(),
  product_type: z.enum(['A', 'B']),
  quantity: Quantity,
});

export const EngineOptionsSchema = z.object({
  lookahead: z.boolean().optional(),
});

export const RunAllocationRequestSchema = z.object({
  supply: z.array(SupplyLineSchema).default([]),
  deliveries: z.array(DeliveryLineSchema).default([]),
  orders: z.array(DemandLineSchema),
  customers: z.array(CustomerTierSchema).default([]),
  options: EngineOptionsSchema.default({}),
});

export const ImportAllocationRequestSchema = z.object({
  supply_csv: z.string().min(1),
  demand_csv: z.string().min(1),
  customers_csv: z.string().optional(),
  options: EngineOptionsSchema.default({}),
});

export const ComponentSummaryQuerySchema = z.object({
  subcomponent: z.enum(['A', 'B']).default('A'),
});

// Types inferred from schemas
export type PeriodInput = z.infer<typeof PeriodInputSchema>;
export type PriorityTierInput = z.infer<typeof PriorityTierInputSchema>;
export type SupplyLine = z.infer<typeof SupplyLineSchema>;
export type DemandLine = z.infer<typeof DemandLineSchema>;
export type CustomerTier = z.infer<typeof CustomerTierSchema>;
export type DeliveryLine = z.infer<typeof DeliveryLineSchema>;
export type EngineOptions = z.infer<typeof EngineOptionsSchema>;
export type RunAllocationRequest = z.infer<typeof RunAllocationRequestSchema>;
export type ImportAllocationRequest = z.infer<typeof ImportAllocationRequestSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Engine Types
// ─────────────────────────────────────────────────────────────────────────────

export const OrderStatuses = {
  UNFULFILLED: 'Unfulfilled',
  PARTIAL: 'Partial',
  FULL: 'Full',
} as const;

export type OrderStatus = typeof OrderStatuses[keyof typeof OrderStatuses];

export type Subcomponent = 'A' | 'B';

export type ConstrainingInput = Subcomponent | 'lookahead';

export interface SupplyRecord {
  period: number;
  subcomponentAQty: number;
  subcomponentBQty: number;
}

export interface LookaheadSignal {
  nextDemand: number;   // Σ qty_ordered of orders requested next period
  nextSupply: number;   // min(a, b) forecast for next period
}

export interface ConstraintResolution {
  period: number;
  baseLimit: number;
  reservedQty: number;
  globalLimit: number;
  constrainingSubcomponent: ConstrainingInput;
}

export interface TierAllocation {
  tier: PriorityTier;
  demand: number;
  allocated: number;
}

export interface FifoGrant {
  orderId: string;
  granted: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Reporting contracts (snake_case, as serialised)
// ─────────────────────────────────────────────────────────────────────────────

export interface PeriodSummary {
  period: number;
  global_limit: number;
  total_demand: number;
  total_allocated: number;
  constraining_subcomponent: ConstrainingInput;
  base_limit: number;
  reserved_qty: number;
  new_demand: number;
  backlog_carried: number;
  subcomponent_a_qty: number;
  subcomponent_b_qty: number;
}

export interface AllocationResult {
  period: number;
  order_id: string;
  customer_id: string;
  segment: string;
  priority_tier: PriorityTier;
  period_requested: number;
  qty_ordered: number;
  qty_allocated: number;            // cumulative, after this period
  qty_allocated_this_period: number;
  qty_remaining: number;
  status: OrderStatus;
}

export interface CommitSummaryRow {
  period: number;
  new_demand: number;
  commit: number;
  cumulative_demand: number;
  cumulative_commit: number;
  cumulative_backlog: number;       // cumulative_commit - cumulative_demand, never positive
  constraint: ConstrainingInput | '-';
}

export interface ComponentStandingRow {
  period: number;
  supply: number;
  cumulative_supply: number;
  cumulative_target: number;        // cumulative new demand
  standing: number;                 // cumulative_supply - cumulative_target
  short: boolean;
}

export interface TierFillRate {
  priority_tier: PriorityTier;
  qty_ordered: number;
  qty_allocated: number;
  fill_rate: number;
}

export interface AllocationRunRecord {
  run_id: string;
  created_at: string;
  engine_version: string;
  options: { lookahead: boolean };
  periods: PeriodSummary[];
  results: AllocationResult[];
  fill_rates: TierFillRate[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export interface ApiError {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

export const ErrorCodes = {
  INVALID_INPUT: 'INVALID_INPUT',
  DUPLICATE_ORDER_ID: 'DUPLICATE_ORDER_ID',
  DUPLICATE_SUPPLY_PERIOD: 'DUPLICATE_SUPPLY_PERIOD',
  UNKNOWN_PRIORITY_TIER: 'UNKNOWN_PRIORITY_TIER',
  ARITHMETIC_OVERFLOW: 'ARITHMETIC_OVERFLOW',
  ALLOCATION_INVARIANT_VIOLATION: 'ALLOCATION_INVARIANT_VIOLATION',
  RUN_NOT_FOUND: 'RUN_NOT_FOUND',
  SNAPSHOT_NOT_FOUND: 'SNAPSHOT_NOT_FOUND',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;
