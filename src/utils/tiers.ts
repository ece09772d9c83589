/**
 * Priority tier helpers.
 *
 * Tiers are a closed enumeration ranked by position in PRIORITY_TIERS.
 * Every ordering decision goes through compareTiers.
 */

import { PRIORITY_TIERS, PriorityTier } from '../types';

const TIER_RANK: Record<PriorityTier, number> = {
  P1: 1,
  P2: 2,
  P3: 3,
  P4: 4,
  P5: 5,
  P6: 6,
  P7: 7,
  P8: 8,
  P9: 9,
};

/**
 * Negative when `a` outranks `b` (higher priority sorts first).
 */
export function compareTiers(a: PriorityTier, b: PriorityTier): number {
  return TIER_RANK[a] - TIER_RANK[b];
}

export function isPriorityTier(value: unknown): value is PriorityTier {
  return typeof value === 'string' && PRIORITY_TIERS.some((tier) => tier === value);
}

/**
 * Resolve a label or numeric rank to a tier.
 * Returns null for anything outside the enumeration; callers decide how to fail.
 */
export function toPriorityTier(value: string | number): PriorityTier | null {
  if (typeof value === 'number') {
    return PRIORITY_TIERS.find((tier) => TIER_RANK[tier] === value) ?? null;
  }

  const trimmed = value.trim().toUpperCase();
  if (isPriorityTier(trimmed)) return trimmed;

  // Bare digits from CSV exports ("1", "7")
  if (/^\d+$/.test(trimmed)) {
    return toPriorityTier(Number(trimmed));
  }

  return null;
}

/** Tiers highest first */
export function tiersInPriorityOrder(): PriorityTier[] {
  return [...PRIORITY_TIERS].sort(compareTiers);
}
