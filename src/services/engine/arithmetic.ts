/**
 * Checked integer arithmetic for running totals.
 * Sums that leave the safe integer range fail loudly instead of losing precision.
 */

import { ArithmeticOverflowError } from '../../utils/errors';

export function checkedAdd(a: number, b: number, operation = 'addition'): number {
  const result = a + b;
  if (!Number.isSafeInteger(result)) {
    throw new ArithmeticOverflowError(operation, [a, b]);
  }
  return result;
}

export function checkedSum(values: Iterable<number>, operation = 'sum'): number {
  let total = 0;
  for (const value of values) {
    total = checkedAdd(total, value, operation);
  }
  return total;
}
