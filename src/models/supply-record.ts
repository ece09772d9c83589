import { SupplyRecord } from '../types';
import { InvalidInputError } from '../utils/errors';

function assertQuantity(value: number, field: string, period: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidInputError(`${field} for period ${period} must be a non-negative integer`, {
      period,
      [field]: value,
    });
  }
}

export function createSupplyRecord(
  period: number,
  subcomponentAQty: number,
  subcomponentBQty: number
): SupplyRecord {
  if (!Number.isSafeInteger(period) || period < 0) {
    throw new InvalidInputError(`Invalid supply period ${period}`, { period });
  }
  assertQuantity(subcomponentAQty, 'subcomponent_a_qty', period);
  assertQuantity(subcomponentBQty, 'subcomponent_b_qty', period);

  return { period, subcomponentAQty, subcomponentBQty };
}

/** Supply for a period the inputs never mention */
export function emptySupply(period: number): SupplyRecord {
  return { period, subcomponentAQty: 0, subcomponentBQty: 0 };
}
