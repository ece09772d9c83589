import { OrderStatus, OrderStatuses, PriorityTier } from '../types';
import { AllocationInvariantError, InvalidInputError } from '../utils/errors';

export interface DemandOrderFields {
  orderId: string;
  customerId: string;
  segment: string;
  priorityTier: PriorityTier;
  periodRequested: number;
  qtyOrdered: number;
  qtyAllocated?: number;
}

/**
 * A customer order competing for supply.
 *
 * Identity, tier, age and ordered quantity are fixed at construction.
 * The only mutation is grant(), which raises qtyAllocated and never lowers it.
 */
export class DemandOrder {
  readonly orderId: string;
  readonly customerId: string;
  readonly segment: string;
  readonly priorityTier: PriorityTier;
  readonly periodRequested: number;
  readonly qtyOrdered: number;
  private allocated: number;

  constructor(fields: DemandOrderFields) {
    if (fields.orderId.length === 0) {
      throw new InvalidInputError('order_id must not be empty');
    }
    if (!Number.isSafeInteger(fields.qtyOrdered) || fields.qtyOrdered <= 0) {
      throw new InvalidInputError(`Order '${fields.orderId}' must order a positive integer quantity`, {
        orderId: fields.orderId,
        qtyOrdered: fields.qtyOrdered,
      });
    }
    if (!Number.isSafeInteger(fields.periodRequested) || fields.periodRequested < 0) {
      throw new InvalidInputError(`Order '${fields.orderId}' has an invalid requested period`, {
        orderId: fields.orderId,
        periodRequested: fields.periodRequested,
      });
    }

    const allocated = fields.qtyAllocated ?? 0;
    if (!Number.isSafeInteger(allocated) || allocated < 0 || allocated > fields.qtyOrdered) {
      throw new InvalidInputError(`Order '${fields.orderId}' has an invalid allocated quantity`, {
        orderId: fields.orderId,
        qtyAllocated: allocated,
      });
    }

    this.orderId = fields.orderId;
    this.customerId = fields.customerId;
    this.segment = fields.segment;
    this.priorityTier = fields.priorityTier;
    this.periodRequested = fields.periodRequested;
    this.qtyOrdered = fields.qtyOrdered;
    this.allocated = allocated;
  }

  get qtyAllocated(): number {
    return this.allocated;
  }

  get qtyRemaining(): number {
    return this.qtyOrdered - this.allocated;
  }

  get status(): OrderStatus {
    if (this.allocated === 0) return OrderStatuses.UNFULFILLED;
    if (this.allocated < this.qtyOrdered) return OrderStatuses.PARTIAL;
    return OrderStatuses.FULL;
  }

  /**
   * Add units to this order. Zero is a no-op; anything beyond qtyRemaining
   * is a bug in the caller.
   */
  grant(qty: number): void {
    if (!Number.isSafeInteger(qty) || qty < 0) {
      throw new AllocationInvariantError(`Grant of ${qty} to order '${this.orderId}' is not a non-negative integer`, {
        orderId: this.orderId,
        qty,
      });
    }
    if (qty > this.qtyRemaining) {
      throw new AllocationInvariantError(`Grant of ${qty} exceeds remaining ${this.qtyRemaining} on order '${this.orderId}'`, {
        orderId: this.orderId,
        qty,
        qtyRemaining: this.qtyRemaining,
      });
    }
    this.allocated += qty;
  }
}

/**
 * FIFO order: oldest requested period first, then order_id by code unit.
 */
export function compareFifo(a: DemandOrder, b: DemandOrder): number {
  if (a.periodRequested !== b.periodRequested) {
    return a.periodRequested - b.periodRequested;
  }
  if (a.orderId < b.orderId) return -1;
  if (a.orderId > b.orderId) return 1;
  return 0;
}
