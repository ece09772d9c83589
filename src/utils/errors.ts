import { ErrorCodes, ApiError } from '../types';

export class AppError extends Error {
  constructor(
    public code: keyof typeof ErrorCodes,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }

  toResponse(): ApiError {
    return {
      error: {
        code: this.code,
        message: this.message,
        details: this.details,
      },
    };
  }
}

export class InvalidInputError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, 400, details);
    this.name = 'InvalidInputError';
  }
}

export class DuplicateOrderIdError extends AppError {
  constructor(orderId: string) {
    super('DUPLICATE_ORDER_ID', `Order ID '${orderId}' appears more than once.`, 400, { orderId });
    this.name = 'DuplicateOrderIdError';
  }
}

export class DuplicateSupplyPeriodError extends AppError {
  constructor(period: number) {
    super(
      'DUPLICATE_SUPPLY_PERIOD',
      `Supply for period ${period} is given more than once.`,
      400,
      { period }
    );
    this.name = 'DuplicateSupplyPeriodError';
  }
}

export class UnknownPriorityTierError extends AppError {
  constructor(orderId: string, value?: unknown) {
    super(
      'UNKNOWN_PRIORITY_TIER',
      value === undefined
        ? `Order '${orderId}' has no priority tier and its customer is not in the tier master.`
        : `Order '${orderId}' has unknown priority tier '${String(value)}'.`,
      400,
      { orderId, value }
    );
    this.name = 'UnknownPriorityTierError';
  }
}

export class ArithmeticOverflowError extends AppError {
  constructor(operation: string, operands: number[]) {
    super(
      'ARITHMETIC_OVERFLOW',
      `Running total exceeded the safe integer range during ${operation}.`,
      500,
      { operation, operands }
    );
    this.name = 'ArithmeticOverflowError';
  }
}

export class AllocationInvariantError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('ALLOCATION_INVARIANT_VIOLATION', message, 500, details);
    this.name = 'AllocationInvariantError';
  }
}

export class RunNotFoundError extends AppError {
  constructor(runId: string) {
    super('RUN_NOT_FOUND', `Allocation run with ID ${runId} not found.`, 404);
    this.name = 'RunNotFoundError';
  }
}

export class SnapshotNotFoundError extends AppError {
  constructor(directory: string, prefix: string) {
    super(
      'SNAPSHOT_NOT_FOUND',
      `No files found for ${prefix}*.csv in ${directory}.`,
      404,
      { directory, prefix }
    );
    this.name = 'SnapshotNotFoundError';
  }
}
