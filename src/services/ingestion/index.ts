/**
 * Ingestion Adapter
 *
 * Turns raw supply and demand lines into validated engine inputs.
 * Everything the engine assumes (non-negative integers, unique ids, one supply
 * record per period, a known tier on every order) is enforced here.
 */

import { RunAllocationRequest } from '../../types';
import { EngineInputs, buildOrderBook, buildSupplyRecords } from './records';

/**
 * Validated engine inputs for a parsed API request.
 */
export function ingestRequest(request: RunAllocationRequest): EngineInputs {
  return {
    supply: buildSupplyRecords(request.supply, request.deliveries),
    orders: buildOrderBook(request.orders, request.customers),
  };
}

export type { EngineInputs } from './records';
export { aggregateDeliveries, buildSupplyRecords, buildOrderBook } from './records';
export { parseSupplyCsv, parseDemandCsv, parseCustomersCsv, ingestCsv } from './csv';
export { findLatestSnapshot, readLatestSnapshot } from './files';
