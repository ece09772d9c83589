/**
 * Orchestrator Module
 *
 * Coordination layer behind the allocation endpoints.
 *
 * Sequence:
 * 1. Run the engine over validated inputs
 * 2. Compute tier fill rates
 * 3. Stamp the run (id, timestamp, engine version)
 * 4. Save it to the run store
 */

import { v4 as uuidv4 } from 'uuid';
import { AllocationRunRecord } from '../../types';
import { runAllocation } from '../engine';
import { EngineInputs } from '../ingestion';
import { computeTierFillRates } from '../reporting';
import { RunStore } from '../runs';

export interface OrchestrateOptions {
  lookahead: boolean;
  now?: Date;
}

/**
 * Allocate, summarise and store one run.
 *
 * @param inputs - Supply and orders from the Ingestion Adapter
 * @param store - Where the finished run is kept
 * @returns The stored run record
 */
export function orchestrateAllocation(
  inputs: EngineInputs,
  store: RunStore,
  options: OrchestrateOptions
): AllocationRunRecord {
  const run = runAllocation(inputs.supply, inputs.orders, { lookahead: options.lookahead });

  const record: AllocationRunRecord = {
    run_id: uuidv4(),
    created_at: (options.now ?? new Date()).toISOString(),
    engine_version: run.engineVersion,
    options: { lookahead: run.lookahead },
    periods: run.periods,
    results: run.results,
    fill_rates: computeTierFillRates(run.results),
  };

  store.save(record);

  const allocated = run.periods.reduce((sum, p) => sum + p.total_allocated, 0);
  console.log(
    `[Orchestrator] Run ${record.run_id}: ${run.periods.length} periods, ` +
      `${inputs.orders.length} orders, ${allocated} units allocated, ` +
      `${run.backlog.length} orders still open`
  );

  return record;
}
