/**
 * Run Store
 *
 * Keeps completed allocation runs in memory so the API can serve reports
 * after the fact. Bounded: once `limit` runs are held, the oldest is evicted.
 */

import { AllocationRunRecord } from '../../types';
import { RunNotFoundError } from '../../utils/errors';

export interface RunStore {
  save(record: AllocationRunRecord): void;
  get(runId: string): AllocationRunRecord;
  list(): AllocationRunRecord[];
  readonly size: number;
}

export function createRunStore(limit: number): RunStore {
  // Map preserves insertion order, which is also age order here
  const runs = new Map<string, AllocationRunRecord>();

  return {
    save(record) {
      runs.set(record.run_id, record);
      while (runs.size > limit) {
        const oldest = runs.keys().next();
        if (oldest.done) break;
        runs.delete(oldest.value);
      }
    },

    get(runId) {
      const record = runs.get(runId);
      if (!record) {
        throw new RunNotFoundError(runId);
      }
      return record;
    },

    list() {
      return [...runs.values()].reverse();
    },

    get size() {
      return runs.size;
    },
  };
}
