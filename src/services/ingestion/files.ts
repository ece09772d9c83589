/**
 * Snapshot discovery.
 *
 * Upstream exports drop timestamped files into a directory
 * (supply_data_20260105_093000.csv, demand_data_...). The newest file per
 * prefix is the one to allocate against.
 */

import fs from 'fs';
import path from 'path';
import { SnapshotNotFoundError } from '../../utils/errors';
import { CsvSnapshot } from './csv';

export const SNAPSHOT_PREFIXES = {
  SUPPLY: 'supply_data_',
  DEMAND: 'demand_data_',
  CUSTOMERS: 'master_customer_tiers',
} as const;

/**
 * Path of the most recently modified `${prefix}*.csv` in `directory`.
 */
export function findLatestSnapshot(directory: string, prefix: string): string {
  const entries = fs.existsSync(directory) ? fs.readdirSync(directory) : [];

  const candidates = entries
    .filter((name) => name.startsWith(prefix) && name.endsWith('.csv'))
    .map((name) => {
      const fullPath = path.join(directory, name);
      return { fullPath, name, mtimeMs: fs.statSync(fullPath).mtimeMs };
    })
    // Newest first; identical mtimes fall back to the later name (timestamps sort lexically)
    .sort((a, b) => b.mtimeMs - a.mtimeMs || (a.name < b.name ? 1 : a.name > b.name ? -1 : 0));

  if (candidates.length === 0) {
    throw new SnapshotNotFoundError(directory, prefix);
  }
  return candidates[0].fullPath;
}

/**
 * Read the latest supply and demand snapshots, plus the customer master if present.
 */
export function readLatestSnapshot(directory: string): CsvSnapshot & { files: string[] } {
  const supplyPath = findLatestSnapshot(directory, SNAPSHOT_PREFIXES.SUPPLY);
  const demandPath = findLatestSnapshot(directory, SNAPSHOT_PREFIXES.DEMAND);

  let customersPath: string | null = null;
  try {
    customersPath = findLatestSnapshot(directory, SNAPSHOT_PREFIXES.CUSTOMERS);
  } catch (err) {
    if (!(err instanceof SnapshotNotFoundError)) throw err;
  }

  return {
    supplyCsv: fs.readFileSync(supplyPath, 'utf8'),
    demandCsv: fs.readFileSync(demandPath, 'utf8'),
    customersCsv: customersPath ? fs.readFileSync(customersPath, 'utf8') : undefined,
    files: [supplyPath, demandPath, ...(customersPath ? [customersPath] : [])],
  };
}
