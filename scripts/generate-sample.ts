/**
 * Sample snapshot generator.
 *
 * Writes timestamped supply and demand CSVs plus the customer tier master into
 * DATA_INPUT_DIR, in the same shapes upstream exports use. Output is
 * deterministic for a given SEED.
 *
 * Run with: npm run generate:sample
 */

import fs from 'fs';
import path from 'path';
import Papa from 'papaparse';
import { addDays, format } from 'date-fns';
import { z } from 'zod';
import { CustomerTierSchema } from '../src/types';
import { loadConfig } from '../src/config';

const SEED = Number(process.env.SEED ?? 42);
const START_DATE = new Date(2026, 0, 1);
const DAYS = 30 * 7;

/** mulberry32: small seeded PRNG, enough for reproducible fixtures */
function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function loadCustomers() {
  const raw: unknown = JSON.parse(
    fs.readFileSync(path.join(__dirname, '..', 'data', 'customer-tiers.json'), 'utf8')
  );
  return z.array(CustomerTierSchema).parse(raw);
}

function main(): void {
  const config = loadConfig();
  const random = createRandom(SEED);
  const randomInt = (min: number, max: number) => min + Math.floor(random() * (max - min));
  const customers = loadCustomers();

  const supply: Array<{ delivery_date: string; product_type: string; quantity: number }> = [];
  const demand: Array<{ week: string; order_id: string; customer: string; quantity: number }> = [];

  for (let i = 0; i < DAYS; i++) {
    const day = addDays(START_DATE, i);
    const deliveryDate = format(day, 'yyyy-MM-dd');
    const week = format(day, "RRRR-'W'II");

    if (random() > 0.1) {
      supply.push({ delivery_date: deliveryDate, product_type: 'Subcomponent_1', quantity: randomInt(10, 50) });
    }
    if (random() > 0.1) {
      supply.push({ delivery_date: deliveryDate, product_type: 'Subcomponent_2', quantity: randomInt(10, 60) });
    }
    if (random() > 0.1) {
      const customer = customers[randomInt(0, customers.length)];
      demand.push({
        week,
        order_id: `ORD-${String(demand.length + 1).padStart(5, '0')}`,
        customer: customer.customer_id,
        quantity: randomInt(10, 90),
      });
    }
  }

  fs.mkdirSync(config.dataInputDir, { recursive: true });
  const stamp = format(new Date(), 'yyyyMMdd_HHmmss');

  const files = {
    [`supply_data_${stamp}.csv`]: Papa.unparse(supply, { newline: '\n' }),
    [`demand_data_${stamp}.csv`]: Papa.unparse(demand, { newline: '\n' }),
    'master_customer_tiers.csv': Papa.unparse(customers, { newline: '\n' }),
  };

  for (const [name, contents] of Object.entries(files)) {
    fs.writeFileSync(path.join(config.dataInputDir, name), contents + '\n');
    console.log(`[Generate] Wrote ${path.join(config.dataInputDir, name)}`);
  }
  console.log(`[Generate] ${supply.length} deliveries, ${demand.length} orders (seed ${SEED})`);
}

main();
