import { Router, Request, Response, NextFunction } from 'express';
import { AppConfig } from '../config';
import { ComponentSummaryQuerySchema, ImportAllocationRequestSchema, RunAllocationRequestSchema } from '../types';
import { ingestCsv, ingestRequest, readLatestSnapshot } from '../services/ingestion';
import { orchestrateAllocation } from '../services/orchestrator';
import { buildCommitSummary, buildComponentStanding, formatReportCsv } from '../services/reporting';
import { RunStore } from '../services/runs';

export interface AllocationRouteDeps {
  config: AppConfig;
  store: RunStore;
}

export function allocationRoutes({ config, store }: AllocationRouteDeps): Router {
  const router = Router();

  // POST /v1/allocations - Run an allocation on a JSON payload
  router.post('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const data = RunAllocationRequestSchema.parse(req.body);
      const record = orchestrateAllocation(ingestRequest(data), store, {
        lookahead: data.options.lookahead ?? config.lookahead,
      });
      res.status(201).json(record);
    } catch (err) {
      next(err);
    }
  });

  // POST /v1/allocations/import - Run an allocation on CSV text (supply, demand, optional customer master)
  router.post('/import', (req: Request, res: Response, next: NextFunction) => {
    try {
      const data = ImportAllocationRequestSchema.parse(req.body);
      const inputs = ingestCsv({
        supplyCsv: data.supply_csv,
        demandCsv: data.demand_csv,
        customersCsv: data.customers_csv,
      });
      const record = orchestrateAllocation(inputs, store, {
        lookahead: data.options.lookahead ?? config.lookahead,
      });
      res.status(201).json(record);
    } catch (err) {
      next(err);
    }
  });

  // POST /v1/allocations/snapshot - Run against the newest files in DATA_INPUT_DIR
  router.post('/snapshot', (_req: Request, res: Response, next: NextFunction) => {
    try {
      const snapshot = readLatestSnapshot(config.dataInputDir);
      console.log(`[Allocations] Using snapshot files: ${snapshot.files.join(', ')}`);
      const record = orchestrateAllocation(ingestCsv(snapshot), store, {
        lookahead: config.lookahead,
      });
      res.status(201).json({ ...record, source_files: snapshot.files });
    } catch (err) {
      next(err);
    }
  });

  // GET /v1/allocations - Recent runs, newest first
  router.get('/', (_req: Request, res: Response) => {
    res.json({
      runs: store.list().map((run) => ({
        run_id: run.run_id,
        created_at: run.created_at,
        engine_version: run.engine_version,
        periods: run.periods.length,
        total_allocated: run.periods.reduce((sum, p) => sum + p.total_allocated, 0),
      })),
    });
  });

  // GET /v1/allocations/:runId
  router.get('/:runId', (req: Request<{ runId: string }>, res: Response, next: NextFunction) => {
    try {
      res.json(store.get(req.params.runId));
    } catch (err) {
      next(err);
    }
  });

  // GET /v1/allocations/:runId/report.csv - Flat allocation report
  router.get('/:runId/report.csv', (req: Request<{ runId: string }>, res: Response, next: NextFunction) => {
    try {
      const run = store.get(req.params.runId);
      res
        .type('text/csv')
        .attachment(`allocation_report_${run.run_id}.csv`)
        .send(formatReportCsv(run.results));
    } catch (err) {
      next(err);
    }
  });

  // GET /v1/allocations/:runId/commit-summary - Cumulative commit vs demand
  router.get('/:runId/commit-summary', (req: Request<{ runId: string }>, res: Response, next: NextFunction) => {
    try {
      const run = store.get(req.params.runId);
      res.json({ run_id: run.run_id, rows: buildCommitSummary(run.periods) });
    } catch (err) {
      next(err);
    }
  });

  // GET /v1/allocations/:runId/component-summary?subcomponent=A|B - Cumulative supply standing
  router.get('/:runId/component-summary', (req: Request<{ runId: string }>, res: Response, next: NextFunction) => {
    try {
      const { subcomponent } = ComponentSummaryQuerySchema.parse(req.query);
      const run = store.get(req.params.runId);
      res.json({ run_id: run.run_id, subcomponent, rows: buildComponentStanding(run.periods, subcomponent) });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
