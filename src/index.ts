import express, { Express, Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppConfig, loadConfig } from './config';
import { AppError, InvalidInputError } from './utils/errors';
import { allocationRoutes } from './routes/allocations';
import { createRunStore, RunStore } from './services/runs';

export function createApp(config: AppConfig, store: RunStore = createRunStore(config.runHistoryLimit)): Express {
  const app = express();

  // CSV uploads arrive as JSON strings and can be large
  app.use(express.json({ limit: '10mb' }));

  // Routes
  app.use('/v1/allocations', allocationRoutes({ config, store }));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', runs_held: store.size });
  });

  // Error handling middleware
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error('Error:', err);

    if (err instanceof ZodError) {
      const inputError = new InvalidInputError('Validation failed', {
        issues: err.issues,
      });
      return res.status(inputError.statusCode).json(inputError.toResponse());
    }

    // Unparseable JSON bodies from express.json()
    if (err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed') {
      const inputError = new InvalidInputError('Request body is not valid JSON');
      return res.status(inputError.statusCode).json(inputError.toResponse());
    }

    if (err instanceof AppError) {
      return res.status(err.statusCode).json(err.toResponse());
    }

    // Generic error
    return res.status(500).json({
      error: {
        code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred.',
      },
    });
  });

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({
      error: {
        code: 'NOT_FOUND',
        message: 'Endpoint not found.',
      },
    });
  });

  return app;
}

if (require.main === module) {
  const config = loadConfig();
  createApp(config).listen(config.port, () => {
    console.log(`[Server] Allocation service running on port ${config.port} (lookahead ${config.lookahead ? 'on' : 'off'})`);
  });
}
