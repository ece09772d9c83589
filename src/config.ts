import { z } from 'zod';
import { InvalidInputError } from './utils/errors';

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  ALLOCATION_LOOKAHEAD: z.enum(['on', 'off']).default('on'),
  RUN_HISTORY_LIMIT: z.coerce.number().int().positive().default(50),
  DATA_INPUT_DIR: z.string().min(1).default('./data_inputs'),
});

export interface AppConfig {
  port: number;
  lookahead: boolean;
  runHistoryLimit: number;
  dataInputDir: string;
}

/**
 * Read configuration from environment variables.
 * Unset values take defaults; malformed ones fail at startup.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new InvalidInputError('Invalid environment configuration', {
      issues: parsed.error.issues,
    });
  }

  return {
    port: parsed.data.PORT,
    lookahead: parsed.data.ALLOCATION_LOOKAHEAD === 'on',
    runHistoryLimit: parsed.data.RUN_HISTORY_LIMIT,
    dataInputDir: parsed.data.DATA_INPUT_DIR,
  };
}
