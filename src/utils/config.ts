import { z } from 'zod';
import { ValidationError } from '../storage/errors.js';
import { toValidationIssues } from '../storage/schema.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';

export interface EngineConfig {
  dataDir: string;
  logLevel: LogLevel;
  sweepIntervalMs: number;
  sweepBatchSize: number;
  maxEntries: number;
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  CONTEXT_ENGINE_DATA_DIR: z.string().min(1).default('data'),
  LOG_LEVEL: z
    .preprocess(value => (typeof value === 'string' ? value.toLowerCase() : value), z.enum(LOG_LEVELS))
    .default('info'),
  CONTEXT_SWEEP_INTERVAL_MS: positiveInt(60_000),
  CONTEXT_SWEEP_BATCH_SIZE: positiveInt(100),
  CONTEXT_MAX_ENTRIES: z.coerce.number().int().min(2).default(200),
});

/**
 * Read engine settings from environment variables.
 *
 * @throws ValidationError naming the offending variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ValidationError(toValidationIssues(parsed.error), 'config');
  }
  const data = parsed.data;
  return {
    dataDir: data.CONTEXT_ENGINE_DATA_DIR,
    logLevel: data.LOG_LEVEL,
    sweepIntervalMs: data.CONTEXT_SWEEP_INTERVAL_MS,
    sweepBatchSize: data.CONTEXT_SWEEP_BATCH_SIZE,
    maxEntries: data.CONTEXT_MAX_ENTRIES,
  };
}
