import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { ConfigError } from './errors.js';
import { RECONCILIATION_DEFAULTS, type ReconciliationConfig } from './models/index.js';

//decimal amount written as a string, e.g. "0.10"
const decimalSchema = z.string().trim().regex(/^\d+(\.\d+)?$/, 'Expected a non-negative decimal');

//environment schema. Every key is optional; defaults come from RECONCILIATION_DEFAULTS.
const envSchema = z.object({
  CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(RECONCILIATION_DEFAULTS.confidenceThreshold),
  // Unset means the prefix is derived from the item name
  SKU_PREFIX: z.string().trim().regex(/^[A-Za-z0-9]{1,8}$/, 'SKU prefix must be 1-8 alphanumerics').optional(),
  APPORTION_BASIS: z.enum(['extended', 'quantity']).default(RECONCILIATION_DEFAULTS.apportionBasis),
  BATCH_SIZE: z.coerce.number().int().min(1).max(100).default(RECONCILIATION_DEFAULTS.batchSize),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(RECONCILIATION_DEFAULTS.retry.maxAttempts),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).max(60_000).default(RECONCILIATION_DEFAULTS.retry.baseDelayMs),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).max(300_000).default(RECONCILIATION_DEFAULTS.retry.maxDelayMs),
  TOTAL_MISMATCH_TOLERANCE: decimalSchema.default(RECONCILIATION_DEFAULTS.totalMismatchTolerance),
  DATABASE_PATH: z.string().min(1).default(RECONCILIATION_DEFAULTS.databasePath),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

//load configuration from the environment (and .env when present).
//throws ConfigError listing every invalid key
export function loadConfig(env: NodeJS.ProcessEnv = process.env, options: { dotenv?: boolean } = {}): ReconciliationConfig {
  if (options.dotenv ?? env === process.env) dotenvConfig();

  // Empty strings count as unset
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ''));
  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }

  const e = parsed.data;
  if (e.RETRY_MAX_DELAY_MS < e.RETRY_BASE_DELAY_MS) {
    throw new ConfigError(['RETRY_MAX_DELAY_MS: must be at least RETRY_BASE_DELAY_MS']);
  }

  return {
    confidenceThreshold: e.CONFIDENCE_THRESHOLD,
    skuPrefix: e.SKU_PREFIX?.toUpperCase(),
    apportionBasis: e.APPORTION_BASIS,
    batchSize: e.BATCH_SIZE,
    retry: {
      maxAttempts: e.RETRY_MAX_ATTEMPTS,
      baseDelayMs: e.RETRY_BASE_DELAY_MS,
      maxDelayMs: e.RETRY_MAX_DELAY_MS,
      factor: RECONCILIATION_DEFAULTS.retry.factor,
    },
    totalMismatchTolerance: e.TOTAL_MISMATCH_TOLERANCE,
    databasePath: e.DATABASE_PATH,
    logLevel: e.LOG_LEVEL,
  };
}
