import { z } from 'zod';
import { ConfigError } from '../domain/errors.js';

const RateLimitSchema = z.object({
  capacity: z.number().min(1),
  refillRate: z.number().positive(),
});

/** Validates and defaults the plain-data options of a batch. */
export const BatchOptionsSchema = z
  .object({
    workers: z.number().int().positive().default(4),
    chunkSize: z.number().int().positive().default(50),
    budgetLimit: z.number().positive().optional(),
    prices: z.record(z.number().nonnegative()).default({}),
    rateLimits: z.record(RateLimitSchema).default({}),
    preAcquire: z.array(z.string().min(1)).default([]),
    force: z.boolean().default(false),
    limit: z.number().int().positive().optional(),
    maxRetries: z.number().int().nonnegative().default(0),
    retryDelayMs: z.number().nonnegative().default(1000),
    estimatedCostPerItem: z.number().nonnegative().optional(),
  })
  .superRefine((options, ctx) => {
    for (const dependency of options.preAcquire) {
      if (!(dependency in options.rateLimits)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['preAcquire'],
          message: `No rate limit configured for '${dependency}'`,
        });
      }
    }
  });

export type BatchOptionsInput = z.input<typeof BatchOptionsSchema>;
export type BatchOptions = z.output<typeof BatchOptionsSchema>;

function toIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
}

/** Parse options, applying defaults. Throws `ConfigError` listing every issue. */
export function parseBatchOptions(input: unknown): BatchOptions {
  const result = BatchOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(toIssues(result.error));
  }
  return result.data;
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const EnvSchema = z.object({
  BATCH_WORKERS: z.coerce.number().int().positive().optional(),
  BATCH_CHUNK_SIZE: z.coerce.number().int().positive().optional(),
  BATCH_BUDGET_LIMIT: z.coerce.number().positive().optional(),
  BATCH_FORCE: booleanFlag.optional(),
  BATCH_LIMIT: z.coerce.number().int().positive().optional(),
  BATCH_MAX_RETRIES: z.coerce.number().int().nonnegative().optional(),
  BATCH_STATE_DIR: z.string().default('state'),
  BATCH_LOG_DIR: z.string().default('logs'),
});

export interface EnvBatchConfig {
  /** Only the options that were set; merge over code defaults. */
  readonly options: Partial<Pick<BatchOptions, 'workers' | 'chunkSize' | 'budgetLimit' | 'force' | 'limit' | 'maxRetries'>>;
  readonly stateDir: string;
  readonly logDir: string;
}

/**
 * Read batch options from environment variables.
 *
 * Empty values count as unset. Throws `ConfigError` on malformed values.
 */
export function loadBatchOptionsFromEnv(env: Readonly<Record<string, string | undefined>> = process.env): EnvBatchConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith('BATCH_') && value !== undefined && value.trim() !== '') {
      present[key] = value.trim();
    }
  }

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(toIssues(result.error));
  }

  const e = result.data;
  return {
    options: {
      ...(e.BATCH_WORKERS !== undefined ? { workers: e.BATCH_WORKERS } : {}),
      ...(e.BATCH_CHUNK_SIZE !== undefined ? { chunkSize: e.BATCH_CHUNK_SIZE } : {}),
      ...(e.BATCH_BUDGET_LIMIT !== undefined ? { budgetLimit: e.BATCH_BUDGET_LIMIT } : {}),
      ...(e.BATCH_FORCE !== undefined ? { force: e.BATCH_FORCE } : {}),
      ...(e.BATCH_LIMIT !== undefined ? { limit: e.BATCH_LIMIT } : {}),
      ...(e.BATCH_MAX_RETRIES !== undefined ? { maxRetries: e.BATCH_MAX_RETRIES } : {}),
    },
    stateDir: e.BATCH_STATE_DIR,
    logDir: e.BATCH_LOG_DIR,
  };
}
