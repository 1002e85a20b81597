import { z } from 'zod';

/** Why a checkpoint was written. */
export type CheckpointReason = 'chunk_complete' | 'complete' | 'budget' | 'fatal_error';

/** An item that reached a terminal outcome in this batch. */
export interface ItemResult {
  readonly identity: string;
  readonly runId: string;
  readonly durationMs: number;
  readonly outputRef?: string;
  readonly error?: string;
}

/** An item the registry filter let through untouched. */
export interface SkippedItem {
  readonly identity: string;
  readonly reason: string;
}

export interface CheckpointResults {
  readonly success: readonly ItemResult[];
  readonly failed: readonly ItemResult[];
  readonly skipped: readonly SkippedItem[];
}

/** Durable snapshot of cumulative batch progress. */
export interface Checkpoint {
  readonly version: typeof CHECKPOINT_FORMAT_VERSION;
  readonly batchId: string;
  /** ISO-8601. */
  readonly timestamp: string;
  /** Items dispatched and finished so far, skipped items excluded. */
  readonly processedCount: number;
  readonly results: CheckpointResults;
  readonly totalCost: number;
  readonly reason: CheckpointReason;
}

export const CHECKPOINT_FORMAT_VERSION = 1;

const ItemResultSchema = z.object({
  identity: z.string(),
  runId: z.string(),
  durationMs: z.number(),
  outputRef: z.string().optional(),
  error: z.string().optional(),
});

export const CheckpointSchema = z.object({
  version: z.literal(CHECKPOINT_FORMAT_VERSION),
  batchId: z.string(),
  timestamp: z.string(),
  processedCount: z.number().int().nonnegative(),
  results: z.object({
    success: z.array(ItemResultSchema),
    failed: z.array(ItemResultSchema),
    skipped: z.array(z.object({ identity: z.string(), reason: z.string() })),
  }),
  totalCost: z.number().nonnegative(),
  reason: z.enum(['chunk_complete', 'complete', 'budget', 'fatal_error']),
});

/** Validate a persisted checkpoint. Returns a reason string instead of throwing. */
export function parseCheckpoint(raw: unknown): { ok: true; checkpoint: Checkpoint } | { ok: false; reason: string } {
  const result = CheckpointSchema.safeParse(raw);
  if (!result.success) {
    return { ok: false, reason: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ') };
  }
  return { ok: true, checkpoint: result.data };
}
