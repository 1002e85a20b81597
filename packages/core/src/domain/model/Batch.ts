import type { BatchStatus } from './BatchStatus.js';
import type { CostLedger } from './CostLedger.js';
import type { ItemResult, SkippedItem } from './Checkpoint.js';

/** Why `run()` stopped. */
export type StopReason = 'completed' | 'nothing_to_do' | 'budget' | 'fatal_error';

/** Real-time counters for an in-flight batch. */
export interface BatchProgress {
  /** Items returned by the source, after `limit` and de-duplication. */
  readonly totalItems: number;
  /** Items left after the registry filter. */
  readonly queuedItems: number;
  readonly succeededItems: number;
  readonly failedItems: number;
  readonly skippedItems: number;
  /** Completion percentage of queued items (0–100). */
  readonly percentage: number;
  readonly currentChunk: number;
  readonly totalChunks: number;
  readonly elapsedMs: number;
  readonly totalCost: number;
}

/** Final report returned by `run()` and attached to `BatchAbortedError`. */
export interface BatchSummary {
  readonly batchId: string;
  readonly status: BatchStatus;
  readonly stopReason: StopReason;
  readonly total: number;
  /** Succeeded plus failed. */
  readonly processed: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly skipped: number;
  readonly elapsedMs: number;
  readonly cost: CostLedger;
  readonly failures: readonly ItemResult[];
  readonly skips: readonly SkippedItem[];
  /** Location of the last checkpoint written, if any. */
  readonly checkpointLocation?: string;
  /** Message of the condition that stopped the batch early. */
  readonly error?: string;
  /** Locations of the run logs, for display. */
  readonly logLocations: readonly string[];
}

/** Per-chunk bookkeeping kept on the status view. */
export interface ChunkInfo {
  readonly index: number;
  readonly size: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly completed: boolean;
}
