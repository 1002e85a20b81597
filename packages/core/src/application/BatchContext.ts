import { randomUUID } from 'node:crypto';
import type { BatchProgress, BatchSummary, ChunkInfo, StopReason } from '../domain/model/Batch.js';
import type { BatchStatus } from '../domain/model/BatchStatus.js';
import { canTransition } from '../domain/model/BatchStatus.js';
import type { ItemResult, SkippedItem } from '../domain/model/Checkpoint.js';
import type { Clock } from '../domain/ports/Clock.js';
import type { Logger } from '../domain/ports/Logger.js';
import type { CheckpointStore } from '../domain/ports/CheckpointStore.js';
import type { RegistryStore } from '../domain/ports/RegistryStore.js';
import type { RunLogSink } from '../domain/ports/RunLogSink.js';
import { InvalidTransitionError } from '../domain/errors.js';
import { ChunkSplitter } from '../domain/services/ChunkSplitter.js';
import type { BatchOptions } from '../config/BatchOptions.js';
import { EventBus } from './EventBus.js';
import { CostMeter } from './CostMeter.js';
import { RateLimiterPool } from './RateLimiterPool.js';
import { ItemRegistry } from './ItemRegistry.js';
import { RunLogger } from './RunLogger.js';
import { CheckpointWriter } from './CheckpointWriter.js';

export interface BatchCollaborators {
  readonly registryStore: RegistryStore;
  readonly checkpointStore: CheckpointStore;
  readonly runLogSinks: readonly RunLogSink[];
  readonly logger: Logger;
  readonly clock: Clock;
  readonly batchTimestamp?: string | undefined;
}

/**
 * Mutable state shared by the use cases of one batch invocation.
 *
 * Internal: use cases receive a reference and update it as the batch moves
 * through its lifecycle.
 */
export class BatchContext {
  readonly batchId = randomUUID();
  readonly options: BatchOptions;
  readonly logger: Logger;
  readonly clock: Clock;
  readonly eventBus: EventBus;
  readonly costMeter: CostMeter;
  readonly limiters: RateLimiterPool;
  readonly registry: ItemRegistry;
  readonly runLogger: RunLogger;
  readonly checkpointWriter: CheckpointWriter;
  readonly splitter: ChunkSplitter;

  status: BatchStatus = 'PENDING';
  totalItems = 0;
  queuedItems = 0;
  chunks: ChunkInfo[] = [];
  currentChunk = 0;
  processedCount = 0;
  readonly succeeded: ItemResult[] = [];
  readonly failed: ItemResult[] = [];
  readonly skipped: SkippedItem[] = [];
  startedAt?: number;
  /** First fatal error reported by a job in the current chunk. */
  fatalError: string | undefined;
  lastCheckpointLocation: string | undefined;

  constructor(options: BatchOptions, collaborators: BatchCollaborators) {
    this.options = options;
    this.logger = collaborators.logger;
    this.clock = collaborators.clock;
    this.eventBus = new EventBus(collaborators.logger);
    this.costMeter = new CostMeter({
      prices: options.prices,
      ...(options.budgetLimit !== undefined ? { budgetLimit: options.budgetLimit } : {}),
      eventBus: this.eventBus,
    });
    this.limiters = new RateLimiterPool(options.rateLimits, collaborators.clock);
    this.registry = new ItemRegistry(collaborators.registryStore, { logger: collaborators.logger });
    this.runLogger = new RunLogger({
      sinks: collaborators.runLogSinks,
      logger: collaborators.logger,
      clock: collaborators.clock,
      ...(collaborators.batchTimestamp !== undefined ? { batchTimestamp: collaborators.batchTimestamp } : {}),
    });
    this.checkpointWriter = new CheckpointWriter(collaborators.checkpointStore, collaborators.logger);
    this.splitter = new ChunkSplitter(options.chunkSize);
  }

  transitionTo(newStatus: BatchStatus): void {
    if (!canTransition(this.status, newStatus)) {
      throw new InvalidTransitionError(this.status, newStatus);
    }
    this.status = newStatus;
  }

  elapsedMs(): number {
    return this.startedAt !== undefined ? this.clock.now() - this.startedAt : 0;
  }

  buildProgress(): BatchProgress {
    const done = this.succeeded.length + this.failed.length;
    return {
      totalItems: this.totalItems,
      queuedItems: this.queuedItems,
      succeededItems: this.succeeded.length,
      failedItems: this.failed.length,
      skippedItems: this.skipped.length,
      percentage: this.queuedItems > 0 ? Math.round((done / this.queuedItems) * 100) : 0,
      currentChunk: this.currentChunk,
      totalChunks: this.chunks.length,
      elapsedMs: this.elapsedMs(),
      totalCost: this.costMeter.getTotal(),
    };
  }

  buildSummary(stopReason: StopReason, error?: string): BatchSummary {
    return {
      batchId: this.batchId,
      status: this.status,
      stopReason,
      total: this.totalItems,
      processed: this.succeeded.length + this.failed.length,
      succeeded: this.succeeded.length,
      failed: this.failed.length,
      skipped: this.skipped.length,
      elapsedMs: this.elapsedMs(),
      cost: this.costMeter.snapshot(),
      failures: [...this.failed],
      skips: [...this.skipped],
      ...(this.lastCheckpointLocation !== undefined ? { checkpointLocation: this.lastCheckpointLocation } : {}),
      ...(error !== undefined ? { error } : {}),
      logLocations: this.runLogger.locations(),
    };
  }
}
