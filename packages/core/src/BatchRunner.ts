import type { BatchSummary } from './domain/model/Batch.js';
import type { Checkpoint } from './domain/model/Checkpoint.js';
import type { CostLedger } from './domain/model/CostLedger.js';
import type { Loaded } from './domain/model/Loaded.js';
import type { WorkItem } from './domain/model/WorkItem.js';
import type { JobSource } from './domain/ports/JobSource.js';
import type { JobFunction } from './domain/ports/JobFunction.js';
import type { RegistryStore } from './domain/ports/RegistryStore.js';
import type { CheckpointStore } from './domain/ports/CheckpointStore.js';
import type { RunLogSink } from './domain/ports/RunLogSink.js';
import type { Logger } from './domain/ports/Logger.js';
import type { Clock } from './domain/ports/Clock.js';
import { systemClock } from './domain/ports/Clock.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import type { BatchOptionsInput } from './config/BatchOptions.js';
import { parseBatchOptions } from './config/BatchOptions.js';
import { BatchContext } from './application/BatchContext.js';
import type { ItemRegistry } from './application/ItemRegistry.js';
import { RunBatch } from './application/usecases/RunBatch.js';
import { GetBatchStatus } from './application/usecases/GetBatchStatus.js';
import type { BatchStatusResult } from './application/usecases/GetBatchStatus.js';
import { InMemoryRegistryStore } from './infrastructure/registry/InMemoryRegistryStore.js';
import { InMemoryCheckpointStore } from './infrastructure/checkpoint/InMemoryCheckpointStore.js';
import { ArrayItemSource } from './infrastructure/sources/ArrayItemSource.js';
import { createConsoleLogger } from './infrastructure/logging/ConsoleLogger.js';

/** Configuration for a batch. Plain options are validated by `BatchOptionsSchema`. */
export interface BatchRunnerConfig extends BatchOptionsInput {
  /** Persistence for the item registry. Default: `InMemoryRegistryStore`. */
  readonly registryStore?: RegistryStore;
  /** Persistence for checkpoints. Default: `InMemoryCheckpointStore`. */
  readonly checkpointStore?: CheckpointStore;
  /** Run-log destinations. Default: none. */
  readonly runLogSinks?: readonly RunLogSink[];
  /** Operational logger. Default: JSON lines on stdout at `LOG_LEVEL`. */
  readonly logger?: Logger;
  /** Time source for rate limiting, retries and durations. */
  readonly clock?: Clock;
  /** Run-id prefix (`YYYYMMDD_HHMMSS`). Default: construction time. Set by `createFileStores`. */
  readonly batchTimestamp?: string;
}

/**
 * Facade that drives one batch: load → filter → chunk → dispatch → checkpoint.
 *
 * Delegates each operation to a use case in `application/usecases/` and holds
 * the shared `BatchContext` they operate on. One instance runs one batch.
 *
 * @example
 * ```typescript
 * const runner = new BatchRunner({
 *   workers: 4,
 *   budgetLimit: 25,
 *   prices: { llm_call: 0.02 },
 *   rateLimits: { llm: { capacity: 5, refillRate: 2 } },
 *   preAcquire: ['llm'],
 *   registryStore: new FileRegistryStore({ filePath: 'state/registry.json' }),
 * });
 *
 * runner.from(companies);
 * const summary = await runner.run(async (item, ctx) => {
 *   const answer = await client.complete(item.payload);
 *   ctx.record('llm_call', 1);
 *   return success(await save(item.identity, answer));
 * });
 * ```
 *
 * @throws {ConfigError} When the options fail validation.
 */
export class BatchRunner {
  private readonly ctx: BatchContext;
  private source: JobSource | null = null;

  constructor(config: BatchRunnerConfig = {}) {
    const { registryStore, checkpointStore, runLogSinks, logger, clock, batchTimestamp, ...options } = config;
    this.ctx = new BatchContext(parseBatchOptions(options), {
      registryStore: registryStore ?? new InMemoryRegistryStore(),
      checkpointStore: checkpointStore ?? new InMemoryCheckpointStore(),
      runLogSinks: runLogSinks ?? [],
      logger: logger ?? createConsoleLogger(),
      clock: clock ?? systemClock,
      batchTimestamp,
    });
  }

  /** Set the item source. Arrays are wrapped in an `ArrayItemSource`. */
  from(source: JobSource | readonly WorkItem[]): this {
    this.source = isJobSource(source) ? source : new ArrayItemSource(source);
    return this;
  }

  /**
   * Run the batch to completion or to the first stopping condition.
   *
   * Resolves with the summary when every queued item ran, when there was
   * nothing to do, or when the budget stopped the batch (`stopReason: 'budget'`).
   *
   * @throws {BatchAbortedError} After a fatal outcome, once the chunk has drained and the checkpoint is written.
   * @throws The source's own error when it fails to load.
   */
  run(job: JobFunction): Promise<BatchSummary> {
    if (!this.source) {
      return Promise.reject(new Error('Item source not configured. Call .from(source) first.'));
    }
    return new RunBatch(this.ctx).execute(this.source, job);
  }

  /** Subscribe to a specific domain event type. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe a handler registered with `on()`. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to all domain events. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }

  getStatus(): BatchStatusResult {
    return new GetBatchStatus(this.ctx).execute();
  }

  getCostSnapshot(): CostLedger {
    return this.ctx.costMeter.snapshot();
  }

  /** The registry this batch filters against and writes to. */
  getRegistry(): ItemRegistry {
    return this.ctx.registry;
  }

  getBatchId(): string {
    return this.ctx.batchId;
  }

  latestCheckpoint(): Promise<Loaded<Checkpoint | null>> {
    return this.ctx.checkpointWriter.loadLatest();
  }

  listCheckpoints(): Promise<readonly Checkpoint[]> {
    return this.ctx.checkpointWriter.list();
  }
}

function isJobSource(value: JobSource | readonly WorkItem[]): value is JobSource {
  return !Array.isArray(value);
}
