import type { WorkItem } from '../../domain/model/WorkItem.js';
import type { BatchSummary } from '../../domain/model/Batch.js';
import type { CheckpointReason } from '../../domain/model/Checkpoint.js';
import type { JobSource } from '../../domain/ports/JobSource.js';
import type { JobFunction } from '../../domain/ports/JobFunction.js';
import { BatchAbortedError, BudgetExceededError, describeError } from '../../domain/errors.js';
import type { BatchContext } from '../BatchContext.js';
import type { QueuedItem } from './ProcessItem.js';
import { DispatchChunk } from './DispatchChunk.js';

/**
 * Use case: drive one batch from source to summary.
 *
 * Load, limit, de-duplicate, filter through the registry, chunk, then for
 * each chunk dispatch, await the barrier and checkpoint. Stops after the
 * chunk in which the budget was exceeded or a fatal outcome was reported.
 */
export class RunBatch {
  private readonly dispatchChunk: DispatchChunk;

  constructor(private readonly ctx: BatchContext) {
    this.dispatchChunk = new DispatchChunk(ctx);
  }

  async execute(source: JobSource, job: JobFunction): Promise<BatchSummary> {
    this.assertCanStart();
    this.ctx.transitionTo('LOADING_ITEMS');
    this.ctx.startedAt = this.ctx.clock.now();

    const registry = await this.ctx.registry.load();
    this.ctx.logger.info('Registry loaded', { status: registry.status, ...this.ctx.registry.stats() });

    const items = await this.loadItems(source);
    const queue = await this.filter(items);
    this.ctx.totalItems = items.length;
    this.ctx.queuedItems = queue.length;

    if (queue.length === 0) {
      this.ctx.transitionTo('DONE');
      this.ctx.logger.info('Nothing to do', { total: items.length, skipped: this.ctx.skipped.length });
      const summary = this.ctx.buildSummary('nothing_to_do');
      this.ctx.eventBus.emit({ type: 'batch:completed', batchId: this.ctx.batchId, summary, timestamp: Date.now() });
      return summary;
    }

    this.ctx.transitionTo('CHUNKING');
    const chunks = this.ctx.splitter.split(queue);
    this.ctx.chunks = chunks.map((chunk, index) => ({
      index,
      size: chunk.length,
      succeeded: 0,
      failed: 0,
      completed: false,
    }));
    this.logPlan(items.length, queue.length, chunks.length);

    // Yield so that handlers registered right after run() receive this event
    await Promise.resolve();

    this.ctx.eventBus.emit({
      type: 'batch:started',
      batchId: this.ctx.batchId,
      totalItems: items.length,
      queuedItems: queue.length,
      totalChunks: chunks.length,
      timestamp: Date.now(),
    });

    for (const [chunkIndex, chunk] of chunks.entries()) {
      const isLast = chunkIndex === chunks.length - 1;
      const reason = await this.runChunk(chunkIndex, chunk, job, isLast);

      if (reason === 'fatal_error') {
        this.ctx.transitionTo('ABORTED');
        const message = this.ctx.fatalError ?? 'Fatal job error';
        const summary = this.ctx.buildSummary('fatal_error', message);
        this.ctx.logger.error('Batch aborted on fatal error', {
          error: message,
          checkpoint: summary.checkpointLocation,
        });
        this.ctx.eventBus.emit({
          type: 'batch:aborted',
          batchId: this.ctx.batchId,
          reason: 'fatal_error',
          error: message,
          summary,
          timestamp: Date.now(),
        });
        throw new BatchAbortedError(message, summary);
      }

      if (reason === 'budget') {
        this.ctx.transitionTo('ABORTED');
        const message = new BudgetExceededError(
          this.ctx.costMeter.getTotal(),
          this.ctx.costMeter.getBudgetLimit() ?? 0,
        ).message;
        const summary = this.ctx.buildSummary('budget', message);
        this.ctx.logger.warn('Batch stopped on budget', {
          error: message,
          remaining: queue.length - this.ctx.processedCount,
          checkpoint: summary.checkpointLocation,
        });
        this.ctx.eventBus.emit({
          type: 'batch:aborted',
          batchId: this.ctx.batchId,
          reason: 'budget',
          error: message,
          summary,
          timestamp: Date.now(),
        });
        return summary;
      }
    }

    this.ctx.transitionTo('DONE');
    const summary = this.ctx.buildSummary('completed');
    this.ctx.logger.info('Batch complete', {
      succeeded: summary.succeeded,
      failed: summary.failed,
      skipped: summary.skipped,
      cost: summary.cost.total,
    });
    this.ctx.eventBus.emit({ type: 'batch:completed', batchId: this.ctx.batchId, summary, timestamp: Date.now() });
    return summary;
  }

  private assertCanStart(): void {
    if (this.ctx.status !== 'PENDING') {
      throw new Error(`Cannot run batch from status '${this.ctx.status}'`);
    }
  }

  private async loadItems(source: JobSource): Promise<readonly WorkItem[]> {
    let loaded: readonly WorkItem[];
    try {
      loaded = await source.load();
    } catch (error) {
      this.ctx.transitionTo('ABORTED');
      const message = describeError(error);
      this.ctx.logger.error('Failed to load work items', { error: message });
      this.ctx.eventBus.emit({
        type: 'batch:aborted',
        batchId: this.ctx.batchId,
        reason: 'source_error',
        error: message,
        timestamp: Date.now(),
      });
      throw error;
    }

    const limited = this.ctx.options.limit !== undefined ? loaded.slice(0, this.ctx.options.limit) : loaded;

    const seen = new Set<string>();
    const unique: WorkItem[] = [];
    for (const item of limited) {
      if (seen.has(item.identity)) {
        this.ctx.logger.warn('Duplicate identity dropped', { identity: item.identity });
        continue;
      }
      seen.add(item.identity);
      unique.push(item);
    }
    return unique;
  }

  /** Split items into the run queue and the skip list. Skips are logged as start then skip. */
  private async filter(items: readonly WorkItem[]): Promise<QueuedItem[]> {
    const queue: QueuedItem[] = [];

    for (const [index, item] of items.entries()) {
      const decision = this.ctx.registry.needsProcessing(item.identity, item.payload, this.ctx.options.force);
      if (decision.needed) {
        queue.push({ item, index, reason: decision.reason });
        continue;
      }

      const runId = await this.ctx.runLogger.start(item.identity, index);
      await this.ctx.runLogger.skip(runId, decision.reason);
      this.ctx.skipped.push({ identity: item.identity, reason: decision.reason });
      this.ctx.eventBus.emit({
        type: 'item:skipped',
        batchId: this.ctx.batchId,
        identity: item.identity,
        reason: decision.reason,
        timestamp: Date.now(),
      });
    }

    return queue;
  }

  private logPlan(total: number, queued: number, chunkCount: number): void {
    const { workers, chunkSize, estimatedCostPerItem, budgetLimit } = this.ctx.options;
    this.ctx.logger.info('Batch planned', {
      batchId: this.ctx.batchId,
      total,
      queued,
      skipped: total - queued,
      chunks: chunkCount,
      workers,
      chunkSize,
      budgetLimit,
    });

    if (estimatedCostPerItem !== undefined) {
      const estimate = estimatedCostPerItem * queued;
      this.ctx.logger.info('Estimated batch cost', { estimate, perItem: estimatedCostPerItem });
      if (budgetLimit !== undefined && estimate > budgetLimit) {
        this.ctx.logger.warn('Estimated cost exceeds budget; the batch will stop early', {
          estimate,
          budgetLimit,
        });
      }
    }
  }

  private async runChunk(
    chunkIndex: number,
    chunk: readonly QueuedItem[],
    job: JobFunction,
    isLast: boolean,
  ): Promise<CheckpointReason> {
    this.ctx.transitionTo('DISPATCHING');
    this.ctx.currentChunk = chunkIndex;
    this.ctx.eventBus.emit({
      type: 'chunk:started',
      batchId: this.ctx.batchId,
      chunkIndex,
      itemCount: chunk.length,
      timestamp: Date.now(),
    });

    const pending = this.dispatchChunk.execute(chunk, job);
    this.ctx.transitionTo('AWAITING_WORKERS');
    const attempts = await pending;

    let succeeded = 0;
    let failed = 0;
    for (const attempt of attempts) {
      if (attempt.status === 'succeeded') {
        this.ctx.succeeded.push(attempt.result);
        succeeded++;
      } else {
        this.ctx.failed.push(attempt.result);
        failed++;
        if (attempt.fatal && this.ctx.fatalError === undefined) {
          this.ctx.fatalError = attempt.result.error;
        }
      }
    }
    this.ctx.processedCount += chunk.length;
    this.ctx.chunks[chunkIndex] = { index: chunkIndex, size: chunk.length, succeeded, failed, completed: true };

    this.ctx.transitionTo('CHECKPOINTING');
    const reason: CheckpointReason =
      this.ctx.fatalError !== undefined
        ? 'fatal_error'
        : this.ctx.costMeter.isExceeded()
          ? 'budget'
          : isLast
            ? 'complete'
            : 'chunk_complete';

    const written = await this.ctx.checkpointWriter.write({
      batchId: this.ctx.batchId,
      processedCount: this.ctx.processedCount,
      results: { success: this.ctx.succeeded, failed: this.ctx.failed, skipped: this.ctx.skipped },
      totalCost: this.ctx.costMeter.getTotal(),
      reason,
    });
    if (written.location !== undefined) {
      this.ctx.lastCheckpointLocation = written.location;
    }

    this.ctx.eventBus.emit({
      type: 'checkpoint:saved',
      batchId: this.ctx.batchId,
      reason,
      processedCount: this.ctx.processedCount,
      ...(written.location !== undefined ? { location: written.location } : {}),
      timestamp: Date.now(),
    });
    this.ctx.eventBus.emit({
      type: 'chunk:completed',
      batchId: this.ctx.batchId,
      chunkIndex,
      succeeded,
      failed,
      progress: this.ctx.buildProgress(),
      timestamp: Date.now(),
    });

    return reason;
  }
}
