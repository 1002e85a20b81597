import type { WorkItem } from '../../domain/model/WorkItem.js';
import type { JobOutcome, SuccessOutcome } from '../../domain/model/JobOutcome.js';
import { failure, fatal } from '../../domain/model/JobOutcome.js';
import type { ItemResult } from '../../domain/model/Checkpoint.js';
import type { JobContext, JobFunction } from '../../domain/ports/JobFunction.js';
import { FatalJobError, describeError } from '../../domain/errors.js';
import type { ProcessingReason } from '../ItemRegistry.js';
import type { BatchContext } from '../BatchContext.js';

/** An item that passed the registry filter, with its position in the source list. */
export interface QueuedItem {
  readonly item: WorkItem;
  readonly index: number;
  readonly reason: ProcessingReason;
}

/** Terminal result of one item within the batch. */
export type ItemAttempt =
  | { readonly status: 'succeeded'; readonly result: ItemResult }
  | { readonly status: 'failed'; readonly result: ItemResult; readonly fatal: boolean };

/**
 * Use case: run one item end to end.
 *
 * Opens the run, takes the pre-acquired rate-limit tokens, calls the job
 * (with retries for ordinary failures), then records the outcome in the
 * registry and the run log. Never rejects: every thrown value becomes an
 * outcome, including one thrown while recording a finished job.
 */
export class ProcessItem {
  constructor(private readonly ctx: BatchContext) {}

  async execute(queued: QueuedItem, job: JobFunction): Promise<ItemAttempt> {
    const { item, index, reason } = queued;
    const runId = await this.ctx.runLogger.start(item.identity, index, `reason=${reason}`);
    const startedAt = this.ctx.clock.now();

    this.ctx.eventBus.emit({
      type: 'item:started',
      batchId: this.ctx.batchId,
      identity: item.identity,
      runId,
      reason,
      timestamp: Date.now(),
    });

    const outcome = await this.executeWithRetry(item, index, runId, job);
    const durationMs = this.ctx.clock.now() - startedAt;

    try {
      return await this.settle(item, runId, outcome, durationMs);
    } catch (error) {
      const message = `Failed to record outcome: ${describeError(error)}`;
      this.ctx.logger.error('Item bookkeeping failed', { identity: item.identity, runId, error: describeError(error) });
      return this.settleAfterError(item, runId, outcome, message, durationMs);
    }
  }

  private async settle(item: WorkItem, runId: string, outcome: JobOutcome, durationMs: number): Promise<ItemAttempt> {
    if (outcome.kind === 'success') {
      const outputs = collectOutputs(outcome);
      await this.ctx.registry.recordSuccess(item.identity, item.payload, runId, outputs);
      await this.ctx.runLogger.success(runId, Object.keys(outputs).length);

      this.ctx.eventBus.emit({
        type: 'item:succeeded',
        batchId: this.ctx.batchId,
        identity: item.identity,
        runId,
        durationMs,
        timestamp: Date.now(),
      });

      return {
        status: 'succeeded',
        result: {
          identity: item.identity,
          runId,
          durationMs,
          ...(outcome.outputRef !== undefined ? { outputRef: outcome.outputRef } : {}),
        },
      };
    }

    const isFatal = outcome.kind === 'fatal';
    await this.ctx.registry.recordFailure(item.identity, item.payload, runId, outcome.error);
    await this.ctx.runLogger.fail(runId, outcome.error);

    this.ctx.eventBus.emit({
      type: 'item:failed',
      batchId: this.ctx.batchId,
      identity: item.identity,
      runId,
      error: outcome.error,
      fatal: isFatal,
      durationMs,
      timestamp: Date.now(),
    });

    return {
      status: 'failed',
      fatal: isFatal,
      result: { identity: item.identity, runId, durationMs, error: outcome.error },
    };
  }

  /**
   * Close the run as failed after `settle` threw. A fatal outcome keeps its
   * message so the batch still aborts with it.
   */
  private async settleAfterError(
    item: WorkItem,
    runId: string,
    outcome: JobOutcome,
    bookkeepingError: string,
    durationMs: number,
  ): Promise<ItemAttempt> {
    const isFatal = outcome.kind === 'fatal';
    const error = outcome.kind === 'success' ? bookkeepingError : outcome.error;

    await this.bestEffort('record failure', runId, () =>
      this.ctx.registry.recordFailure(item.identity, item.payload, runId, error),
    );
    await this.bestEffort('log failure', runId, () => this.ctx.runLogger.fail(runId, error));

    return {
      status: 'failed',
      fatal: isFatal,
      result: { identity: item.identity, runId, durationMs, error },
    };
  }

  private async bestEffort(action: string, runId: string, step: () => Promise<unknown>): Promise<void> {
    try {
      await step();
    } catch (error) {
      this.ctx.logger.error(`Failed to ${action}`, { runId, error: describeError(error) });
    }
  }

  /** Ordinary failures are retried with exponential backoff; fatal outcomes and a spent budget are not. */
  private async executeWithRetry(item: WorkItem, index: number, runId: string, job: JobFunction): Promise<JobOutcome> {
    const maxAttempts = 1 + this.ctx.options.maxRetries;
    let outcome: JobOutcome = failure('Job was not attempted');

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      outcome = await this.attempt(item, index, runId, attempt, job);
      if (outcome.kind !== 'failure' || attempt === maxAttempts || this.ctx.costMeter.isExceeded()) {
        return outcome;
      }

      this.ctx.eventBus.emit({
        type: 'item:retried',
        batchId: this.ctx.batchId,
        identity: item.identity,
        attempt,
        maxRetries: this.ctx.options.maxRetries,
        error: outcome.error,
        timestamp: Date.now(),
      });

      const delay = this.ctx.options.retryDelayMs * Math.pow(2, attempt - 1);
      await this.ctx.clock.sleep(delay);
    }

    return outcome;
  }

  private async attempt(
    item: WorkItem,
    index: number,
    runId: string,
    attempt: number,
    job: JobFunction,
  ): Promise<JobOutcome> {
    const context: JobContext = {
      batchId: this.ctx.batchId,
      runId,
      itemIndex: index,
      attempt,
      record: (kind, quantity) => {
        this.ctx.costMeter.record(kind, quantity);
      },
      acquire: (dependency) => this.ctx.limiters.acquire(dependency),
    };

    try {
      for (const dependency of this.ctx.options.preAcquire) {
        await this.ctx.limiters.acquire(dependency);
      }
      return await job(item, context);
    } catch (error) {
      if (error instanceof FatalJobError) {
        return fatal(error.message);
      }
      return failure(describeError(error));
    }
  }
}

function collectOutputs(outcome: SuccessOutcome): Readonly<Record<string, string>> {
  return {
    ...(outcome.outputs ?? {}),
    ...(outcome.outputRef !== undefined ? { outputRef: outcome.outputRef } : {}),
  };
}
