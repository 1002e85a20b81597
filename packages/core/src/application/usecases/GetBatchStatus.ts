import type { BatchProgress, ChunkInfo } from '../../domain/model/Batch.js';
import type { BatchStatus } from '../../domain/model/BatchStatus.js';
import type { CostLedger } from '../../domain/model/CostLedger.js';
import type { RateLimiterStats } from '../RateLimiter.js';
import type { BatchContext } from '../BatchContext.js';

/** Point-in-time view of a batch. */
export interface BatchStatusResult {
  readonly batchId: string;
  readonly status: BatchStatus;
  readonly progress: BatchProgress;
  readonly chunks: readonly ChunkInfo[];
  readonly cost: CostLedger;
  readonly rateLimits: Readonly<Record<string, RateLimiterStats>>;
}

/** Use case: query the state, progress and meters of a batch. */
export class GetBatchStatus {
  constructor(private readonly ctx: BatchContext) {}

  execute(): BatchStatusResult {
    return {
      batchId: this.ctx.batchId,
      status: this.ctx.status,
      progress: this.ctx.buildProgress(),
      chunks: [...this.ctx.chunks],
      cost: this.ctx.costMeter.snapshot(),
      rateLimits: this.ctx.limiters.stats(),
    };
  }
}
