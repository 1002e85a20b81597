import type { JobFunction } from '../../domain/ports/JobFunction.js';
import type { BatchContext } from '../BatchContext.js';
import type { ItemAttempt, QueuedItem } from './ProcessItem.js';
import { ProcessItem } from './ProcessItem.js';

/**
 * Use case: run one chunk on a bounded pool of workers.
 *
 * Each worker pulls the next item of the chunk until none is left, so at most
 * `workers` jobs are in flight. Results come back in completion order. The
 * returned promise settles only once every worker has returned, even when
 * one of them rejects.
 */
export class DispatchChunk {
  private readonly processItem: ProcessItem;

  constructor(private readonly ctx: BatchContext) {
    this.processItem = new ProcessItem(ctx);
  }

  async execute(chunk: readonly QueuedItem[], job: JobFunction): Promise<ItemAttempt[]> {
    const attempts: ItemAttempt[] = [];
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < chunk.length) {
        const queued = chunk[next++];
        if (!queued) break;
        attempts.push(await this.processItem.execute(queued, job));
      }
    };

    const workerCount = Math.min(this.ctx.options.workers, chunk.length);
    const settled = await Promise.allSettled(Array.from({ length: workerCount }, () => worker()));
    for (const result of settled) {
      if (result.status === 'rejected') throw result.reason;
    }
    return attempts;
  }
}
