import type { Checkpoint, CheckpointReason, CheckpointResults } from '../domain/model/Checkpoint.js';
import { CHECKPOINT_FORMAT_VERSION } from '../domain/model/Checkpoint.js';
import type { Loaded } from '../domain/model/Loaded.js';
import { loadedDegraded } from '../domain/model/Loaded.js';
import type { CheckpointStore } from '../domain/ports/CheckpointStore.js';
import type { Logger } from '../domain/ports/Logger.js';
import { silentLogger } from '../domain/ports/Logger.js';
import { describeError } from '../domain/errors.js';

export interface CheckpointInput {
  readonly batchId: string;
  readonly processedCount: number;
  readonly results: CheckpointResults;
  readonly totalCost: number;
  readonly reason: CheckpointReason;
}

export interface CheckpointWrite {
  readonly checkpoint: Checkpoint;
  /** Absent when the store failed. */
  readonly location?: string;
}

/** Snapshots cumulative progress after each chunk. A failed write is a warning, not an error. */
export class CheckpointWriter {
  private lastLocation: string | undefined;

  constructor(
    private readonly store: CheckpointStore,
    private readonly logger: Logger = silentLogger,
  ) {}

  async write(input: CheckpointInput): Promise<CheckpointWrite> {
    const checkpoint: Checkpoint = {
      version: CHECKPOINT_FORMAT_VERSION,
      batchId: input.batchId,
      timestamp: new Date().toISOString(),
      processedCount: input.processedCount,
      results: {
        success: [...input.results.success],
        failed: [...input.results.failed],
        skipped: [...input.results.skipped],
      },
      totalCost: input.totalCost,
      reason: input.reason,
    };

    try {
      const location = await this.store.save(checkpoint);
      this.lastLocation = location;
      this.logger.debug('Checkpoint saved', { location, reason: input.reason, processed: input.processedCount });
      return { checkpoint, location };
    } catch (error) {
      this.logger.warn('Failed to save checkpoint', { reason: input.reason, error: describeError(error) });
      return { checkpoint };
    }
  }

  async loadLatest(): Promise<Loaded<Checkpoint | null>> {
    try {
      return await this.store.loadLatest();
    } catch (error) {
      return loadedDegraded(null, describeError(error));
    }
  }

  list(): Promise<readonly Checkpoint[]> {
    return this.store.list();
  }

  /** Location of the most recent successful write in this process. */
  getLastLocation(): string | undefined {
    return this.lastLocation;
  }
}
