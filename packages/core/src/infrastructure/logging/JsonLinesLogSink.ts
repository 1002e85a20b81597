import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { RunLogSink } from '../../domain/ports/RunLogSink.js';
import type { RunEvent } from '../../domain/model/RunEvent.js';
import { formatBatchTimestamp } from '../../domain/services/runId.js';

export interface JsonLinesLogSinkOptions {
  /** Default: `'logs'`. */
  readonly directory?: string;
  /** Names the file `run_<timestamp>.jsonl`. Default: construction time. */
  readonly batchTimestamp?: string;
}

/** Structured run log: one JSON object per event, one file per batch. */
export class JsonLinesLogSink implements RunLogSink {
  readonly filePath: string;
  private readonly directory: string;
  private ensured = false;

  constructor(options?: JsonLinesLogSinkOptions) {
    this.directory = options?.directory ?? 'logs';
    const stamp = options?.batchTimestamp ?? formatBatchTimestamp(new Date());
    this.filePath = join(this.directory, `run_${stamp}.jsonl`);
  }

  async append(event: RunEvent): Promise<void> {
    if (!this.ensured) {
      await mkdir(this.directory, { recursive: true });
      this.ensured = true;
    }
    await appendFile(this.filePath, JSON.stringify(event) + '\n', 'utf-8');
  }

  describe(): string {
    return this.filePath;
  }
}
