import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { RunLogSink } from '../../domain/ports/RunLogSink.js';
import type { RunEvent } from '../../domain/model/RunEvent.js';
import { formatDay, formatLogTime } from '../../domain/services/runId.js';

export interface DailyTextLogSinkOptions {
  /** Default: `'logs'`. */
  readonly directory?: string;
}

/** Render one event as `[YYYY-MM-DD HH:MM:SS] [run_id] [EVENT   ] identity | details`. */
export function formatRunLogLine(event: RunEvent, at: Date): string {
  const kind = event.kind.toUpperCase().padEnd(8);
  const details = event.details !== undefined ? ` | ${event.details}` : '';
  return `[${formatLogTime(at)}] [${event.runId}] [${kind}] ${event.identity}${details}`;
}

/** Human-readable run log, one file per local calendar day (`batch_YYYYMMDD.log`). */
export class DailyTextLogSink implements RunLogSink {
  private readonly directory: string;
  private ensured = false;

  constructor(options?: DailyTextLogSinkOptions) {
    this.directory = options?.directory ?? 'logs';
  }

  async append(event: RunEvent): Promise<void> {
    const at = new Date(event.timestamp);
    if (!this.ensured) {
      await mkdir(this.directory, { recursive: true });
      this.ensured = true;
    }
    await appendFile(this.fileFor(at), formatRunLogLine(event, at) + '\n', 'utf-8');
  }

  describe(): string {
    return join(this.directory, 'batch_<YYYYMMDD>.log');
  }

  fileFor(date: Date): string {
    return join(this.directory, `batch_${formatDay(date)}.log`);
  }
}
