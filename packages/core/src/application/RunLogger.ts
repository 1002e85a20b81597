import type { RunEvent, RunEventKind } from '../domain/model/RunEvent.js';
import type { RunLogSink } from '../domain/ports/RunLogSink.js';
import type { Logger } from '../domain/ports/Logger.js';
import { silentLogger } from '../domain/ports/Logger.js';
import type { Clock } from '../domain/ports/Clock.js';
import { systemClock } from '../domain/ports/Clock.js';
import { describeError } from '../domain/errors.js';
import { formatBatchTimestamp, makeRunId } from '../domain/services/runId.js';
import { Mutex } from './Mutex.js';

const MAX_LOGGED_ERROR_LENGTH = 200;

export interface RunLoggerOptions {
  readonly sinks?: readonly RunLogSink[];
  readonly logger?: Logger;
  /** Batch start; fixes the timestamp prefix of every run id. */
  readonly startedAt?: Date;
  /** Preformatted prefix, shared with a sink that names its file after the batch. Wins over `startedAt`. */
  readonly batchTimestamp?: string;
  /** Monotonic clock for durations. */
  readonly clock?: Clock;
}

export interface RunLogSummary {
  readonly batchTimestamp: string;
  readonly counts: Readonly<Record<RunEventKind, number>>;
  /** Sum of `durationMs` over terminal events. */
  readonly totalDurationMs: number;
  /** Runs started but not yet closed. */
  readonly openRuns: number;
}

interface OpenRun {
  readonly identity: string;
  readonly startedAt: number;
}

/**
 * Append-only per-item execution log.
 *
 * Every run id gets one `start` and exactly one terminal event. Events fan
 * out to every sink in call order; a failing sink is reported and skipped.
 */
export class RunLogger {
  readonly batchTimestamp: string;
  private readonly sinks: readonly RunLogSink[];
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly mutex = new Mutex();
  private readonly open = new Map<string, OpenRun>();
  private readonly counts: Record<RunEventKind, number> = { start: 0, skip: 0, success: 0, fail: 0 };
  private totalDurationMs = 0;

  constructor(options: RunLoggerOptions = {}) {
    this.sinks = options.sinks ?? [];
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? systemClock;
    this.batchTimestamp = options.batchTimestamp ?? formatBatchTimestamp(options.startedAt ?? new Date());
  }

  /** Open a run and return its id. */
  async start(identity: string, index: number, details?: string): Promise<string> {
    const runId = makeRunId(this.batchTimestamp, index, identity);
    this.open.set(runId, { identity, startedAt: this.clock.now() });
    await this.write(this.event(runId, 'start', identity, undefined, details));
    return runId;
  }

  skip(runId: string, reason: string): Promise<RunEvent | undefined> {
    return this.close(runId, 'skip', () => `reason=${reason}`);
  }

  success(runId: string, outputCount = 0): Promise<RunEvent | undefined> {
    return this.close(runId, 'success', (ms) => `duration=${seconds(ms)}s | outputs=${String(outputCount)}`);
  }

  fail(runId: string, error: string): Promise<RunEvent | undefined> {
    return this.close(
      runId,
      'fail',
      (ms) => `duration=${seconds(ms)}s | error=${error.slice(0, MAX_LOGGED_ERROR_LENGTH)}`,
    );
  }

  summary(): RunLogSummary {
    return {
      batchTimestamp: this.batchTimestamp,
      counts: { ...this.counts },
      totalDurationMs: this.totalDurationMs,
      openRuns: this.open.size,
    };
  }

  locations(): readonly string[] {
    return this.sinks.map((sink) => sink.describe());
  }

  /**
   * Emit the terminal event of a run.
   *
   * @returns The event written, or `undefined` for an unknown run id.
   */
  private async close(
    runId: string,
    kind: Exclude<RunEventKind, 'start'>,
    details: (durationMs: number) => string,
  ): Promise<RunEvent | undefined> {
    const run = this.open.get(runId);
    if (!run) {
      this.logger.warn('Terminal run event for unknown run id', { runId, kind });
      return undefined;
    }
    this.open.delete(runId);

    const durationMs = Math.max(0, this.clock.now() - run.startedAt);
    this.totalDurationMs += durationMs;
    const event = this.event(runId, kind, run.identity, durationMs, details(durationMs));
    await this.write(event);
    return event;
  }

  private event(
    runId: string,
    kind: RunEventKind,
    identity: string,
    durationMs: number | undefined,
    details: string | undefined,
  ): RunEvent {
    this.counts[kind]++;
    return {
      runId,
      kind,
      identity,
      timestamp: new Date().toISOString(),
      ...(durationMs !== undefined ? { durationMs } : {}),
      ...(details !== undefined ? { details } : {}),
    };
  }

  private write(event: RunEvent): Promise<void> {
    return this.mutex.runExclusive(async () => {
      for (const sink of this.sinks) {
        try {
          await sink.append(event);
        } catch (error) {
          this.logger.warn('Failed to write run log', { sink: sink.describe(), error: describeError(error) });
        }
      }
    });
  }
}

function seconds(ms: number): string {
  return (ms / 1000).toFixed(1);
}
