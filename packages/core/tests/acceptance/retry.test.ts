import { describe, it, expect, vi } from 'vitest';
import { BatchRunner } from '../../src/BatchRunner.js';
import type { BatchRunnerConfig } from '../../src/BatchRunner.js';
import { success, failure, fatal } from '../../src/domain/model/JobOutcome.js';
import { BatchAbortedError } from '../../src/domain/errors.js';
import { silentLogger } from '../../src/domain/ports/Logger.js';
import type { ItemRetriedEvent } from '../../src/domain/events/DomainEvents.js';
import { FakeClock, makeItems } from '../helpers.js';

function createRunner(clock: FakeClock, config: BatchRunnerConfig = {}) {
  return new BatchRunner({ logger: silentLogger, clock, maxRetries: 2, retryDelayMs: 50, ...config });
}

describe('Retries', () => {
  it('should retry a failed attempt with exponential backoff', async () => {
    const clock = new FakeClock();
    const runner = createRunner(clock);
    const retried: ItemRetriedEvent[] = [];
    runner.on('item:retried', (event) => {
      retried.push(event);
    });
    const attempts: number[] = [];

    const summary = await runner.from(makeItems(1)).run(async (_item, ctx) => {
      attempts.push(ctx.attempt);
      await Promise.resolve();
      return ctx.attempt < 3 ? failure(`503 on attempt ${String(ctx.attempt)}`) : success();
    });

    expect(summary.succeeded).toBe(1);
    expect(attempts).toEqual([1, 2, 3]);
    expect(clock.sleeps).toEqual([50, 100]);
    expect(retried.map((e) => [e.attempt, e.maxRetries, e.error])).toEqual([
      [1, 2, '503 on attempt 1'],
      [2, 2, '503 on attempt 2'],
    ]);
  });

  it('should report the last error once retries are exhausted', async () => {
    const clock = new FakeClock();
    const job = vi.fn(async (_item: unknown, ctx: { attempt: number }) => {
      await Promise.resolve();
      return failure(`timeout #${String(ctx.attempt)}`);
    });

    const summary = await createRunner(clock).from(makeItems(1)).run(job);

    expect(job).toHaveBeenCalledTimes(3);
    expect(summary.failed).toBe(1);
    expect(summary.failures[0]?.error).toBe('timeout #3');
    expect(clock.sleeps).toEqual([50, 100]);
  });

  it('should keep the same run id across attempts', async () => {
    const runIds = new Set<string>();

    await createRunner(new FakeClock())
      .from(makeItems(1))
      .run(async (_item, ctx) => {
        runIds.add(ctx.runId);
        await Promise.resolve();
        return ctx.attempt === 1 ? failure('flaky') : success();
      });

    expect(runIds.size).toBe(1);
  });

  it('should not retry once the budget is exceeded', async () => {
    const clock = new FakeClock();
    const job = vi.fn(async (_item: unknown, ctx: { record(kind: string, quantity: number): void }) => {
      ctx.record('call', 1);
      await Promise.resolve();
      return success();
    });

    const summary = await createRunner(clock, { prices: { call: 1 }, budgetLimit: 1 })
      .from(makeItems(1))
      .run(job);

    expect(job).toHaveBeenCalledOnce();
    expect(clock.sleeps).toEqual([]);
    expect(summary.stopReason).toBe('budget');
    expect(summary.failures[0]?.error).toBe('Budget exceeded: $1.00 / $1.00');
  });

  it('should not retry a fatal outcome', async () => {
    const clock = new FakeClock();
    const job = vi.fn(async () => {
      await Promise.resolve();
      return fatal('credentials rejected');
    });

    await expect(createRunner(clock).from(makeItems(1)).run(job)).rejects.toBeInstanceOf(BatchAbortedError);

    expect(job).toHaveBeenCalledOnce();
    expect(clock.sleeps).toEqual([]);
  });
});
