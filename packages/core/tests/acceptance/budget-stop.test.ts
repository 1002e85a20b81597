import { describe, it, expect, vi } from 'vitest';
import { BatchRunner } from '../../src/BatchRunner.js';
import { success } from '../../src/domain/model/JobOutcome.js';
import { BudgetExceededError } from '../../src/domain/errors.js';
import { formatSummary } from '../../src/domain/services/formatSummary.js';
import { InMemoryCheckpointStore } from '../../src/infrastructure/checkpoint/InMemoryCheckpointStore.js';
import { InMemoryRegistryStore } from '../../src/infrastructure/registry/InMemoryRegistryStore.js';
import { makeItems, recordingLogger } from '../helpers.js';

describe('Budget stop', () => {
  it('should stop after the chunk in which the budget ran out', async () => {
    const checkpointStore = new InMemoryCheckpointStore();
    const registryStore = new InMemoryRegistryStore();
    const runner = new BatchRunner({
      logger: recordingLogger().logger,
      workers: 1,
      chunkSize: 2,
      budgetLimit: 1,
      prices: { llm_call: 0.3 },
      checkpointStore,
      registryStore,
    });
    const budgetEvents = vi.fn();
    runner.on('budget:exceeded', budgetEvents);
    const called: string[] = [];

    const summary = await runner.from(makeItems(5)).run(async (item, ctx) => {
      called.push(item.identity);
      await Promise.resolve();
      ctx.record('llm_call', 1);
      return success();
    });

    expect(called).toEqual(['item-1', 'item-2', 'item-3', 'item-4']);
    expect(summary).toMatchObject({
      status: 'ABORTED',
      stopReason: 'budget',
      processed: 4,
      succeeded: 3,
      failed: 1,
      error: 'Budget exceeded: $1.20 / $1.00',
      checkpointLocation: 'memory:1',
    });
    expect(summary.failures[0]).toMatchObject({ identity: 'item-4', error: 'Budget exceeded: $1.20 / $1.00' });
    expect(summary.cost.total).toBeCloseTo(1.2, 10);
    expect(budgetEvents).toHaveBeenCalledOnce();

    const latest = await checkpointStore.loadLatest();
    expect(latest.value?.reason).toBe('budget');
    expect(latest.value?.processedCount).toBe(4);

    const item4 = (await registryStore.load()).value.find((r) => r.identity === 'item-4');
    expect(item4?.status).toBe('failed');

    expect(formatSummary(summary).split('\n')).toContain('  Resume from: memory:1');
  });

  it('should stop when the job swallows the budget error', async () => {
    const runner = new BatchRunner({
      logger: recordingLogger().logger,
      workers: 1,
      chunkSize: 1,
      budgetLimit: 0.5,
      prices: { call: 0.5 },
    });

    const summary = await runner.from(makeItems(3)).run(async (_item, ctx) => {
      try {
        ctx.record('call', 1);
      } catch (error) {
        if (!(error instanceof BudgetExceededError)) throw error;
      }
      await Promise.resolve();
      return success();
    });

    expect(summary.stopReason).toBe('budget');
    expect(summary.processed).toBe(1);
    expect(summary.succeeded).toBe(1);
  });

  it('should warn when the estimate exceeds the budget', async () => {
    const { logger, entries } = recordingLogger();
    const runner = new BatchRunner({ logger, budgetLimit: 1, estimatedCostPerItem: 0.4, prices: { call: 0.1 } });

    await runner.from(makeItems(3)).run(async () => {
      await Promise.resolve();
      return success();
    });

    expect(entries).toContainEqual({
      level: 'info',
      msg: 'Estimated batch cost',
      extra: { estimate: expect.closeTo(1.2, 10), perItem: 0.4 },
    });
    expect(entries).toContainEqual({
      level: 'warn',
      msg: 'Estimated cost exceeds budget; the batch will stop early',
      extra: { estimate: expect.closeTo(1.2, 10), budgetLimit: 1 },
    });
  });
});
