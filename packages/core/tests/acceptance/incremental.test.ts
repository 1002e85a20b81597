import { describe, it, expect, vi } from 'vitest';
import { BatchRunner } from '../../src/BatchRunner.js';
import type { BatchRunnerConfig } from '../../src/BatchRunner.js';
import { success, failure, fatal } from '../../src/domain/model/JobOutcome.js';
import type { JobFunction } from '../../src/domain/ports/JobFunction.js';
import { createWorkItem } from '../../src/domain/model/WorkItem.js';
import { BatchAbortedError } from '../../src/domain/errors.js';
import { InMemoryRegistryStore } from '../../src/infrastructure/registry/InMemoryRegistryStore.js';
import { InMemoryCheckpointStore } from '../../src/infrastructure/checkpoint/InMemoryCheckpointStore.js';
import { InMemoryRunLogSink } from '../../src/infrastructure/logging/InMemoryRunLogSink.js';
import { makeItems, recordingLogger } from '../helpers.js';

const ok: JobFunction = async () => {
  await Promise.resolve();
  return success();
};

function createRunner(registryStore: InMemoryRegistryStore, config: BatchRunnerConfig = {}) {
  const { logger } = recordingLogger();
  return new BatchRunner({ logger, registryStore, retryDelayMs: 0, ...config });
}

describe('Incremental processing', () => {
  it('should run nothing when re-run on unchanged inputs', async () => {
    const registryStore = new InMemoryRegistryStore();
    const items = makeItems(5);
    await createRunner(registryStore).from(items).run(ok);

    const sink = new InMemoryRunLogSink();
    const checkpointStore = new InMemoryCheckpointStore();
    const job = vi.fn(ok);
    const summary = await createRunner(registryStore, { runLogSinks: [sink], checkpointStore }).from(items).run(job);

    expect(job).not.toHaveBeenCalled();
    expect(summary).toMatchObject({ status: 'DONE', stopReason: 'nothing_to_do', total: 5, processed: 0, skipped: 5 });
    expect(summary.skips.map((s) => s.reason)).toEqual(Array(5).fill('already_processed'));
    expect(sink.events.map((e) => e.kind)).toEqual(Array(5).fill(['start', 'skip']).flat());
    expect(await checkpointStore.list()).toEqual([]);
  });

  it('should re-run only items whose inputs changed', async () => {
    const registryStore = new InMemoryRegistryStore();
    await createRunner(registryStore).from(makeItems(3)).run(ok);

    const changed = [
      createWorkItem('item-1', { name: 'item 1' }),
      createWorkItem('item-2', { name: 'item 2 (renamed)' }),
      createWorkItem('item-3', { name: '  item 3  ' }),
    ];
    const reasons: string[] = [];
    const runner = createRunner(registryStore).from(changed);
    runner.on('item:started', (event) => {
      reasons.push(`${event.identity}:${event.reason}`);
    });

    const summary = await runner.run(ok);

    expect(reasons).toEqual(['item-2:inputs_changed']);
    expect(summary.succeeded).toBe(1);
    expect(summary.skipped).toBe(2);
  });

  it('should retry items that failed last time', async () => {
    const registryStore = new InMemoryRegistryStore();
    await createRunner(registryStore)
      .from(makeItems(3))
      .run(async (item) => {
        await Promise.resolve();
        return item.identity === 'item-2' ? failure('timeout') : success();
      });

    const job = vi.fn(ok);
    const summary = await createRunner(registryStore).from(makeItems(3)).run(job);

    expect(job).toHaveBeenCalledOnce();
    expect(job.mock.calls[0]?.[0].identity).toBe('item-2');
    expect(summary.succeeded).toBe(1);
    expect(summary.skipped).toBe(2);
  });

  it('should run everything when forced', async () => {
    const registryStore = new InMemoryRegistryStore();
    await createRunner(registryStore).from(makeItems(3)).run(ok);

    const reasons = new Set<string>();
    const runner = createRunner(registryStore, { force: true }).from(makeItems(3));
    runner.on('item:started', (event) => {
      reasons.add(event.reason);
    });
    const summary = await runner.run(ok);

    expect(summary.succeeded).toBe(3);
    expect([...reasons]).toEqual(['forced']);
  });

  it('should apply the dry-run limit before the registry filter', async () => {
    const registryStore = new InMemoryRegistryStore();
    await createRunner(registryStore).from(makeItems(2)).run(ok);

    const job = vi.fn(ok);
    const summary = await createRunner(registryStore, { limit: 3 }).from(makeItems(5)).run(job);

    expect(summary.total).toBe(3);
    expect(summary.skipped).toBe(2);
    expect(job).toHaveBeenCalledOnce();
    expect(job.mock.calls[0]?.[0].identity).toBe('item-3');
  });

  it('should keep the first of duplicate identities', async () => {
    const { logger, entries } = recordingLogger();
    const items = [
      createWorkItem('acme', { name: 'Acme' }),
      createWorkItem('globex', { name: 'Globex' }),
      createWorkItem('acme', { name: 'Acme (copy)' }),
    ];
    const seen: string[] = [];

    const summary = await new BatchRunner({ logger })
      .from(items)
      .run(async (item) => {
        seen.push(String(item.payload['name']));
        await Promise.resolve();
        return success();
      });

    expect(summary.total).toBe(2);
    expect(seen.sort()).toEqual(['Acme', 'Globex']);
    expect(entries).toContainEqual({ level: 'warn', msg: 'Duplicate identity dropped', extra: { identity: 'acme' } });
  });

  it('should skip exactly the items a checkpointed run completed', async () => {
    const registryStore = new InMemoryRegistryStore();
    const checkpointStore = new InMemoryCheckpointStore();
    const items = makeItems(10);

    await expect(
      createRunner(registryStore, { checkpointStore, workers: 2, chunkSize: 4 })
        .from(items)
        .run(async (item) => {
          await Promise.resolve();
          return item.identity === 'item-3' ? fatal('API key revoked') : success();
        }),
    ).rejects.toBeInstanceOf(BatchAbortedError);

    const latest = await checkpointStore.loadLatest();
    const completed = latest.value?.results.success.length ?? 0;
    expect(completed).toBe(3);

    const job = vi.fn(ok);
    const summary = await createRunner(registryStore).from(items).run(job);

    expect(summary.skipped).toBe(completed);
    expect(job).toHaveBeenCalledTimes(10 - completed);
    expect(summary.stopReason).toBe('completed');
  });

  it('should re-run an item whose date input changed', async () => {
    const registryStore = new InMemoryRegistryStore();
    const calls: string[] = [];
    const job: JobFunction = async (item) => {
      calls.push(item.identity);
      await Promise.resolve();
      return success();
    };

    await createRunner(registryStore).from([createWorkItem('renewal', { due: new Date(0) })]).run(job);
    const same = await createRunner(registryStore).from([createWorkItem('renewal', { due: new Date(0) })]).run(job);
    const moved = await createRunner(registryStore).from([createWorkItem('renewal', { due: new Date(1e12) })]).run(job);

    expect(same.stopReason).toBe('nothing_to_do');
    expect(moved.stopReason).toBe('completed');
    expect(calls).toEqual(['renewal', 'renewal']);
  });
});
