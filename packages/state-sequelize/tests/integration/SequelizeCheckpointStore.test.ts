import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Checkpoint } from '@batchmeter/core';
import { SequelizeCheckpointStore } from '../../src/SequelizeCheckpointStore.js';
import { createTestDatabase } from '../sqlite.js';
import type { TestDatabase } from '../sqlite.js';

function checkpoint(processedCount: number, reason: Checkpoint['reason']): Checkpoint {
  return {
    version: 1,
    batchId: 'batch-1',
    timestamp: '2026-03-01T10:00:00.000Z',
    processedCount,
    results: {
      success: Array.from({ length: processedCount }, (_, i) => ({
        identity: `item-${String(i + 1)}`,
        runId: `run-${String(i + 1)}`,
        durationMs: 100,
      })),
      failed: [],
      skipped: [{ identity: 'item-0', reason: 'already_processed' }],
    },
    totalCost: processedCount * 0.02,
    reason,
  };
}

describe('SequelizeCheckpointStore', () => {
  let db: TestDatabase;
  let store: SequelizeCheckpointStore;

  beforeEach(async () => {
    db = createTestDatabase();
    store = new SequelizeCheckpointStore(db.sequelize);
    await store.initialize();
  });

  afterEach(async () => {
    await db.close();
  });

  it('should report no checkpoint as missing', async () => {
    expect(await store.loadLatest()).toEqual({ status: 'missing', value: null });
    expect(await store.list()).toEqual([]);
  });

  it('should return row locations and the latest checkpoint', async () => {
    expect(await store.save(checkpoint(2, 'chunk_complete'))).toBe('sequelize:batchmeter_checkpoints#1');
    expect(await store.save(checkpoint(4, 'complete'))).toBe('sequelize:batchmeter_checkpoints#2');

    const latest = await store.loadLatest();

    expect(latest).toEqual({ status: 'ok', value: checkpoint(4, 'complete') });
  });

  it('should list checkpoints oldest first', async () => {
    await store.save(checkpoint(2, 'chunk_complete'));
    await store.save(checkpoint(3, 'budget'));

    const history = await store.list();

    expect(history.map((c) => [c.reason, c.processedCount])).toEqual([
      ['chunk_complete', 2],
      ['budget', 3],
    ]);
  });

  it('should degrade when the table cannot be read', async () => {
    const uninitialized = new SequelizeCheckpointStore(db.sequelize, { tablePrefix: 'absent_' });

    const latest = await uninitialized.loadLatest();

    expect(latest.status).toBe('degraded');
    expect(latest.value).toBeNull();
  });
});
