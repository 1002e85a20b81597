import { describe, it, expect } from 'vitest';
import { loadBatchOptionsFromEnv, parseBatchOptions } from '../../../src/config/BatchOptions.js';
import { createFileStores } from '../../../src/config/fileStores.js';
import { ConfigError } from '../../../src/domain/errors.js';
import { join } from 'node:path';

describe('parseBatchOptions', () => {
  it('should apply defaults', () => {
    expect(parseBatchOptions({})).toEqual({
      workers: 4,
      chunkSize: 50,
      prices: {},
      rateLimits: {},
      preAcquire: [],
      force: false,
      maxRetries: 0,
      retryDelayMs: 1000,
    });
  });

  it('should keep provided values', () => {
    const options = parseBatchOptions({
      workers: 2,
      chunkSize: 10,
      budgetLimit: 5,
      prices: { llm_call: 0.02 },
      rateLimits: { llm: { capacity: 5, refillRate: 2 } },
      preAcquire: ['llm'],
      limit: 3,
    });

    expect(options).toMatchObject({ workers: 2, chunkSize: 10, budgetLimit: 5, limit: 3, preAcquire: ['llm'] });
  });

  it('should list every issue in one ConfigError', () => {
    let caught: unknown;
    try {
      parseBatchOptions({ workers: 0, chunkSize: 1.5, prices: { call: -1 } });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues).toHaveLength(3);
      expect(caught.issues[0]).toMatch(/^workers: /);
      expect(caught.issues[1]).toMatch(/^chunkSize: /);
      expect(caught.issues[2]).toMatch(/^prices\.call: /);
    }
  });

  it('should require a rate limit for every pre-acquired dependency', () => {
    expect(() => parseBatchOptions({ preAcquire: ['search'] })).toThrow(
      "Invalid batch configuration: preAcquire: No rate limit configured for 'search'",
    );
  });
});

describe('loadBatchOptionsFromEnv', () => {
  it('should read only the variables that are set', () => {
    const env = loadBatchOptionsFromEnv({
      BATCH_WORKERS: '8',
      BATCH_BUDGET_LIMIT: '12.5',
      BATCH_FORCE: 'true',
      BATCH_LIMIT: '',
      PATH: '/usr/bin',
    });

    expect(env).toEqual({
      options: { workers: 8, budgetLimit: 12.5, force: true },
      stateDir: 'state',
      logDir: 'logs',
    });
  });

  it('should read directories and numeric limits', () => {
    const env = loadBatchOptionsFromEnv({
      BATCH_CHUNK_SIZE: '25',
      BATCH_LIMIT: '5',
      BATCH_MAX_RETRIES: '2',
      BATCH_FORCE: '0',
      BATCH_STATE_DIR: '/var/lib/batch',
      BATCH_LOG_DIR: '/var/log/batch',
    });

    expect(env).toEqual({
      options: { chunkSize: 25, limit: 5, maxRetries: 2, force: false },
      stateDir: '/var/lib/batch',
      logDir: '/var/log/batch',
    });
  });

  it('should reject malformed values', () => {
    expect(() => loadBatchOptionsFromEnv({ BATCH_WORKERS: 'many' })).toThrow(ConfigError);
    expect(() => loadBatchOptionsFromEnv({ BATCH_FORCE: 'maybe' })).toThrow(ConfigError);
  });
});

describe('createFileStores', () => {
  it('should lay files out under the state and log directories', () => {
    const stores = createFileStores({ stateDir: 'state', logDir: 'logs' });

    expect(stores.registryStore.describe()).toBe(join('state', 'registry.json'));
    expect(stores.runLogSinks[0]?.describe()).toBe(join('logs', 'batch_<YYYYMMDD>.log'));
    expect(stores.runLogSinks[1]?.describe()).toMatch(/run_\d{8}_\d{6}\.jsonl$/);
  });

  it('should name the JSON Lines file after the batch timestamp it returns', () => {
    const stores = createFileStores({ stateDir: 'state', logDir: 'logs', startedAt: new Date(2026, 0, 2, 3, 4, 5) });

    expect(stores.batchTimestamp).toBe('20260102_030405');
    expect(stores.runLogSinks[1]?.describe()).toBe(join('logs', 'run_20260102_030405.jsonl'));
  });
});
