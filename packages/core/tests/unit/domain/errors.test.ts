import { describe, it, expect } from 'vitest';
import {
  BatchAbortedError,
  BatchError,
  BudgetExceededError,
  ConfigError,
  FatalJobError,
  InvalidTransitionError,
  describeError,
} from '../../../src/domain/errors.js';
import type { BatchSummary } from '../../../src/domain/model/Batch.js';

const summary: BatchSummary = {
  batchId: 'batch-1',
  status: 'ABORTED',
  stopReason: 'fatal_error',
  total: 3,
  processed: 2,
  succeeded: 1,
  failed: 1,
  skipped: 0,
  elapsedMs: 100,
  cost: { entries: {}, total: 0 },
  failures: [],
  skips: [],
  checkpointLocation: 'state/checkpoint_latest.json',
  error: 'API key revoked',
  logLocations: [],
};

describe('errors', () => {
  it('should carry codes and names', () => {
    const error = new BudgetExceededError(1.234, 1);

    expect(error).toBeInstanceOf(BatchError);
    expect(error.code).toBe('BUDGET_EXCEEDED');
    expect(error.name).toBe('BudgetExceededError');
    expect(error.message).toBe('Budget exceeded: $1.23 / $1.00');
    expect(new FatalJobError('quota gone').code).toBe('FATAL_JOB_ERROR');
  });

  it('should attach the summary and checkpoint to BatchAbortedError', () => {
    const error = new BatchAbortedError('API key revoked', summary);

    expect(error.message).toBe('Batch aborted: API key revoked');
    expect(error.reason).toBe('fatal_error');
    expect(error.summary).toBe(summary);
    expect(error.checkpointLocation).toBe('state/checkpoint_latest.json');
  });

  it('should describe transitions and config issues', () => {
    expect(new InvalidTransitionError('DONE', 'DISPATCHING').message).toBe(
      'Invalid state transition: DONE → DISPATCHING',
    );
    const config = new ConfigError(['workers: too small', 'chunkSize: required']);
    expect(config.issues).toEqual(['workers: too small', 'chunkSize: required']);
    expect(config.message).toBe('Invalid batch configuration: workers: too small; chunkSize: required');
  });

  it('should describe unknown thrown values', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain string')).toBe('plain string');
    expect(describeError(42)).toBe('42');
  });
});
