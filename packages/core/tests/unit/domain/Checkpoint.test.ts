import { describe, it, expect } from 'vitest';
import { parseCheckpoint } from '../../../src/domain/model/Checkpoint.js';

const valid = {
  version: 1,
  batchId: 'batch-1',
  timestamp: '2026-01-01T00:00:00.000Z',
  processedCount: 1,
  results: { success: [{ identity: 'a', runId: 'run-a', durationMs: 5 }], failed: [], skipped: [] },
  totalCost: 0.1,
  reason: 'complete',
};

describe('parseCheckpoint', () => {
  it('should accept a well-formed checkpoint', () => {
    expect(parseCheckpoint(valid)).toEqual({ ok: true, checkpoint: valid });
  });

  it('should report what is wrong', () => {
    const parsed = parseCheckpoint({ ...valid, reason: 'paused', processedCount: -1 });

    expect(parsed.ok).toBe(false);
    if (!parsed.ok) {
      expect(parsed.reason).toContain('processedCount');
      expect(parsed.reason).toContain('reason');
    }
  });
});
