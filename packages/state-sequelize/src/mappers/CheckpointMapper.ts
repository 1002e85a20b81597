import type { Checkpoint } from '@batchmeter/core';
import { CHECKPOINT_FORMAT_VERSION, parseCheckpoint } from '@batchmeter/core';
import type { CheckpointCreationRow, CheckpointRow } from '../models/CheckpointModel.js';
import { parseJsonColumn } from '../utils/parseJsonColumn.js';

export function toRow(checkpoint: Checkpoint): CheckpointCreationRow {
  return {
    batchId: checkpoint.batchId,
    reason: checkpoint.reason,
    processedCount: checkpoint.processedCount,
    totalCost: checkpoint.totalCost,
    timestamp: checkpoint.timestamp,
    results: checkpoint.results,
  };
}

export function toDomain(row: CheckpointRow): ReturnType<typeof parseCheckpoint> {
  return parseCheckpoint({
    version: CHECKPOINT_FORMAT_VERSION,
    batchId: row.batchId,
    timestamp: row.timestamp,
    processedCount: row.processedCount,
    results: parseJsonColumn(row.results),
    totalCost: Number(row.totalCost),
    reason: row.reason,
  });
}
