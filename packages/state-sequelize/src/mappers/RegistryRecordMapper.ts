import { z } from 'zod';
import type { RegistryRecord } from '@batchmeter/core';
import { compact } from '@batchmeter/core';
import type { RegistryRow } from '../models/RegistryRecordModel.js';
import { parseJsonColumn } from '../utils/parseJsonColumn.js';

const RegistryRowSchema = z.object({
  identity: z.string(),
  lastInputHash: z.string(),
  status: z.enum(['success', 'failed']),
  lastSuccessAt: z.string().nullable(),
  lastFailureAt: z.string().nullable(),
  lastRunId: z.string(),
  lastError: z.string().nullable(),
  lastOutputs: z.preprocess(parseJsonColumn, z.record(z.string()).nullable()),
});

export function toRow(record: RegistryRecord): RegistryRow {
  return {
    identity: record.identity,
    lastInputHash: record.lastInputHash,
    status: record.status,
    lastSuccessAt: record.lastSuccessAt ?? null,
    lastFailureAt: record.lastFailureAt ?? null,
    lastRunId: record.lastRunId,
    lastError: record.lastError ?? null,
    lastOutputs: record.lastOutputs ?? null,
  };
}

/** Map a row back to a record, or explain why it cannot be read. */
export function toDomain(row: RegistryRow): { ok: true; record: RegistryRecord } | { ok: false; reason: string } {
  const parsed = RegistryRowSchema.safeParse(row);
  if (!parsed.success) {
    return { ok: false, reason: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ') };
  }

  const data = parsed.data;
  return {
    ok: true,
    record: compact({
      identity: data.identity,
      lastInputHash: data.lastInputHash,
      status: data.status,
      lastSuccessAt: data.lastSuccessAt ?? undefined,
      lastFailureAt: data.lastFailureAt ?? undefined,
      lastRunId: data.lastRunId,
      lastError: data.lastError ?? undefined,
      lastOutputs: data.lastOutputs ?? undefined,
    }),
  };
}
