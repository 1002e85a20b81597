import type { WorkItem } from '@batchmeter/core';
import { createWorkItem } from '@batchmeter/core';
import type { RawRow } from './RawRow.js';

/**
 * How a row becomes a work item.
 *
 * The payload is what the registry hashes, so list only the fields whose
 * change should make the item run again. Meta fields travel with the item
 * but never affect the hash.
 */
export interface ItemMapping {
  /** Column holding the item identity. Values are trimmed. */
  readonly identityField: string;
  /** Columns copied into the payload. Default: every column not listed in `metaFields`. */
  readonly payloadFields?: readonly string[];
  /** Columns copied into `meta`. */
  readonly metaFields?: readonly string[];
}

export function readIdentity(row: RawRow, field: string): string {
  const value = row[field];
  if (value === undefined || value === null) return '';
  return (typeof value === 'string' ? value : String(value)).trim();
}

/**
 * Build a work item from a row, or `null` when the identity is empty.
 *
 * `meta.rowNumber` is always set and wins over a column of the same name.
 */
export function toWorkItem(row: RawRow, mapping: ItemMapping, rowNumber: number): WorkItem | null {
  const identity = readIdentity(row, mapping.identityField);
  if (identity === '') return null;

  const metaFields = mapping.metaFields ?? [];
  const payloadFields = mapping.payloadFields ?? Object.keys(row).filter((key) => !metaFields.includes(key));

  const payload: Record<string, unknown> = {};
  for (const field of payloadFields) {
    payload[field] = row[field];
  }

  const meta: Record<string, unknown> = {};
  for (const field of metaFields) {
    meta[field] = row[field];
  }
  meta['rowNumber'] = rowNumber;

  return createWorkItem(identity, payload, meta);
}
