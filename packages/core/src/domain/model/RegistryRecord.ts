import { z } from 'zod';

/** Outcome of the most recent attempt for an item. */
export type RegistryStatus = 'success' | 'failed';

/** Persisted processing history of one item. */
export interface RegistryRecord {
  readonly identity: string;
  /** Canonical hash of the inputs of the most recent attempt, successful or not. */
  readonly lastInputHash: string;
  readonly status: RegistryStatus;
  /** ISO-8601. Survives later failures. */
  readonly lastSuccessAt?: string;
  /** ISO-8601. Cleared by a later success. */
  readonly lastFailureAt?: string;
  readonly lastRunId: string;
  /** Truncated to `MAX_ERROR_LENGTH` characters. */
  readonly lastError?: string;
  readonly lastOutputs?: Readonly<Record<string, string>>;
}

export const REGISTRY_FORMAT_VERSION = 1;
export const MAX_ERROR_LENGTH = 500;

const RegistryRecordSchema = z.object({
  identity: z.string(),
  lastInputHash: z.string(),
  status: z.enum(['success', 'failed']),
  lastSuccessAt: z.string().optional(),
  lastFailureAt: z.string().optional(),
  lastRunId: z.string(),
  lastError: z.string().optional(),
  lastOutputs: z.record(z.string()).optional(),
});

/** Current on-disk envelope. */
export const RegistryFileSchema = z.object({
  version: z.literal(REGISTRY_FORMAT_VERSION),
  records: z.record(RegistryRecordSchema),
});

export type RegistryFile = z.infer<typeof RegistryFileSchema>;

/**
 * Unversioned layout written by earlier tooling: an open map keyed by
 * identity with snake_case fields and `last_fail_at` / `outputs` names.
 */
const LegacyRecordSchema = z.object({
  last_input_hash: z.string(),
  status: z.enum(['success', 'failed']),
  last_success_at: z.string().optional(),
  last_fail_at: z.string().optional(),
  last_run_id: z.string(),
  last_error: z.string().optional(),
  outputs: z.record(z.string()).optional(),
});

const LegacyRegistrySchema = z.record(LegacyRecordSchema);

export type ParsedRegistry =
  | { readonly ok: true; readonly records: readonly RegistryRecord[]; readonly migrated: boolean }
  | { readonly ok: false; readonly reason: string };

/**
 * Parse a registry document of any known version.
 *
 * Migration path: unversioned legacy maps are converted field by field to
 * version 1; anything else must match the current envelope.
 */
export function parseRegistryDocument(raw: unknown): ParsedRegistry {
  if (isObject(raw) && typeof raw['version'] === 'number') {
    const current = RegistryFileSchema.safeParse(raw);
    if (!current.success) {
      return { ok: false, reason: formatIssues(current.error) };
    }
    return {
      ok: true,
      records: Object.entries(current.data.records).map(([identity, r]) => compact({ ...r, identity })),
      migrated: false,
    };
  }

  const legacy = LegacyRegistrySchema.safeParse(raw);
  if (!legacy.success) {
    return { ok: false, reason: formatIssues(legacy.error) };
  }

  const records = Object.entries(legacy.data).map(([identity, r]) =>
    compact({
      identity,
      lastInputHash: r.last_input_hash,
      status: r.status,
      lastSuccessAt: r.last_success_at,
      lastFailureAt: r.last_fail_at,
      lastRunId: r.last_run_id,
      lastError: r.last_error,
      lastOutputs: r.outputs,
    }),
  );
  return { ok: true, records, migrated: true };
}

/** Serialize records into the current envelope. */
export function toRegistryDocument(records: Iterable<RegistryRecord>): RegistryFile {
  const out: Record<string, RegistryRecord> = {};
  for (const record of records) {
    out[record.identity] = record;
  }
  return { version: REGISTRY_FORMAT_VERSION, records: out };
}

/** Drop keys whose value is `undefined` so records compare and serialize cleanly. */
export function compact(record: {
  identity: string;
  lastInputHash: string;
  status: RegistryStatus;
  lastSuccessAt?: string | undefined;
  lastFailureAt?: string | undefined;
  lastRunId: string;
  lastError?: string | undefined;
  lastOutputs?: Readonly<Record<string, string>> | undefined;
}): RegistryRecord {
  const { lastSuccessAt, lastFailureAt, lastError, lastOutputs, ...required } = record;
  return {
    ...required,
    ...(lastSuccessAt !== undefined ? { lastSuccessAt } : {}),
    ...(lastFailureAt !== undefined ? { lastFailureAt } : {}),
    ...(lastError !== undefined ? { lastError } : {}),
    ...(lastOutputs !== undefined ? { lastOutputs } : {}),
  };
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
}
