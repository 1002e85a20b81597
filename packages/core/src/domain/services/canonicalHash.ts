import { createHash } from 'node:crypto';
import type { ItemPayload } from '../model/WorkItem.js';

type Canonical = string | number | boolean | Canonical[] | CanonicalObject;

interface CanonicalObject {
  [key: string]: Canonical;
}

interface Separators {
  readonly item: string;
  readonly key: string;
}

const COMPACT: Separators = { item: ',', key: ':' };
/** Registries written before the versioned format hashed with spaced separators. */
const SPACED: Separators = { item: ', ', key: ': ' };

const CIRCULAR = '[Circular]';

function byKey(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function hasToJSON(value: object): value is { toJSON(): unknown } {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}

/**
 * Reduce a payload value to plain JSON data.
 *
 * Strings are trimmed, `null` and `undefined` become `''`, object keys are
 * sorted recursively. Array order is significant. Dates hash by their ISO
 * form, bigints by their digits, Map entries and Set members in sorted
 * order. A reference back to an enclosing object becomes a marker.
 */
function normalize(value: unknown, ancestors: readonly object[]): Canonical {
  switch (typeof value) {
    case 'undefined':
      return '';
    case 'string':
      return value.trim();
    case 'number':
      return Number.isFinite(value) ? value : String(value);
    case 'boolean':
      return value;
    case 'bigint':
      return value.toString();
    case 'symbol':
      return value.description ?? '';
    case 'function':
      return '';
  }
  if (value === null || typeof value !== 'object') return '';
  if (ancestors.includes(value)) return CIRCULAR;

  const path = [...ancestors, value];
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map((inner: unknown) => normalize(inner, path));
  }
  if (value instanceof Map) {
    const pairs: Canonical[][] = [];
    for (const [key, inner] of value) {
      pairs.push([normalize(key, path), normalize(inner, path)]);
    }
    return pairs.sort((a, b) => byKey(serialize(a[0] ?? '', COMPACT), serialize(b[0] ?? '', COMPACT)));
  }
  if (value instanceof Set) {
    const members: Canonical[] = [];
    for (const inner of value) {
      members.push(normalize(inner, path));
    }
    return members.sort((a, b) => byKey(serialize(a, COMPACT), serialize(b, COMPACT)));
  }
  if (hasToJSON(value)) {
    return normalize(value.toJSON(), path);
  }

  const entries: Array<[string, unknown]> = Object.entries(value);
  entries.sort(([a], [b]) => byKey(a, b));
  const out: CanonicalObject = {};
  for (const [key, inner] of entries) {
    out[key] = normalize(inner, path);
  }
  return out;
}

function serialize(value: Canonical, separators: Separators): string {
  if (typeof value === 'string' || typeof value === 'number') return JSON.stringify(value);
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (Array.isArray(value)) {
    return `[${value.map((inner) => serialize(inner, separators)).join(separators.item)}]`;
  }
  const fields = Object.keys(value).map(
    (key) => `${JSON.stringify(key)}${separators.key}${serialize(value[key] ?? '', separators)}`,
  );
  return `{${fields.join(separators.item)}}`;
}

function sha256(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

/** Stable, field-order-independent serialization of a payload. */
export function canonicalize(payload: ItemPayload): string {
  return serialize(normalize(payload, []), COMPACT);
}

/** SHA-256 (hex) of the canonical serialization. */
export function canonicalHash(payload: ItemPayload): string {
  return sha256(canonicalize(payload));
}

/** Hash in the spaced format of unversioned registries, so migrated records still match. */
export function legacyCanonicalHash(payload: ItemPayload): string {
  return sha256(serialize(normalize(payload, []), SPACED));
}
