import type { RegistryRecord } from '../model/RegistryRecord.js';
import type { Loaded } from '../model/Loaded.js';

/** A single mutation of the registry, for stores that can apply changes incrementally. */
export type RegistryChange =
  | { readonly kind: 'upsert'; readonly record: RegistryRecord }
  | { readonly kind: 'delete'; readonly identity: string }
  | { readonly kind: 'clear' };

/**
 * Port for persisting the item registry.
 *
 * `load()` never throws: a missing store yields `missing`, an unreadable one
 * yields `degraded` with an empty list. `persist()` receives both the change
 * and the full post-change snapshot; file-backed stores rewrite the snapshot,
 * row-backed stores apply the change. It may throw; the registry logs and
 * carries on.
 */
export interface RegistryStore {
  load(): Promise<Loaded<readonly RegistryRecord[]>>;
  persist(change: RegistryChange, snapshot: readonly RegistryRecord[]): Promise<void>;
  /** Human-readable location, for logs. */
  describe(): string;
}
