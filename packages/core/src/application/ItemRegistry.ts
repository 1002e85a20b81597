import type { ItemPayload } from '../domain/model/WorkItem.js';
import type { RegistryRecord } from '../domain/model/RegistryRecord.js';
import { MAX_ERROR_LENGTH, compact } from '../domain/model/RegistryRecord.js';
import type { Loaded } from '../domain/model/Loaded.js';
import { loadedDegraded } from '../domain/model/Loaded.js';
import type { RegistryChange, RegistryStore } from '../domain/ports/RegistryStore.js';
import type { Logger } from '../domain/ports/Logger.js';
import { silentLogger } from '../domain/ports/Logger.js';
import { describeError } from '../domain/errors.js';
import { canonicalHash, legacyCanonicalHash } from '../domain/services/canonicalHash.js';
import { Mutex } from './Mutex.js';

/** Why an item is, or is not, queued for processing. */
export type ProcessingReason = 'forced' | 'new_item' | 'inputs_changed' | 'retry_failed' | 'already_processed';

export interface ProcessingDecision {
  readonly needed: boolean;
  readonly reason: ProcessingReason;
}

export interface RegistryStats {
  readonly total: number;
  readonly success: number;
  readonly failed: number;
}

export interface ItemRegistryOptions {
  readonly logger?: Logger;
  /** Wall clock for record timestamps. */
  readonly now?: () => Date;
}

/**
 * Durable per-item processing history.
 *
 * Held in memory for the batch and written through to the store on every
 * mutation. Mutations are serialized; store failures become warnings so that
 * a broken disk never fails an item that has already run.
 */
export class ItemRegistry {
  private readonly records = new Map<string, RegistryRecord>();
  private readonly mutex = new Mutex();
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly store: RegistryStore,
    options: ItemRegistryOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  /** Replace the in-memory state with the store's contents. Never throws. */
  async load(): Promise<Loaded<readonly RegistryRecord[]>> {
    let loaded: Loaded<readonly RegistryRecord[]>;
    try {
      loaded = await this.store.load();
    } catch (error) {
      loaded = loadedDegraded([], describeError(error));
    }

    this.records.clear();
    for (const record of loaded.value) {
      this.records.set(record.identity, record);
    }

    if (loaded.status === 'degraded') {
      this.logger.warn('Registry could not be read, starting empty', {
        location: this.store.describe(),
        diagnostic: loaded.diagnostic,
      });
    }
    return loaded;
  }

  /**
   * Decide whether an item must run.
   *
   * Precedence: force, unknown identity, changed inputs, previous failure.
   * Inputs that cannot be hashed always count as changed.
   */
  needsProcessing(identity: string, payload: ItemPayload, force = false): ProcessingDecision {
    if (force) return { needed: true, reason: 'forced' };

    const record = this.records.get(identity);
    if (!record) return { needed: true, reason: 'new_item' };
    if (!this.inputsMatch(record, payload)) return { needed: true, reason: 'inputs_changed' };
    if (record.status === 'failed') return { needed: true, reason: 'retry_failed' };
    return { needed: false, reason: 'already_processed' };
  }

  recordSuccess(
    identity: string,
    payload: ItemPayload,
    runId: string,
    outputs?: Readonly<Record<string, string>>,
  ): Promise<RegistryRecord> {
    return this.mutate(identity, () =>
      compact({
        identity,
        lastInputHash: this.hashOf(identity, payload),
        status: 'success',
        lastSuccessAt: this.now().toISOString(),
        lastRunId: runId,
        lastOutputs: outputs && Object.keys(outputs).length > 0 ? outputs : undefined,
      }),
    );
  }

  recordFailure(identity: string, payload: ItemPayload, runId: string, error: string): Promise<RegistryRecord> {
    return this.mutate(identity, (previous) =>
      compact({
        identity,
        lastInputHash: this.hashOf(identity, payload),
        status: 'failed',
        lastSuccessAt: previous?.lastSuccessAt,
        lastFailureAt: this.now().toISOString(),
        lastRunId: runId,
        lastError: error.slice(0, MAX_ERROR_LENGTH),
      }),
    );
  }

  get(identity: string): RegistryRecord | undefined {
    return this.records.get(identity);
  }

  /** All records, in insertion order. */
  entries(): readonly RegistryRecord[] {
    return [...this.records.values()];
  }

  get size(): number {
    return this.records.size;
  }

  stats(): RegistryStats {
    let success = 0;
    let failed = 0;
    for (const record of this.records.values()) {
      if (record.status === 'success') success++;
      else failed++;
    }
    return { total: this.records.size, success, failed };
  }

  /** Forget one identity, or everything when none is given. */
  reset(identity?: string): Promise<void> {
    return this.mutex.runExclusive(async () => {
      let change: RegistryChange;
      if (identity === undefined) {
        this.records.clear();
        change = { kind: 'clear' };
      } else {
        if (!this.records.delete(identity)) return;
        change = { kind: 'delete', identity };
      }
      await this.persist(change);
    });
  }

  /** Matches either hash format; records migrated from an unversioned registry carry the spaced one. */
  private inputsMatch(record: RegistryRecord, payload: ItemPayload): boolean {
    try {
      return (
        record.lastInputHash === canonicalHash(payload) || record.lastInputHash === legacyCanonicalHash(payload)
      );
    } catch (error) {
      this.logger.warn('Cannot hash item inputs', { identity: record.identity, error: describeError(error) });
      return false;
    }
  }

  /** `''` when the payload cannot be hashed, which no digest equals. */
  private hashOf(identity: string, payload: ItemPayload): string {
    try {
      return canonicalHash(payload);
    } catch (error) {
      this.logger.warn('Cannot hash item inputs', { identity, error: describeError(error) });
      return '';
    }
  }

  /** Build the next record from the current one, under the lock, then write through. */
  private mutate(
    identity: string,
    build: (previous: RegistryRecord | undefined) => RegistryRecord,
  ): Promise<RegistryRecord> {
    return this.mutex.runExclusive(async () => {
      const record = build(this.records.get(identity));
      this.records.set(record.identity, record);
      await this.persist({ kind: 'upsert', record });
      return record;
    });
  }

  private async persist(change: RegistryChange): Promise<void> {
    try {
      await this.store.persist(change, this.entries());
    } catch (error) {
      this.logger.warn('Failed to persist registry', {
        location: this.store.describe(),
        error: describeError(error),
      });
    }
  }
}
