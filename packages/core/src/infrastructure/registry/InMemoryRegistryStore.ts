import type { RegistryStore, RegistryChange } from '../../domain/ports/RegistryStore.js';
import type { RegistryRecord } from '../../domain/model/RegistryRecord.js';
import type { Loaded } from '../../domain/model/Loaded.js';
import { loadedMissing, loadedOk } from '../../domain/model/Loaded.js';

/**
 * Non-persistent registry store. Survives across runners that share the
 * instance, which is enough for tests and single-process embedding.
 */
export class InMemoryRegistryStore implements RegistryStore {
  private records = new Map<string, RegistryRecord>();
  private written = false;

  constructor(initial: readonly RegistryRecord[] = []) {
    for (const record of initial) {
      this.records.set(record.identity, record);
    }
    this.written = initial.length > 0;
  }

  load(): Promise<Loaded<readonly RegistryRecord[]>> {
    const records = [...this.records.values()];
    return Promise.resolve(this.written ? loadedOk(records) : loadedMissing(records));
  }

  persist(change: RegistryChange, _snapshot: readonly RegistryRecord[]): Promise<void> {
    switch (change.kind) {
      case 'upsert':
        this.records.set(change.record.identity, change.record);
        break;
      case 'delete':
        this.records.delete(change.identity);
        break;
      case 'clear':
        this.records = new Map();
        break;
    }
    this.written = true;
    return Promise.resolve();
  }

  describe(): string {
    return 'memory';
  }
}
