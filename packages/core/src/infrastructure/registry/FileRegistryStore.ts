import { readFile } from 'node:fs/promises';
import type { RegistryStore, RegistryChange } from '../../domain/ports/RegistryStore.js';
import type { RegistryRecord } from '../../domain/model/RegistryRecord.js';
import { parseRegistryDocument, toRegistryDocument } from '../../domain/model/RegistryRecord.js';
import type { Loaded } from '../../domain/model/Loaded.js';
import { loadedDegraded, loadedMissing, loadedOk } from '../../domain/model/Loaded.js';
import { isMissingFile, tryParseJson, writeFileAtomic } from '../files.js';

export interface FileRegistryStoreOptions {
  /** Path of the registry document. Default: `'state/registry.json'`. */
  readonly filePath?: string;
}

/**
 * Registry persisted as one JSON document, rewritten in full on every change.
 *
 * Reads the current `{ version, records }` envelope as well as the older
 * unversioned map; the next write upgrades the file.
 */
export class FileRegistryStore implements RegistryStore {
  private readonly filePath: string;

  constructor(options?: FileRegistryStoreOptions) {
    this.filePath = options?.filePath ?? 'state/registry.json';
  }

  async load(): Promise<Loaded<readonly RegistryRecord[]>> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return loadedMissing([]);
      return loadedDegraded([], `Cannot read ${this.filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }

    const json = tryParseJson(content);
    if (!json.ok) {
      return loadedDegraded([], `Corrupt registry ${this.filePath}: ${json.reason}`);
    }

    const parsed = parseRegistryDocument(json.value);
    if (!parsed.ok) {
      return loadedDegraded([], `Unrecognized registry ${this.filePath}: ${parsed.reason}`);
    }
    return loadedOk(parsed.records);
  }

  async persist(_change: RegistryChange, snapshot: readonly RegistryRecord[]): Promise<void> {
    await writeFileAtomic(this.filePath, JSON.stringify(toRegistryDocument(snapshot), null, 2));
  }

  describe(): string {
    return this.filePath;
  }
}
