import { readFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { CheckpointStore } from '../../domain/ports/CheckpointStore.js';
import type { Checkpoint } from '../../domain/model/Checkpoint.js';
import { parseCheckpoint } from '../../domain/model/Checkpoint.js';
import type { Loaded } from '../../domain/model/Loaded.js';
import { loadedDegraded, loadedMissing, loadedOk } from '../../domain/model/Loaded.js';
import { formatBatchTimestamp } from '../../domain/services/runId.js';
import { isMissingFile, tryParseJson, writeFileAtomic } from '../files.js';

export interface FileCheckpointStoreOptions {
  /** Directory for checkpoint files. Default: `'state'`. */
  readonly directory?: string;
}

const LATEST_FILE = 'checkpoint_latest.json';
const BACKUP_PATTERN = /^checkpoint_\d{8}_\d{6}_\d{3}_\d{4}\.json$/;

/**
 * Checkpoints as JSON files.
 *
 * Each save writes `checkpoint_latest.json` and a timestamped backup
 * `checkpoint_<YYYYMMDD_HHMMSS_mmm>_<seq>.json`. Backup names sort in
 * write order.
 */
export class FileCheckpointStore implements CheckpointStore {
  private readonly directory: string;
  private sequence = 0;

  constructor(options?: FileCheckpointStoreOptions) {
    this.directory = options?.directory ?? 'state';
  }

  async save(checkpoint: Checkpoint): Promise<string> {
    const content = JSON.stringify(checkpoint, null, 2);
    const latestPath = join(this.directory, LATEST_FILE);
    await writeFileAtomic(join(this.directory, this.backupName(new Date())), content);
    await writeFileAtomic(latestPath, content);
    return latestPath;
  }

  async loadLatest(): Promise<Loaded<Checkpoint | null>> {
    const latestPath = join(this.directory, LATEST_FILE);
    let content: string;
    try {
      content = await readFile(latestPath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return loadedMissing(null);
      return loadedDegraded(null, `Cannot read ${latestPath}: ${error instanceof Error ? error.message : String(error)}`);
    }

    const json = tryParseJson(content);
    if (!json.ok) return loadedDegraded(null, `Corrupt checkpoint ${latestPath}: ${json.reason}`);

    const parsed = parseCheckpoint(json.value);
    if (!parsed.ok) return loadedDegraded(null, `Unrecognized checkpoint ${latestPath}: ${parsed.reason}`);
    return loadedOk(parsed.checkpoint);
  }

  /** Readable backups, oldest first. Unreadable files are left out. */
  async list(): Promise<readonly Checkpoint[]> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    const checkpoints: Checkpoint[] = [];
    for (const name of names.filter((n) => BACKUP_PATTERN.test(n)).sort()) {
      const json = tryParseJson(await readFile(join(this.directory, name), 'utf-8'));
      if (!json.ok) continue;
      const parsed = parseCheckpoint(json.value);
      if (parsed.ok) checkpoints.push(parsed.checkpoint);
    }
    return checkpoints;
  }

  private backupName(date: Date): string {
    this.sequence++;
    const millis = String(date.getMilliseconds()).padStart(3, '0');
    return `checkpoint_${formatBatchTimestamp(date)}_${millis}_${String(this.sequence).padStart(4, '0')}.json`;
  }
}
