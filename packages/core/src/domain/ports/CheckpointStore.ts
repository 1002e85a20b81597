import type { Checkpoint } from '../model/Checkpoint.js';
import type { Loaded } from '../model/Loaded.js';

/**
 * Port for persisting checkpoints: a "latest" snapshot plus a history of
 * timestamped backups.
 */
export interface CheckpointStore {
  /** Persist a checkpoint. Resolves with the location of the latest snapshot. */
  save(checkpoint: Checkpoint): Promise<string>;
  /** Most recent checkpoint, or `null` inside `missing` when none was written yet. */
  loadLatest(): Promise<Loaded<Checkpoint | null>>;
  /** Historical checkpoints, oldest first. */
  list(): Promise<readonly Checkpoint[]>;
}
