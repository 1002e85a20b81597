import type { CheckpointStore } from '../../domain/ports/CheckpointStore.js';
import type { Checkpoint } from '../../domain/model/Checkpoint.js';
import type { Loaded } from '../../domain/model/Loaded.js';
import { loadedMissing, loadedOk } from '../../domain/model/Loaded.js';

/** Non-persistent checkpoint store. */
export class InMemoryCheckpointStore implements CheckpointStore {
  private readonly history: Checkpoint[] = [];

  save(checkpoint: Checkpoint): Promise<string> {
    this.history.push(checkpoint);
    return Promise.resolve(`memory:${String(this.history.length - 1)}`);
  }

  loadLatest(): Promise<Loaded<Checkpoint | null>> {
    const latest = this.history[this.history.length - 1];
    return Promise.resolve(latest ? loadedOk(latest) : loadedMissing(null));
  }

  list(): Promise<readonly Checkpoint[]> {
    return Promise.resolve([...this.history]);
  }
}
