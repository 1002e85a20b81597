import type { JobSource } from '../../domain/ports/JobSource.js';
import type { WorkItem } from '../../domain/model/WorkItem.js';

/** Serves a fixed in-memory list. */
export class ArrayItemSource implements JobSource {
  constructor(private readonly items: readonly WorkItem[]) {}

  load(): Promise<readonly WorkItem[]> {
    return Promise.resolve([...this.items]);
  }
}
