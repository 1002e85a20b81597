import type { WorkItem } from '../model/WorkItem.js';

/**
 * Port for enumerating the items of one batch invocation.
 *
 * The list is finite and ordered; the orchestrator reads it once, up front.
 */
export interface JobSource {
  load(): Promise<readonly WorkItem[]>;
}
