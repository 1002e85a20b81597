/** Identifying data of a work item. Fed to the canonical hash. */
export interface ItemPayload {
  readonly [key: string]: unknown;
}

/** A single unit of work, identified by a stable key. */
export interface WorkItem {
  /** Unique within a batch. Also the registry key. */
  readonly identity: string;
  /** Identifying inputs. A change here makes the item eligible for re-processing. */
  readonly payload: ItemPayload;
  /** Carried along to the job function and the logs but never hashed (e.g. a source row number). */
  readonly meta?: Readonly<Record<string, unknown>>;
}

/** Create a work item. `meta` is omitted from the result when not provided. */
export function createWorkItem(
  identity: string,
  payload: ItemPayload,
  meta?: Readonly<Record<string, unknown>>,
): WorkItem {
  return meta !== undefined ? { identity, payload, meta } : { identity, payload };
}
