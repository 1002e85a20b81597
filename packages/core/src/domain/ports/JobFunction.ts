import type { WorkItem } from '../model/WorkItem.js';
import type { JobOutcome } from '../model/JobOutcome.js';

/** Context passed to the job function for each invocation. */
export interface JobContext {
  readonly batchId: string;
  /** Run id of this attempt, as written to the run log. */
  readonly runId: string;
  /** Zero-based position of the item in the source list. */
  readonly itemIndex: number;
  /** 1-based attempt number when retries are configured. */
  readonly attempt: number;
  /**
   * Report metered usage. Throws `BudgetExceededError` when this call pushes
   * the batch total to or past the budget; the cost is accrued either way.
   */
  record(kind: string, quantity: number): void;
  /** Take a token from the shared limiter of `dependency`. Resolves with the milliseconds waited. */
  acquire(dependency: string): Promise<number>;
}

/**
 * The unit of work. Must not throw for ordinary per-item problems: return
 * `failure(...)` instead. Anything thrown that is not a `FatalJobError` is
 * still treated as a per-item failure.
 *
 * Clients the job talks to are created by the caller and closed over; the
 * orchestrator never sees them.
 */
export type JobFunction = (item: WorkItem, context: JobContext) => Promise<JobOutcome>;
