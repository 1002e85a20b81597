import type { BatchSummary } from './model/Batch.js';
import type { BatchStatus } from './model/BatchStatus.js';

/** Machine-readable error codes. */
export type BatchErrorCode =
  | 'BUDGET_EXCEEDED'
  | 'FATAL_JOB_ERROR'
  | 'BATCH_ABORTED'
  | 'INVALID_TRANSITION'
  | 'INVALID_CONFIG';

/** Base class for errors raised by the orchestrator. */
export class BatchError extends Error {
  readonly code: BatchErrorCode;

  constructor(code: BatchErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Thrown synchronously by `CostMeter.record()` once the total meets or exceeds the budget. */
export class BudgetExceededError extends BatchError {
  readonly currentCost: number;
  readonly budgetLimit: number;

  constructor(currentCost: number, budgetLimit: number) {
    super('BUDGET_EXCEEDED', `Budget exceeded: $${currentCost.toFixed(2)} / $${budgetLimit.toFixed(2)}`);
    this.currentCost = currentCost;
    this.budgetLimit = budgetLimit;
  }
}

/** Thrown by a job function to abort the whole batch. Equivalent to returning `fatal(message)`. */
export class FatalJobError extends BatchError {
  constructor(message: string) {
    super('FATAL_JOB_ERROR', message);
  }
}

/** Rejection of `run()` after a fatal outcome. The chunk in flight has drained and a checkpoint was written. */
export class BatchAbortedError extends BatchError {
  readonly reason: 'fatal_error';
  readonly summary: BatchSummary;
  readonly checkpointLocation: string | undefined;

  constructor(message: string, summary: BatchSummary) {
    super('BATCH_ABORTED', `Batch aborted: ${message}`);
    this.reason = 'fatal_error';
    this.summary = summary;
    this.checkpointLocation = summary.checkpointLocation;
  }
}

export class InvalidTransitionError extends BatchError {
  constructor(from: BatchStatus, to: BatchStatus) {
    super('INVALID_TRANSITION', `Invalid state transition: ${from} → ${to}`);
  }
}

/** Raised when runner options fail validation. Lists every issue. */
export class ConfigError extends BatchError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super('INVALID_CONFIG', `Invalid batch configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/** Render an unknown thrown value as a message. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
