import type { BatchProgress, BatchSummary } from '../model/Batch.js';
import type { CheckpointReason } from '../model/Checkpoint.js';

/** Emitted once the source has been read and filtered. */
export interface BatchStartedEvent {
  readonly type: 'batch:started';
  readonly batchId: string;
  readonly totalItems: number;
  readonly queuedItems: number;
  readonly totalChunks: number;
  readonly timestamp: number;
}

/** Emitted when every queued item has been processed, or when there was nothing to do. */
export interface BatchCompletedEvent {
  readonly type: 'batch:completed';
  readonly batchId: string;
  readonly summary: BatchSummary;
  readonly timestamp: number;
}

/** Emitted when the batch stops early on a budget or fatal condition. */
export interface BatchAbortedEvent {
  readonly type: 'batch:aborted';
  readonly batchId: string;
  readonly reason: 'budget' | 'fatal_error' | 'source_error';
  readonly error: string;
  readonly summary?: BatchSummary;
  readonly timestamp: number;
}

/** Emitted when a chunk is handed to the worker pool. */
export interface ChunkStartedEvent {
  readonly type: 'chunk:started';
  readonly batchId: string;
  readonly chunkIndex: number;
  readonly itemCount: number;
  readonly timestamp: number;
}

/** Emitted after every worker of a chunk has returned. */
export interface ChunkCompletedEvent {
  readonly type: 'chunk:completed';
  readonly batchId: string;
  readonly chunkIndex: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly progress: BatchProgress;
  readonly timestamp: number;
}

/** Emitted for each item the registry filter lets through untouched. */
export interface ItemSkippedEvent {
  readonly type: 'item:skipped';
  readonly batchId: string;
  readonly identity: string;
  readonly reason: string;
  readonly timestamp: number;
}

/** Emitted when a worker picks up an item. */
export interface ItemStartedEvent {
  readonly type: 'item:started';
  readonly batchId: string;
  readonly identity: string;
  readonly runId: string;
  /** Why the registry queued it (`new_item`, `inputs_changed`, ...). */
  readonly reason: string;
  readonly timestamp: number;
}

export interface ItemSucceededEvent {
  readonly type: 'item:succeeded';
  readonly batchId: string;
  readonly identity: string;
  readonly runId: string;
  readonly durationMs: number;
  readonly timestamp: number;
}

export interface ItemFailedEvent {
  readonly type: 'item:failed';
  readonly batchId: string;
  readonly identity: string;
  readonly runId: string;
  readonly error: string;
  readonly fatal: boolean;
  readonly durationMs: number;
  readonly timestamp: number;
}

/** Emitted when a failed attempt is about to be retried. */
export interface ItemRetriedEvent {
  readonly type: 'item:retried';
  readonly batchId: string;
  readonly identity: string;
  /** Attempt that just failed (1-based). */
  readonly attempt: number;
  readonly maxRetries: number;
  readonly error: string;
  readonly timestamp: number;
}

export interface CheckpointSavedEvent {
  readonly type: 'checkpoint:saved';
  readonly batchId: string;
  readonly reason: CheckpointReason;
  readonly processedCount: number;
  /** Absent when the store failed; the batch carries on. */
  readonly location?: string;
  readonly timestamp: number;
}

/** Emitted by the cost meter at the record that crosses the budget. */
export interface BudgetExceededEvent {
  readonly type: 'budget:exceeded';
  readonly total: number;
  readonly budgetLimit: number;
  readonly kind: string;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | BatchStartedEvent
  | BatchCompletedEvent
  | BatchAbortedEvent
  | ChunkStartedEvent
  | ChunkCompletedEvent
  | ItemSkippedEvent
  | ItemStartedEvent
  | ItemSucceededEvent
  | ItemFailedEvent
  | ItemRetriedEvent
  | CheckpointSavedEvent
  | BudgetExceededEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
