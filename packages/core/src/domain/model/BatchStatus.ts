/**
 * Finite state machine for the batch lifecycle.
 *
 * Valid transitions:
 * - `PENDING` → `LOADING_ITEMS`
 * - `LOADING_ITEMS` → `CHUNKING` | `DONE` (nothing to do) | `ABORTED` (source failed)
 * - `CHUNKING` → `DISPATCHING` | `DONE`
 * - `DISPATCHING` → `AWAITING_WORKERS`
 * - `AWAITING_WORKERS` → `CHECKPOINTING`
 * - `CHECKPOINTING` → `DISPATCHING` | `DONE` | `ABORTED`
 * - `DONE`, `ABORTED` → (terminal)
 */
export const BatchStatus = {
  PENDING: 'PENDING',
  LOADING_ITEMS: 'LOADING_ITEMS',
  CHUNKING: 'CHUNKING',
  DISPATCHING: 'DISPATCHING',
  AWAITING_WORKERS: 'AWAITING_WORKERS',
  CHECKPOINTING: 'CHECKPOINTING',
  DONE: 'DONE',
  ABORTED: 'ABORTED',
} as const;

export type BatchStatus = (typeof BatchStatus)[keyof typeof BatchStatus];

const VALID_TRANSITIONS: Record<BatchStatus, readonly BatchStatus[]> = {
  [BatchStatus.PENDING]: [BatchStatus.LOADING_ITEMS],
  [BatchStatus.LOADING_ITEMS]: [BatchStatus.CHUNKING, BatchStatus.DONE, BatchStatus.ABORTED],
  [BatchStatus.CHUNKING]: [BatchStatus.DISPATCHING, BatchStatus.DONE],
  [BatchStatus.DISPATCHING]: [BatchStatus.AWAITING_WORKERS],
  [BatchStatus.AWAITING_WORKERS]: [BatchStatus.CHECKPOINTING],
  [BatchStatus.CHECKPOINTING]: [BatchStatus.DISPATCHING, BatchStatus.DONE, BatchStatus.ABORTED],
  [BatchStatus.DONE]: [],
  [BatchStatus.ABORTED]: [],
};

/** Check whether a state transition is valid according to the batch lifecycle FSM. */
export function canTransition(from: BatchStatus, to: BatchStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminalStatus(status: BatchStatus): boolean {
  return status === BatchStatus.DONE || status === BatchStatus.ABORTED;
}
