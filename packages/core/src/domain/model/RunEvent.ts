/** Kind of a run-log event. `start` is followed by exactly one of the other three. */
export type RunEventKind = 'start' | 'skip' | 'success' | 'fail';

/** One append-only entry of the run log. */
export interface RunEvent {
  readonly runId: string;
  readonly kind: RunEventKind;
  readonly identity: string;
  /** ISO-8601. */
  readonly timestamp: string;
  /** Elapsed time since `start`. Present on terminal events only. */
  readonly durationMs?: number;
  readonly details?: string;
}

export function isTerminal(kind: RunEventKind): boolean {
  return kind !== 'start';
}
