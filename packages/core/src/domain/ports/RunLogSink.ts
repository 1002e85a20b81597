import type { RunEvent } from '../model/RunEvent.js';

/** Destination for run-log events (a text file, a JSON Lines file, memory). */
export interface RunLogSink {
  append(event: RunEvent): Promise<void>;
  /** Human-readable location, for the summary. */
  describe(): string;
}
