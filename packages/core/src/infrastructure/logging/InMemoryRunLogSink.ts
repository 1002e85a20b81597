import type { RunLogSink } from '../../domain/ports/RunLogSink.js';
import type { RunEvent } from '../../domain/model/RunEvent.js';

export class InMemoryRunLogSink implements RunLogSink {
  readonly events: RunEvent[] = [];

  append(event: RunEvent): Promise<void> {
    this.events.push(event);
    return Promise.resolve();
  }

  describe(): string {
    return 'memory';
  }

  /** Events of one run, in write order. */
  forRun(runId: string): readonly RunEvent[] {
    return this.events.filter((e) => e.runId === runId);
  }
}
