import type { Clock } from '../src/domain/ports/Clock.js';
import type { Logger, LogLevel } from '../src/domain/ports/Logger.js';
import type { WorkItem } from '../src/domain/model/WorkItem.js';
import { createWorkItem } from '../src/domain/model/WorkItem.js';

/** Clock whose `sleep` advances time instantly. */
export class FakeClock implements Clock {
  current = 0;
  readonly sleeps: number[] = [];

  now(): number {
    return this.current;
  }

  sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
    return Promise.resolve();
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export interface LogEntry {
  readonly level: LogLevel;
  readonly msg: string;
  readonly extra?: Record<string, unknown>;
}

export function recordingLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const push =
    (level: LogLevel) =>
    (msg: string, extra?: Record<string, unknown>): void => {
      entries.push(extra !== undefined ? { level, msg, extra } : { level, msg });
    };
  return {
    logger: { debug: push('debug'), info: push('info'), warn: push('warn'), error: push('error') },
    entries,
  };
}

export function makeItems(count: number, prefix = 'item'): WorkItem[] {
  return Array.from({ length: count }, (_, i) =>
    createWorkItem(`${prefix}-${String(i + 1)}`, { name: `${prefix} ${String(i + 1)}` }),
  );
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
