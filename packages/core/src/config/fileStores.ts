import { join } from 'node:path';
import type { RegistryStore } from '../domain/ports/RegistryStore.js';
import type { CheckpointStore } from '../domain/ports/CheckpointStore.js';
import type { RunLogSink } from '../domain/ports/RunLogSink.js';
import { FileRegistryStore } from '../infrastructure/registry/FileRegistryStore.js';
import { FileCheckpointStore } from '../infrastructure/checkpoint/FileCheckpointStore.js';
import { DailyTextLogSink } from '../infrastructure/logging/DailyTextLogSink.js';
import { JsonLinesLogSink } from '../infrastructure/logging/JsonLinesLogSink.js';
import { formatBatchTimestamp } from '../domain/services/runId.js';

export interface FileStores {
  readonly registryStore: RegistryStore;
  readonly checkpointStore: CheckpointStore;
  readonly runLogSinks: readonly RunLogSink[];
  /** Names the JSON Lines file; pass it to the runner so run ids share the prefix. */
  readonly batchTimestamp: string;
}

export interface FileStoreDirs {
  readonly stateDir: string;
  readonly logDir: string;
  /** Batch start. Default: now. */
  readonly startedAt?: Date;
}

/**
 * The on-disk layout: `<stateDir>/registry.json`, checkpoints in `<stateDir>`,
 * daily text log and per-batch JSON Lines in `<logDir>`.
 */
export function createFileStores(dirs: FileStoreDirs): FileStores {
  const batchTimestamp = formatBatchTimestamp(dirs.startedAt ?? new Date());
  return {
    registryStore: new FileRegistryStore({ filePath: join(dirs.stateDir, 'registry.json') }),
    checkpointStore: new FileCheckpointStore({ directory: dirs.stateDir }),
    runLogSinks: [
      new DailyTextLogSink({ directory: dirs.logDir }),
      new JsonLinesLogSink({ directory: dirs.logDir, batchTimestamp }),
    ],
    batchTimestamp,
  };
}
