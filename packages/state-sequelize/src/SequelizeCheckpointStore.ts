import type { Sequelize } from 'sequelize';
import type { Checkpoint, CheckpointStore, Loaded } from '@batchmeter/core';
import { describeError, loadedDegraded, loadedMissing, loadedOk } from '@batchmeter/core';
import { defineCheckpointModel } from './models/CheckpointModel.js';
import type { CheckpointModel } from './models/CheckpointModel.js';
import * as CheckpointMapper from './mappers/CheckpointMapper.js';
import type { SequelizeStoreOptions } from './SequelizeRegistryStore.js';

/**
 * Sequelize-backed `CheckpointStore`. One row per checkpoint; the latest is
 * the row with the highest id. Locations have the form
 * `sequelize:<table>#<id>`.
 *
 * Call `initialize()` after construction to create the table.
 */
export class SequelizeCheckpointStore implements CheckpointStore {
  private readonly Checkpoint: CheckpointModel;
  private readonly tableName: string;

  constructor(sequelize: Sequelize, options?: SequelizeStoreOptions) {
    this.tableName = `${options?.tablePrefix ?? 'batchmeter_'}checkpoints`;
    this.Checkpoint = defineCheckpointModel(sequelize, this.tableName);
  }

  async initialize(): Promise<void> {
    await this.Checkpoint.sync();
  }

  async save(checkpoint: Checkpoint): Promise<string> {
    const created = await this.Checkpoint.create(CheckpointMapper.toRow(checkpoint));
    return this.location(created.get({ plain: true }).id);
  }

  async loadLatest(): Promise<Loaded<Checkpoint | null>> {
    try {
      const row = await this.Checkpoint.findOne({ order: [['id', 'DESC']] });
      if (!row) return loadedMissing(null);

      const plain = row.get({ plain: true });
      const parsed = CheckpointMapper.toDomain(plain);
      if (!parsed.ok) {
        return loadedDegraded(null, `Unrecognized checkpoint ${this.location(plain.id)}: ${parsed.reason}`);
      }
      return loadedOk(parsed.checkpoint);
    } catch (error) {
      return loadedDegraded(null, `Cannot read table ${this.tableName}: ${describeError(error)}`);
    }
  }

  /** Oldest first. Unreadable rows are left out. */
  async list(): Promise<readonly Checkpoint[]> {
    const rows = await this.Checkpoint.findAll({ order: [['id', 'ASC']] });
    const checkpoints: Checkpoint[] = [];
    for (const row of rows) {
      const parsed = CheckpointMapper.toDomain(row.get({ plain: true }));
      if (parsed.ok) checkpoints.push(parsed.checkpoint);
    }
    return checkpoints;
  }

  private location(id: number): string {
    return `sequelize:${this.tableName}#${String(id)}`;
  }
}
