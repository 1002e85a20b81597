import type { Sequelize } from 'sequelize';
import type { Loaded, RegistryChange, RegistryRecord, RegistryStore } from '@batchmeter/core';
import { describeError, loadedDegraded, loadedMissing, loadedOk } from '@batchmeter/core';
import { defineRegistryRecordModel } from './models/RegistryRecordModel.js';
import type { RegistryRecordModel } from './models/RegistryRecordModel.js';
import * as RegistryRecordMapper from './mappers/RegistryRecordMapper.js';

export interface SequelizeStoreOptions {
  /** Prefix of the table names. Default: `'batchmeter_'`. */
  readonly tablePrefix?: string;
}

/**
 * Sequelize-backed `RegistryStore` for `@batchmeter/core`.
 *
 * One row per identity. Changes are applied one at a time (upsert, delete,
 * clear) instead of rewriting the whole registry, so concurrent batches on
 * the same database only contend on the rows they touch. Works with any
 * dialect Sequelize v6 supports.
 *
 * Call `initialize()` after construction to create the table.
 */
export class SequelizeRegistryStore implements RegistryStore {
  private readonly Registry: RegistryRecordModel;
  private readonly tableName: string;

  constructor(sequelize: Sequelize, options?: SequelizeStoreOptions) {
    this.tableName = `${options?.tablePrefix ?? 'batchmeter_'}registry`;
    this.Registry = defineRegistryRecordModel(sequelize, this.tableName);
  }

  async initialize(): Promise<void> {
    await this.Registry.sync();
  }

  async load(): Promise<Loaded<readonly RegistryRecord[]>> {
    try {
      const rows = await this.Registry.findAll({ order: [['identity', 'ASC']] });
      if (rows.length === 0) return loadedMissing([]);

      const records: RegistryRecord[] = [];
      const unreadable: string[] = [];
      for (const row of rows) {
        const plain = row.get({ plain: true });
        const mapped = RegistryRecordMapper.toDomain(plain);
        if (mapped.ok) {
          records.push(mapped.record);
        } else {
          unreadable.push(`${plain.identity} (${mapped.reason})`);
        }
      }

      if (unreadable.length > 0) {
        return loadedDegraded(records, `Skipped unreadable rows in ${this.tableName}: ${unreadable.join(', ')}`);
      }
      return loadedOk(records);
    } catch (error) {
      return loadedDegraded([], `Cannot read table ${this.tableName}: ${describeError(error)}`);
    }
  }

  async persist(change: RegistryChange, _snapshot?: readonly RegistryRecord[]): Promise<void> {
    switch (change.kind) {
      case 'upsert':
        await this.Registry.upsert(RegistryRecordMapper.toRow(change.record));
        return;
      case 'delete':
        await this.Registry.destroy({ where: { identity: change.identity } });
        return;
      case 'clear':
        await this.Registry.destroy({ where: {} });
        return;
    }
  }

  describe(): string {
    return `sequelize:${this.tableName}`;
  }
}
