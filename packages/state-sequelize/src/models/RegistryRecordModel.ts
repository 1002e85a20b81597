import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

export interface RegistryRow {
  identity: string;
  lastInputHash: string;
  status: string;
  lastSuccessAt: string | null;
  lastFailureAt: string | null;
  lastRunId: string;
  lastError: string | null;
  lastOutputs: unknown;
}

export type RegistryRecordModel = ModelStatic<Model<RegistryRow, RegistryRow>>;

export function defineRegistryRecordModel(sequelize: Sequelize, tableName: string): RegistryRecordModel {
  return sequelize.define<Model<RegistryRow, RegistryRow>>(
    tableName,
    {
      identity: {
        type: DataTypes.STRING(512),
        primaryKey: true,
        allowNull: false,
      },
      lastInputHash: {
        type: DataTypes.STRING(64),
        allowNull: false,
      },
      status: {
        type: DataTypes.STRING(10),
        allowNull: false,
      },
      lastSuccessAt: {
        type: DataTypes.STRING(40),
        allowNull: true,
      },
      lastFailureAt: {
        type: DataTypes.STRING(40),
        allowNull: true,
      },
      lastRunId: {
        type: DataTypes.STRING(255),
        allowNull: false,
      },
      lastError: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
      lastOutputs: {
        type: DataTypes.JSON,
        allowNull: true,
      },
    },
    {
      tableName,
      timestamps: false,
    },
  );
}
