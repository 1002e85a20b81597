import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model, Optional } from 'sequelize';

export interface CheckpointRow {
  id: number;
  batchId: string;
  reason: string;
  processedCount: number;
  totalCost: number;
  timestamp: string;
  results: unknown;
}

export type CheckpointCreationRow = Optional<CheckpointRow, 'id'>;

export type CheckpointModel = ModelStatic<Model<CheckpointRow, CheckpointCreationRow>>;

export function defineCheckpointModel(sequelize: Sequelize, tableName: string): CheckpointModel {
  return sequelize.define<Model<CheckpointRow, CheckpointCreationRow>>(
    tableName,
    {
      id: {
        type: DataTypes.INTEGER,
        primaryKey: true,
        autoIncrement: true,
      },
      batchId: {
        type: DataTypes.STRING(36),
        allowNull: false,
      },
      reason: {
        type: DataTypes.STRING(20),
        allowNull: false,
      },
      processedCount: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      totalCost: {
        type: DataTypes.DOUBLE,
        allowNull: false,
      },
      timestamp: {
        type: DataTypes.STRING(40),
        allowNull: false,
      },
      results: {
        type: DataTypes.JSON,
        allowNull: false,
      },
    },
    {
      tableName,
      timestamps: false,
      indexes: [{ fields: ['batchId'] }],
    },
  );
}
