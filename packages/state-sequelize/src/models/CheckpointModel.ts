import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

/** BIGINT columns come back as strings from some dialects (PostgreSQL). */
export interface CheckpointRow {
  importId: string;
  status: string;
  confirmedOffset: number | string;
  totalBytes: number | string;
  objectsSent: number | string;
  invocations: number;
  updatedAt: number | string;
  error: string | null;
}

export type CheckpointModel = ModelStatic<Model<CheckpointRow>>;

export function defineCheckpointModel(sequelize: Sequelize, tableName: string): CheckpointModel {
  return sequelize.define<Model<CheckpointRow>>(
    'TrackImportCheckpoint',
    {
      importId: {
        type: DataTypes.STRING(1024),
        primaryKey: true,
        allowNull: false,
      },
      status: {
        type: DataTypes.STRING(20),
        allowNull: false,
      },
      confirmedOffset: {
        type: DataTypes.BIGINT,
        allowNull: false,
        defaultValue: 0,
      },
      totalBytes: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
      objectsSent: {
        type: DataTypes.BIGINT,
        allowNull: false,
        defaultValue: 0,
      },
      invocations: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 1,
      },
      updatedAt: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
      error: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
    },
    {
      tableName,
      timestamps: false,
    },
  );
}
