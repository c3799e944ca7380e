import type { Sequelize } from 'sequelize';
import type { CheckpointStore, ImportCheckpoint } from '@trackimport/core';
import { defineCheckpointModel } from './models/CheckpointModel.js';
import type { CheckpointModel } from './models/CheckpointModel.js';
import * as CheckpointMapper from './mappers/CheckpointMapper.js';

export interface SequelizeCheckpointStoreOptions {
  /** Default: `'trackimport_checkpoints'`. */
  readonly tableName?: string;
}

/**
 * Sequelize-based `CheckpointStore` adapter for `@trackimport/core`.
 *
 * Keeps one row per import, replaced on every save. Works with any dialect
 * Sequelize v6 supports (PostgreSQL, MySQL, MariaDB, SQLite, MS SQL Server).
 *
 * Call `initialize()` after construction to create the table.
 */
export class SequelizeCheckpointStore implements CheckpointStore {
  private readonly Checkpoint: CheckpointModel;

  constructor(sequelize: Sequelize, options?: SequelizeCheckpointStoreOptions) {
    this.Checkpoint = defineCheckpointModel(sequelize, options?.tableName ?? 'trackimport_checkpoints');
  }

  async initialize(): Promise<void> {
    await this.Checkpoint.sync();
  }

  async save(checkpoint: ImportCheckpoint): Promise<void> {
    await this.Checkpoint.upsert(CheckpointMapper.toRow(checkpoint));
  }

  async get(importId: string): Promise<ImportCheckpoint | null> {
    const row = await this.Checkpoint.findByPk(importId);
    if (!row) return null;
    return CheckpointMapper.toDomain(row.get({ plain: true }));
  }
}
