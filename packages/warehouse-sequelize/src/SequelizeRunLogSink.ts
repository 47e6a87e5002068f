import type { Sequelize } from 'sequelize';
import type { QualityLogEntry, RunLogEntry, RunLogSink } from '@ledgerline/core';
import { defineQualityLogModel, defineRunLogModel } from './models/RunLogModels.js';
import type { QualityLogModel, RunLogModel } from './models/RunLogModels.js';
import * as RunLogMapper from './mappers/RunLogMapper.js';

/** Writes run rows to `etl_run_log` and rule outcomes to `data_quality_log`. */
export class SequelizeRunLogSink implements RunLogSink {
  private readonly RunLog: RunLogModel;
  private readonly QualityLog: QualityLogModel;

  constructor(sequelize: Sequelize) {
    this.RunLog = defineRunLogModel(sequelize);
    this.QualityLog = defineQualityLogModel(sequelize);
  }

  async initialize(): Promise<void> {
    await this.RunLog.sync();
    await this.QualityLog.sync();
  }

  async recordRun(entry: RunLogEntry): Promise<void> {
    await this.RunLog.upsert(RunLogMapper.toRunRow(entry));
  }

  async recordQuality(entries: readonly QualityLogEntry[]): Promise<void> {
    if (entries.length === 0) return;
    await this.QualityLog.bulkCreate(entries.map(RunLogMapper.toQualityRow));
  }

  async findRun(runId: string): Promise<RunLogEntry | null> {
    const row = await this.RunLog.findByPk(runId);
    return row ? RunLogMapper.toRunEntry(row) : null;
  }

  async qualityFor(runId: string): Promise<QualityLogEntry[]> {
    const rows = await this.QualityLog.findAll({ where: { runId }, order: [['id', 'ASC']] });
    return rows.map(RunLogMapper.toQualityEntry);
  }
}
