import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

export type RunLogModel = ModelStatic<Model>;
export type QualityLogModel = ModelStatic<Model>;

export function defineRunLogModel(sequelize: Sequelize): RunLogModel {
  return sequelize.define(
    'EtlRunLog',
    {
      runId: {
        type: DataTypes.STRING(36),
        primaryKey: true,
        allowNull: false,
      },
      dataset: {
        type: DataTypes.STRING(100),
        allowNull: false,
      },
      destination: {
        type: DataTypes.STRING(200),
        allowNull: false,
      },
      status: {
        type: DataTypes.STRING(20),
        allowNull: false,
      },
      startedAt: {
        type: DataTypes.DATE,
        allowNull: false,
      },
      finishedAt: {
        type: DataTypes.DATE,
        allowNull: false,
      },
      recordsExtracted: { type: DataTypes.INTEGER, allowNull: false, defaultValue: 0 },
      recordsValidated: { type: DataTypes.INTEGER, allowNull: false, defaultValue: 0 },
      recordsTransformed: { type: DataTypes.INTEGER, allowNull: false, defaultValue: 0 },
      recordsLoaded: { type: DataTypes.INTEGER, allowNull: false, defaultValue: 0 },
      recordsRejected: { type: DataTypes.INTEGER, allowNull: false, defaultValue: 0 },
      errorMessage: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
    },
    {
      tableName: 'etl_run_log',
      timestamps: false,
      underscored: true,
    },
  );
}

export function defineQualityLogModel(sequelize: Sequelize): QualityLogModel {
  return sequelize.define(
    'DataQualityLog',
    {
      id: {
        type: DataTypes.INTEGER,
        primaryKey: true,
        autoIncrement: true,
      },
      runId: {
        type: DataTypes.STRING(36),
        allowNull: false,
      },
      validationType: {
        type: DataTypes.STRING(50),
        allowNull: false,
      },
      validationRule: {
        type: DataTypes.STRING(200),
        allowNull: false,
      },
      passedRecords: { type: DataTypes.INTEGER, allowNull: false },
      failedRecords: { type: DataTypes.INTEGER, allowNull: false },
      details: {
        type: DataTypes.JSON,
        allowNull: false,
      },
    },
    {
      tableName: 'data_quality_log',
      timestamps: false,
      underscored: true,
      indexes: [{ fields: ['run_id'] }],
    },
  );
}
