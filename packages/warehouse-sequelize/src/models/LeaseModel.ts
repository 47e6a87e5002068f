import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

export type LeaseModel = ModelStatic<Model>;

export function defineLeaseModel(sequelize: Sequelize, tableName: string): LeaseModel {
  return sequelize.define(
    'EtlLease',
    {
      resourceId: {
        type: DataTypes.STRING(255),
        primaryKey: true,
        allowNull: false,
      },
      holderToken: {
        type: DataTypes.STRING(36),
        allowNull: false,
      },
      acquiredAt: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
      ttlMs: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      expiresAt: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
      version: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 0,
      },
    },
    {
      tableName,
      timestamps: false,
      underscored: true,
    },
  );
}
