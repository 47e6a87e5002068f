import { DataTypes } from 'sequelize';
import type { DataType, Model, ModelAttributeColumnOptions, ModelStatic, Sequelize } from 'sequelize';
import { destinationId } from '@ledgerline/core';
import type { ColumnDefinition, DestinationDefinition } from '@ledgerline/core';

export type DestinationModel = ModelStatic<Model>;

export interface TableLocation {
  readonly tableName: string;
  readonly schema?: string;
}

function dataTypeOf(column: ColumnDefinition): DataType {
  switch (column.type) {
    case 'string':
      return DataTypes.STRING(64);
    case 'integer':
      return DataTypes.BIGINT;
    case 'decimal':
      return DataTypes.DECIMAL(column.precision ?? 18, column.scale ?? 4);
    case 'date':
      return DataTypes.DATEONLY;
    case 'timestamp':
      return DataTypes.DATE;
    case 'boolean':
      return DataTypes.BOOLEAN;
  }
}

/**
 * Where a destination's table lives. Dialects without schemas get `<schema>_<table>` in the
 * default schema instead.
 */
export function tableLocationOf(destination: DestinationDefinition, nativeSchemas: boolean): TableLocation {
  if (!destination.schema) return { tableName: destination.table };
  return nativeSchemas
    ? { tableName: destination.table, schema: destination.schema }
    : { tableName: `${destination.schema}_${destination.table}` };
}

/** Model over a destination table, with the natural key as its composite primary key. */
export function defineDestinationModel(
  sequelize: Sequelize,
  destination: DestinationDefinition,
  location: TableLocation,
): DestinationModel {
  const keys = new Set(destination.naturalKey);
  const attributes: Record<string, ModelAttributeColumnOptions> = {};
  for (const column of destination.columns) {
    const key = keys.has(column.name);
    attributes[column.name] = {
      type: dataTypeOf(column),
      primaryKey: key,
      allowNull: key ? false : (column.nullable ?? true),
    };
  }

  return sequelize.define(destinationId(destination), attributes, {
    tableName: location.tableName,
    ...(location.schema ? { schema: location.schema } : {}),
    timestamps: false,
    freezeTableName: true,
  });
}
