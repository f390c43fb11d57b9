import { widenColumnType } from '../../pipeline/schema.js';
import type { ColumnSchema, ColumnType, RecordValue, Row, TableSchema } from '../../pipeline/types.js';

export interface SqlStatement {
  text: string;
  values: unknown[];
}

export const LOADS_TABLE = '_loads';
export const STATE_TABLE = '_pipeline_state';

const PG_TYPES: Record<ColumnType, string> = {
  text: 'text',
  bigint: 'bigint',
  double: 'double precision',
  bool: 'boolean',
  timestamp: 'timestamptz',
  json: 'jsonb',
};

export const quoteIdent = (name: string) => `"${name.replace(/"/g, '""')}"`;

export const qualifiedName = (datasetName: string, tableName: string) =>
  `${quoteIdent(datasetName)}.${quoteIdent(tableName)}`;

export const createSchemaSql = (datasetName: string) =>
  `CREATE SCHEMA IF NOT EXISTS ${quoteIdent(datasetName)}`;

export const createBookkeepingSql = (datasetName: string): string[] => [
  `CREATE TABLE IF NOT EXISTS ${qualifiedName(datasetName, LOADS_TABLE)} (
  load_id text PRIMARY KEY,
  pipeline_name text NOT NULL,
  status text NOT NULL,
  inserted_at timestamptz NOT NULL DEFAULT NOW()
)`,
  `CREATE TABLE IF NOT EXISTS ${qualifiedName(datasetName, STATE_TABLE)} (
  pipeline_name text NOT NULL,
  resource_name text NOT NULL,
  state jsonb NOT NULL,
  load_id text NOT NULL,
  updated_at timestamptz NOT NULL DEFAULT NOW(),
  PRIMARY KEY (pipeline_name, resource_name)
)`,
];

export const createTableSql = (datasetName: string, schema: TableSchema) => {
  const columns = schema.columns.map((column) => `${quoteIdent(column.name)} ${PG_TYPES[column.type]}`);
  return `CREATE TABLE IF NOT EXISTS ${qualifiedName(datasetName, schema.name)} (${columns.join(', ')})`;
};

const FROM_PG_TYPES: Record<string, ColumnType> = {
  text: 'text',
  'character varying': 'text',
  smallint: 'bigint',
  integer: 'bigint',
  bigint: 'bigint',
  real: 'double',
  'double precision': 'double',
  numeric: 'double',
  boolean: 'bool',
  'timestamp with time zone': 'timestamp',
  'timestamp without time zone': 'timestamp',
  json: 'json',
  jsonb: 'json',
};

/** Maps an `information_schema.columns.data_type` back to a column type. */
export const columnTypeFromPg = (dataType: string): ColumnType | null => FROM_PG_TYPES[dataType] ?? null;

export const existingColumnsSql = (datasetName: string, tableName: string): SqlStatement => ({
  text: 'SELECT column_name, data_type FROM information_schema.columns WHERE table_schema = $1 AND table_name = $2 ORDER BY ordinal_position',
  values: [datasetName, tableName],
});

export const addColumnSql = (datasetName: string, tableName: string, column: ColumnSchema) =>
  `ALTER TABLE ${qualifiedName(datasetName, tableName)} ADD COLUMN IF NOT EXISTS ${quoteIdent(column.name)} ${PG_TYPES[column.type]}`;

export const alterColumnTypeSql = (datasetName: string, tableName: string, column: ColumnSchema) => {
  const name = quoteIdent(column.name);
  const using = column.type === 'json' ? `to_jsonb(${name})` : `${name}::${PG_TYPES[column.type]}`;
  return `ALTER TABLE ${qualifiedName(datasetName, tableName)} ALTER COLUMN ${name} TYPE ${PG_TYPES[column.type]} USING ${using}`;
};

export interface ColumnPlan {
  /** Incoming columns with the types they have once the table is altered. */
  columns: ColumnSchema[];
  added: ColumnSchema[];
  widened: ColumnSchema[];
}

/**
 * Compares the incoming columns with those already in the table. Columns the
 * table lacks are added; columns whose stored type is narrower are widened.
 */
export const planColumns = (existing: ColumnSchema[], incoming: ColumnSchema[]): ColumnPlan => {
  const stored = new Map(existing.map((column) => [column.name, column.type]));
  const plan: ColumnPlan = { columns: [], added: [], widened: [] };
  for (const column of incoming) {
    const current = stored.get(column.name);
    if (!current) {
      plan.added.push(column);
      plan.columns.push(column);
      continue;
    }
    const type = widenColumnType(current, column.type);
    if (type !== current) plan.widened.push({ name: column.name, type });
    plan.columns.push({ name: column.name, type });
  }
  return plan;
};

export const truncateSql = (datasetName: string, tableName: string) =>
  `TRUNCATE TABLE ${qualifiedName(datasetName, tableName)}`;

export const toSqlValue = (value: RecordValue | undefined, type: ColumnType): unknown => {
  if (value === undefined || value === null) return null;
  if (type === 'json') return JSON.stringify(value);
  return value;
};

export const buildInsert = (datasetName: string, schema: TableSchema, rows: Row[]): SqlStatement => {
  const names = schema.columns.map((column) => quoteIdent(column.name)).join(', ');
  const values: unknown[] = [];
  const tuples = rows.map((row) => {
    const placeholders = schema.columns.map((column) => {
      values.push(toSqlValue(row[column.name], column.type));
      return `$${values.length}`;
    });
    return `(${placeholders.join(', ')})`;
  });
  return {
    text: `INSERT INTO ${qualifiedName(datasetName, schema.name)} (${names}) VALUES ${tuples.join(', ')}`,
    values,
  };
};

export const buildDeleteByKey = (datasetName: string, schema: TableSchema, rows: Row[]): SqlStatement => {
  const keyColumns = schema.primaryKey.map(quoteIdent).join(', ');
  const types = new Map(schema.columns.map((column) => [column.name, column.type]));
  const values: unknown[] = [];
  const tuples = rows.map((row) => {
    const placeholders = schema.primaryKey.map((column) => {
      values.push(toSqlValue(row[column], types.get(column) ?? 'text'));
      return `$${values.length}`;
    });
    return `(${placeholders.join(', ')})`;
  });
  return {
    text: `DELETE FROM ${qualifiedName(datasetName, schema.name)} WHERE (${keyColumns}) IN (${tuples.join(', ')})`,
    values,
  };
};

export const chunk = <T>(items: T[], size: number): T[][] => {
  const chunks: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    chunks.push(items.slice(index, index + size));
  }
  return chunks;
};
