import type { ColumnSchema, ColumnType, DataRecord, RecordValue, Row } from './types.js';

export const normalizeIdentifier = (name: string): string => {
  const snake = name
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toLowerCase()
    .replace(/[^a-z0-9_]+/g, '_');
  if (!snake) return '_';
  return /^[0-9]/.test(snake) ? `_${snake}` : snake;
};

const isNestedRecord = (value: RecordValue): value is { [key: string]: RecordValue } =>
  typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);

/**
 * Nested objects become `parent__child` columns; arrays are kept whole and
 * stored as JSON.
 */
export const flattenRecord = (record: DataRecord, prefix = ''): Row => {
  const row: Row = {};
  for (const [key, value] of Object.entries(record)) {
    const column = `${prefix}${normalizeIdentifier(key)}`;
    if (isNestedRecord(value)) {
      Object.assign(row, flattenRecord(value, `${column}__`));
    } else {
      row[column] = value;
    }
  }
  return row;
};

export const columnTypeOf = (value: RecordValue): ColumnType | null => {
  if (value === null) return null;
  if (value instanceof Date) return 'timestamp';
  if (Array.isArray(value)) return 'json';
  switch (typeof value) {
    case 'string':
      return 'text';
    case 'boolean':
      return 'bool';
    case 'number':
      return Number.isInteger(value) ? 'bigint' : 'double';
    default:
      return 'json';
  }
};

const NUMERIC: ReadonlySet<ColumnType> = new Set(['bigint', 'double']);

export const widenColumnType = (current: ColumnType, incoming: ColumnType): ColumnType => {
  if (current === incoming) return current;
  if (NUMERIC.has(current) && NUMERIC.has(incoming)) return 'double';
  return 'json';
};

/** Columns in first-seen order. Columns that only ever hold null are left out. */
export const inferColumns = (rows: Row[]): ColumnSchema[] => {
  const types = new Map<string, ColumnType>();
  for (const row of rows) {
    for (const [name, value] of Object.entries(row)) {
      const type = columnTypeOf(value);
      if (!type) continue;
      const current = types.get(name);
      types.set(name, current ? widenColumnType(current, type) : type);
    }
  }
  return [...types.entries()].map(([name, type]) => ({ name, type }));
};

export const mergeColumns = (existing: ColumnSchema[], incoming: ColumnSchema[]): ColumnSchema[] => {
  const merged = new Map(existing.map((column) => [column.name, column.type]));
  for (const column of incoming) {
    const current = merged.get(column.name);
    merged.set(column.name, current ? widenColumnType(current, column.type) : column.type);
  }
  return [...merged.entries()].map(([name, type]) => ({ name, type }));
};
