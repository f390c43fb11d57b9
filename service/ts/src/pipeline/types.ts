export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type ResourceState = Record<string, JsonValue>;

/** Values a resource may yield inside a record. Dates become timestamp columns. */
export type RecordValue =
  | string
  | number
  | boolean
  | null
  | Date
  | RecordValue[]
  | { [key: string]: RecordValue };

export type DataRecord = { [key: string]: RecordValue };

export type WriteDisposition = 'append' | 'replace' | 'merge';

export interface ResourceContext {
  /** Mutable per-resource state, persisted with the load package when the run succeeds. */
  state: ResourceState;
}

export interface ResourceOptions {
  writeDisposition?: WriteDisposition;
  primaryKey?: string[];
  tableName?: string;
}

export interface Resource<T extends DataRecord = DataRecord> {
  readonly name: string;
  readonly tableName: string;
  readonly writeDisposition: WriteDisposition;
  readonly primaryKey: readonly string[];
  iterate(context?: ResourceContext): AsyncIterable<T>;
  addLimit(limit: number): Resource<T>;
}

export interface Source {
  readonly name: string;
  readonly resources: ReadonlyMap<string, Resource>;
  selected(): Resource[];
  withResources(...names: string[]): Source;
  withResource(name: string, replacement: Resource): Source;
}

export type ColumnType = 'text' | 'bigint' | 'double' | 'bool' | 'timestamp' | 'json';

export interface ColumnSchema {
  name: string;
  type: ColumnType;
}

export interface TableSchema {
  name: string;
  columns: ColumnSchema[];
  writeDisposition: WriteDisposition;
  primaryKey: string[];
}

export type Row = Record<string, RecordValue>;

export interface TablePackage {
  schema: TableSchema;
  rows: Row[];
}

export interface LoadPackage {
  loadId: string;
  pipelineName: string;
  datasetName: string;
  tables: TablePackage[];
  state: Record<string, ResourceState>;
}

export interface TableLoadInfo {
  rowCount: number;
  columns: ColumnSchema[];
}

export interface LoadPackageInfo {
  loadId: string;
  tables: Record<string, TableLoadInfo>;
}

export interface LoadInfo {
  pipelineName: string;
  destinationType: string;
  datasetName: string;
  startedAt: Date;
  finishedAt: Date;
  loadPackages: LoadPackageInfo[];
}
