import { mergeColumns } from '../pipeline/schema.js';
import type { LoadPackage, ResourceState, Row, TableSchema } from '../pipeline/types.js';
import type { Destination } from './types.js';

interface MemoryTable {
  schema: TableSchema;
  rows: Row[];
}

export interface MemoryLoadRecord {
  loadId: string;
  pipelineName: string;
  datasetName: string;
  status: 'loaded';
  insertedAt: Date;
}

const stateKey = (datasetName: string, pipelineName: string) => `${datasetName}:${pipelineName}`;

export const rowKey = (row: Row, primaryKey: readonly string[]) =>
  JSON.stringify(primaryKey.map((column) => row[column] ?? null));

/** Keeps the last row for every primary key, in first-seen key order. */
export const dedupeByKey = (rows: Row[], primaryKey: readonly string[]): Row[] => {
  const byKey = new Map<string, Row>();
  for (const row of rows) {
    byKey.set(rowKey(row, primaryKey), row);
  }
  return [...byKey.values()];
};

export class MemoryDestination implements Destination {
  readonly type = 'memory' as const;
  readonly loads: MemoryLoadRecord[] = [];
  private readonly datasets = new Map<string, Map<string, MemoryTable>>();
  private readonly states = new Map<string, Record<string, ResourceState>>();

  async getState(datasetName: string, pipelineName: string): Promise<Record<string, ResourceState>> {
    return structuredClone(this.states.get(stateKey(datasetName, pipelineName)) ?? {});
  }

  async load(loadPackage: LoadPackage): Promise<void> {
    const current = this.datasets.get(loadPackage.datasetName) ?? new Map<string, MemoryTable>();
    const next = new Map(current);

    for (const table of loadPackage.tables) {
      if (!table.rows.length) continue;
      const { schema } = table;
      const existing = next.get(schema.name);
      const columns = mergeColumns(existing?.schema.columns ?? [], schema.columns);

      let rows = existing && schema.writeDisposition !== 'replace' ? [...existing.rows] : [];
      let incoming = table.rows;
      if (schema.writeDisposition === 'merge') {
        incoming = dedupeByKey(incoming, schema.primaryKey);
        const keys = new Set(incoming.map((row) => rowKey(row, schema.primaryKey)));
        rows = rows.filter((row) => !keys.has(rowKey(row, schema.primaryKey)));
      }
      rows.push(...incoming);

      next.set(schema.name, { schema: { ...schema, columns }, rows });
    }

    this.datasets.set(loadPackage.datasetName, next);

    const key = stateKey(loadPackage.datasetName, loadPackage.pipelineName);
    this.states.set(key, { ...this.states.get(key), ...structuredClone(loadPackage.state) });

    this.loads.push({
      loadId: loadPackage.loadId,
      pipelineName: loadPackage.pipelineName,
      datasetName: loadPackage.datasetName,
      status: 'loaded',
      insertedAt: new Date(),
    });
  }

  rows(datasetName: string, tableName: string): Row[] {
    return [...(this.datasets.get(datasetName)?.get(tableName)?.rows ?? [])];
  }

  schema(datasetName: string, tableName: string): TableSchema | null {
    return this.datasets.get(datasetName)?.get(tableName)?.schema ?? null;
  }

  tableNames(datasetName: string): string[] {
    return [...(this.datasets.get(datasetName)?.keys() ?? [])];
  }

  async close(): Promise<void> {}
}
