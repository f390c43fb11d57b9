import { eq } from 'drizzle-orm';
import type { Pool } from 'pg';
import { z } from 'zod';

import { getDb, getPool } from '../../db/client.js';
import { datasetTables } from '../../db/schema.js';
import { parseResourceState } from '../../pipeline/state.js';
import type { ColumnSchema, LoadPackage, ResourceState, TablePackage, TableSchema } from '../../pipeline/types.js';
import { dedupeByKey } from '../memory.js';
import type { Destination } from '../types.js';
import {
  addColumnSql,
  alterColumnTypeSql,
  buildDeleteByKey,
  buildInsert,
  chunk,
  columnTypeFromPg,
  createBookkeepingSql,
  createSchemaSql,
  createTableSql,
  existingColumnsSql,
  planColumns,
  truncateSql,
} from './sql.js';

export const INSERT_BATCH_SIZE = 500;

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<unknown>;
}

const ColumnRowsSchema = z.object({
  rows: z.array(z.object({ column_name: z.string(), data_type: z.string() })),
});

const readColumns = async (client: Queryable, datasetName: string, tableName: string) => {
  const statement = existingColumnsSql(datasetName, tableName);
  const result = ColumnRowsSchema.parse(await client.query(statement.text, statement.values));
  const columns: ColumnSchema[] = [];
  for (const row of result.rows) {
    const type = columnTypeFromPg(row.data_type);
    if (type) columns.push({ name: row.column_name, type });
  }
  return columns;
};

/**
 * Creates the table or brings an existing one up to the incoming schema:
 * missing columns are added and narrower stored types widened. Returns the
 * schema rows should be written with.
 */
export const prepareTable = async (
  client: Queryable,
  datasetName: string,
  schema: TableSchema
): Promise<TableSchema> => {
  await client.query(createTableSql(datasetName, schema));
  const plan = planColumns(await readColumns(client, datasetName, schema.name), schema.columns);
  for (const column of plan.added) {
    await client.query(addColumnSql(datasetName, schema.name, column));
  }
  for (const column of plan.widened) {
    await client.query(alterColumnTypeSql(datasetName, schema.name, column));
  }
  return { ...schema, columns: plan.columns };
};

export interface PostgresDestinationOptions {
  pool?: Pool;
  batchSize?: number;
}

export class PostgresDestination implements Destination {
  readonly type = 'postgres' as const;
  private readonly poolOverride?: Pool;
  private readonly batchSize: number;

  constructor(options: PostgresDestinationOptions = {}) {
    this.poolOverride = options.pool;
    this.batchSize = Math.max(1, options.batchSize ?? INSERT_BATCH_SIZE);
  }

  private get pool(): Pool {
    return this.poolOverride ?? getPool();
  }

  async getState(datasetName: string, pipelineName: string): Promise<Record<string, ResourceState>> {
    await this.ensureDataset(this.pool, datasetName);

    const { pipelineState } = datasetTables(datasetName);
    const rows = await getDb(this.pool)
      .select({ resourceName: pipelineState.resourceName, state: pipelineState.state })
      .from(pipelineState)
      .where(eq(pipelineState.pipelineName, pipelineName));

    const states: Record<string, ResourceState> = {};
    for (const row of rows) {
      states[row.resourceName] = parseResourceState(row.state, row.resourceName);
    }
    return states;
  }

  async load(loadPackage: LoadPackage): Promise<void> {
    const { datasetName } = loadPackage;
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      await this.ensureDataset(client, datasetName);

      for (const table of loadPackage.tables) {
        if (!table.rows.length) continue;
        await this.writeTable(client, datasetName, table);
      }

      const { loads, pipelineState } = datasetTables(datasetName);
      const db = getDb(client);
      await db.insert(loads).values({
        loadId: loadPackage.loadId,
        pipelineName: loadPackage.pipelineName,
        status: 'loaded',
      });

      for (const [resourceName, state] of Object.entries(loadPackage.state)) {
        await db
          .insert(pipelineState)
          .values({
            pipelineName: loadPackage.pipelineName,
            resourceName,
            state,
            loadId: loadPackage.loadId,
          })
          .onConflictDoUpdate({
            target: [pipelineState.pipelineName, pipelineState.resourceName],
            set: { state, loadId: loadPackage.loadId, updatedAt: new Date() },
          });
      }

      await client.query('COMMIT');
    } catch (err) {
      await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
        console.error('postgres_rollback_failed', { loadId: loadPackage.loadId, error: rollbackErr });
      });
      throw err;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async ensureDataset(client: Queryable, datasetName: string) {
    await client.query(createSchemaSql(datasetName));
    for (const statement of createBookkeepingSql(datasetName)) {
      await client.query(statement);
    }
  }

  private async writeTable(client: Queryable, datasetName: string, table: TablePackage) {
    const schema = await prepareTable(client, datasetName, table.schema);

    let rows = table.rows;
    if (schema.writeDisposition === 'replace') {
      await client.query(truncateSql(datasetName, schema.name));
    } else if (schema.writeDisposition === 'merge') {
      rows = dedupeByKey(rows, schema.primaryKey);
      for (const batch of chunk(rows, this.batchSize)) {
        const statement = buildDeleteByKey(datasetName, schema, batch);
        await client.query(statement.text, statement.values);
      }
    }

    for (const batch of chunk(rows, this.batchSize)) {
      const statement = buildInsert(datasetName, schema, batch);
      await client.query(statement.text, statement.values);
    }
  }
}
