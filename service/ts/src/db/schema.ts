import { jsonb, pgSchema, primaryKey, text, timestamp } from 'drizzle-orm/pg-core';

import { LOADS_TABLE, STATE_TABLE } from '../destinations/postgres/sql.js';

/**
 * Bookkeeping tables live inside each dataset schema, so they are built per
 * dataset name. drizzle rejects `public` as a schema name; datasets never use it.
 */
export const datasetTables = (datasetName: string) => {
  const schema = pgSchema(datasetName);

  const loads = schema.table(LOADS_TABLE, {
    loadId: text('load_id').primaryKey(),
    pipelineName: text('pipeline_name').notNull(),
    status: text('status').notNull(),
    insertedAt: timestamp('inserted_at', { withTimezone: true }).defaultNow().notNull(),
  });

  const pipelineState = schema.table(
    STATE_TABLE,
    {
      pipelineName: text('pipeline_name').notNull(),
      resourceName: text('resource_name').notNull(),
      state: jsonb('state').notNull(),
      loadId: text('load_id').notNull(),
      updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
    },
    (table) => ({
      pk: primaryKey({ columns: [table.pipelineName, table.resourceName] }),
    })
  );

  return { loads, pipelineState };
};

export type DatasetTables = ReturnType<typeof datasetTables>;
