import type { Destination } from '../destinations/types.js';
import { PipelineRunError } from './errors.js';
import { flattenRecord, inferColumns, mergeColumns } from './schema.js';
import type {
  LoadInfo,
  LoadPackage,
  ResourceState,
  Row,
  Source,
  TablePackage,
} from './types.js';

export const LOAD_ID_COLUMN = '_load_id';

export interface PipelineOptions {
  pipelineName: string;
  destination: Destination;
  datasetName: string;
  /** Load into a fresh, timestamp-suffixed dataset instead of the configured one. */
  fullRefresh?: boolean;
  now?: () => Date;
}

const describeError = (err: unknown) => (err instanceof Error ? err.message : String(err));

export const createLoadId = (at: Date) => (at.getTime() / 1000).toFixed(6);

const datasetSuffix = (at: Date) => at.toISOString().replace(/\D/g, '').slice(0, 14);

export class Pipeline {
  readonly pipelineName: string;
  readonly datasetName: string;
  private readonly destination: Destination;
  private readonly fullRefresh: boolean;
  private readonly now: () => Date;

  constructor(options: PipelineOptions) {
    this.pipelineName = options.pipelineName;
    this.datasetName = options.datasetName;
    this.destination = options.destination;
    this.fullRefresh = options.fullRefresh ?? false;
    this.now = options.now ?? (() => new Date());
  }

  get destinationType() {
    return this.destination.type;
  }

  /**
   * Extracts every selected resource of the source in order, then writes the
   * rows and resource state as one load package.
   */
  async run(source: Source): Promise<LoadInfo> {
    const startedAt = this.now();
    const loadId = createLoadId(startedAt);
    const datasetName = this.fullRefresh
      ? `${this.datasetName}_${datasetSuffix(startedAt)}`
      : this.datasetName;

    let persisted: Record<string, ResourceState>;
    try {
      persisted = await this.destination.getState(datasetName, this.pipelineName);
    } catch (err) {
      throw new PipelineRunError(`Reading pipeline state failed: ${describeError(err)}`, 'load', {
        pipelineName: this.pipelineName,
        cause: err,
      });
    }

    const tables = new Map<string, TablePackage>();
    const state: Record<string, ResourceState> = {};

    for (const resource of source.selected()) {
      const context = { state: structuredClone(persisted[resource.name] ?? {}) };
      const rows: Row[] = [];
      try {
        for await (const record of resource.iterate(context)) {
          rows.push({ ...flattenRecord(record), [LOAD_ID_COLUMN]: loadId });
        }
      } catch (err) {
        throw new PipelineRunError(
          `Extraction of ${resource.name} failed: ${describeError(err)}`,
          'extract',
          { pipelineName: this.pipelineName, resource: resource.name, cause: err }
        );
      }

      state[resource.name] = context.state;

      const existing = tables.get(resource.tableName);
      const columns = inferColumns(rows);
      if (existing) {
        existing.rows.push(...rows);
        existing.schema.columns = mergeColumns(existing.schema.columns, columns);
      } else {
        tables.set(resource.tableName, {
          schema: {
            name: resource.tableName,
            columns,
            writeDisposition: resource.writeDisposition,
            primaryKey: [...resource.primaryKey],
          },
          rows,
        });
      }
    }

    const loadPackage: LoadPackage = {
      loadId,
      pipelineName: this.pipelineName,
      datasetName,
      tables: [...tables.values()],
      state,
    };

    try {
      await this.destination.load(loadPackage);
    } catch (err) {
      throw new PipelineRunError(`Loading package ${loadId} failed: ${describeError(err)}`, 'load', {
        pipelineName: this.pipelineName,
        cause: err,
      });
    }

    return {
      pipelineName: this.pipelineName,
      destinationType: this.destination.type,
      datasetName,
      startedAt,
      finishedAt: this.now(),
      loadPackages: [
        {
          loadId,
          tables: Object.fromEntries(
            loadPackage.tables.map((table) => [
              table.schema.name,
              { rowCount: table.rows.length, columns: table.schema.columns },
            ])
          ),
        },
      ],
    };
  }
}

export const formatLoadInfo = (info: LoadInfo): string[] => {
  const lines = ['Pipeline execution completed!', `Loaded ${info.loadPackages.length} package(s)`];
  for (const loadPackage of info.loadPackages) {
    lines.push('', `Package ${loadPackage.loadId}:`);
    for (const [tableName, table] of Object.entries(loadPackage.tables)) {
      lines.push(`  - ${tableName}: ${table.rowCount} rows`);
    }
  }
  return lines;
};
