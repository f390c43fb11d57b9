export * from './types.js';
export * from './errors.js';
export { defineResource, defineSource } from './resource.js';
export { Pipeline, formatLoadInfo, createLoadId, LOAD_ID_COLUMN } from './pipeline.js';
export type { PipelineOptions } from './pipeline.js';
export {
  columnTypeOf,
  flattenRecord,
  inferColumns,
  mergeColumns,
  normalizeIdentifier,
  widenColumnType,
} from './schema.js';
export { parseResourceState } from './state.js';
