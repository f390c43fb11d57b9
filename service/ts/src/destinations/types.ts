import type { LoadPackage, ResourceState } from '../pipeline/types.js';

export type DestinationType = 'postgres' | 'memory';

/**
 * A warehouse the pipeline writes load packages to. `load` must apply a
 * package completely or not at all.
 */
export interface Destination {
  readonly type: DestinationType;
  getState(datasetName: string, pipelineName: string): Promise<Record<string, ResourceState>>;
  load(loadPackage: LoadPackage): Promise<void>;
  close(): Promise<void>;
}
