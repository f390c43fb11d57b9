import type { RetryPolicy } from '@gamedata/clients';

import type { Destination } from '../destinations/types.js';
import type { EnvironmentSources } from '../environment.js';

export interface LoaderDeps {
  destination?: Destination;
  now?: () => Date;
  /** Retry policy for the API client the loader builds when none is injected. */
  retry?: RetryPolicy;
  /** Inter-request delay override; sources default to 100 ms. */
  delayMs?: number;
}

export interface EnvHandlerDeps {
  env?: Record<string, string | undefined>;
  environment?: EnvironmentSources;
}
