import { z } from 'zod';

import type { JsonValue, ResourceState } from './types.js';

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ])
);

export const ResourceStateSchema = z.record(z.string(), JsonValueSchema);

export const parseResourceState = (value: unknown, resourceName: string): ResourceState => {
  const parsed = ResourceStateSchema.safeParse(value);
  if (parsed.success) return parsed.data;
  console.warn('resource_state_discarded', { resource: resourceName, issues: parsed.error.issues });
  return {};
};
