import { setTimeout as sleep } from 'timers/promises';

export type Sleep = (ms: number) => Promise<unknown>;

/** Fixed delay between successive requests; the first request goes out immediately. */
export const createPacer = (delayMs: number, wait: Sleep = sleep) => {
  let first = true;
  return async () => {
    if (first) {
      first = false;
      return;
    }
    if (delayMs > 0) await wait(delayMs);
  };
};

export const describeError = (err: unknown) => (err instanceof Error ? err.message : String(err));

/**
 * Runs one item fetch. Any failure is logged under `event` with the item's
 * identifiers and turned into `null` so the caller can skip the item.
 */
export const fetchOrSkip = async <T>(
  event: string,
  context: Record<string, unknown>,
  fetcher: () => Promise<T>
): Promise<T | null> => {
  try {
    return await fetcher();
  } catch (err) {
    console.warn(event, { ...context, error: describeError(err) });
    return null;
  }
};
