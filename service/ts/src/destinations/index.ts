import { MemoryDestination } from './memory.js';
import { PostgresDestination } from './postgres/index.js';
import type { Destination } from './types.js';

export * from './types.js';
export { MemoryDestination } from './memory.js';
export { PostgresDestination } from './postgres/index.js';

let destination: Destination | null = null;

export const getDestination = (): Destination => {
  if (!destination) {
    destination = process.env.DATABASE_URL ? new PostgresDestination() : new MemoryDestination();
  }
  return destination;
};
