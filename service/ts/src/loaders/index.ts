export * from './types.js';
export * from './pokemon.js';
export * from './chess.js';
