export { LocalVectorIndex, cosineDistance, matchesFilter } from './vector-index.js';
export type { ChunkRecord, VectorIndex } from './vector-index.js';
export { PgVectorIndex } from './pg-vector-index.js';
