// Retrieval - evidence records and the vector index contract

import type { Ticker, Year } from './query.js';

export interface EvidenceItem {
  readonly text: string;
  readonly company: Ticker;
  readonly year: Year;
  readonly section: string;
  readonly distance: number;   // [0,1], lower is more relevant
  readonly chunkId: string;
}

/** Sub-query text → evidence ordered by ascending distance */
export type EvidenceBySubQuery = ReadonlyMap<string, readonly EvidenceItem[]>;

export interface ChunkMetadata {
  readonly company: Ticker;
  readonly year: Year;
  readonly section: string;
  readonly chunkId: string;
}

export interface IndexHit {
  readonly text: string;
  readonly distance: number;
  readonly metadata: ChunkMetadata;
}

/** Equality or set membership on company/year */
export interface IndexFilter {
  company?: Ticker | readonly Ticker[];
  year?: Year | readonly Year[];
}

export interface IndexStats {
  totalChunks: number;
  companies: string[];
  years: number[];
  sections: string[];
}

export interface VectorIndex {
  query(embedding: readonly number[], k: number, filter?: IndexFilter): Promise<IndexHit[]>;
  stats(): Promise<IndexStats>;
}

export type EmbeddingMode = 'document' | 'query';

export interface EmbeddingProvider {
  embed(text: string, mode: EmbeddingMode): Promise<number[]>;
}

export type RetrievalStrategy =
  | { kind: 'semantic' }
  | { kind: 'hybrid' }
  | { kind: 'company_focused'; companies: readonly Ticker[] }
  | { kind: 'temporal'; years: readonly Year[] };

export type StrategyKind = RetrievalStrategy['kind'];

export interface MultiQueryHit extends EvidenceItem {
  readonly sourceQuery: string;
}
