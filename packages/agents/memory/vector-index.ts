// Vector index over filing chunks
// LocalVectorIndex keeps everything in memory; PgVectorIndex (pg-vector-index.ts) uses pgvector

import type { ChunkMetadata, IndexFilter, IndexHit, IndexStats, VectorIndex } from '../types/evidence.js';

export type { VectorIndex } from '../types/evidence.js';

export interface ChunkRecord {
  text: string;
  embedding: readonly number[];
  metadata: ChunkMetadata;
}

/** Normalised filter: each present field becomes a list of allowed values */
export function filterValues(filter: IndexFilter | undefined): {
  companies?: readonly string[];
  years?: readonly number[];
} {
  const company = filter?.company;
  const year = filter?.year;
  return {
    companies: typeof company === 'string' ? [company] : company,
    years: typeof year === 'number' ? [year] : year,
  };
}

export function matchesFilter(metadata: ChunkMetadata, filter: IndexFilter | undefined): boolean {
  const { companies, years } = filterValues(filter);
  if (companies && !companies.includes(metadata.company)) return false;
  if (years && !years.includes(metadata.year)) return false;
  return true;
}

/** Cosine distance mapped onto [0, 1]: 0 identical, 0.5 orthogonal, 1 opposite */
export function cosineDistance(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Embedding dimension mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 1;
  const cos = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  return Math.min(1, Math.max(0, (1 - cos) / 2));
}

// In-memory index (tests, small corpora, offline runs)
export class LocalVectorIndex implements VectorIndex {
  private records = new Map<string, ChunkRecord>();

  /** Insert or replace chunks keyed by chunkId */
  add(records: readonly ChunkRecord[]): void {
    for (const record of records) {
      this.records.set(record.metadata.chunkId, record);
    }
  }

  get size(): number {
    return this.records.size;
  }

  async query(embedding: readonly number[], k: number, filter?: IndexFilter): Promise<IndexHit[]> {
    if (k <= 0) return [];
    return [...this.records.values()]
      .filter(r => matchesFilter(r.metadata, filter))
      .map(r => ({
        text: r.text,
        distance: cosineDistance(embedding, r.embedding),
        metadata: r.metadata,
      }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, k);
  }

  async stats(): Promise<IndexStats> {
    const companies = new Set<string>();
    const years = new Set<number>();
    const sections = new Set<string>();
    for (const { metadata } of this.records.values()) {
      companies.add(metadata.company);
      years.add(metadata.year);
      sections.add(metadata.section);
    }
    return {
      totalChunks: this.records.size,
      companies: [...companies].sort(),
      years: [...years].sort((a, b) => a - b),
      sections: [...sections].sort(),
    };
  }
}
