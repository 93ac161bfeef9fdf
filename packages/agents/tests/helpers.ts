// Shared in-process fakes for the model, embedder and index collaborators

import { vi } from 'vitest';
import type { GenerateOptions } from '../bridge/anthropic-model.js';
import type {
  EmbeddingMode,
  EvidenceItem,
  IndexFilter,
  IndexHit,
  IndexStats,
  VectorIndex,
} from '../types/evidence.js';
import type { ClassificationResult, Ticker } from '../types/query.js';

export function fakeModel(respond: (prompt: string, options: GenerateOptions) => Promise<string>) {
  return { generate: vi.fn(respond) };
}

/** Model that fails every call */
export function failingModel(message = 'model unavailable') {
  return fakeModel(() => Promise.reject(new Error(message)));
}

// Bag-of-terms embedding: deterministic, no network
const TERMS = [
  'revenue', 'cloud', 'margin', 'operating', 'segment', 'total', 'income',
  'google', 'microsoft', 'nvidia', 'data', 'center', 'search', 'gaming',
];

export function termEmbedding(text: string): number[] {
  const lower = text.toLowerCase();
  return [0.05, ...TERMS.map(t => (lower.includes(t) ? 1 : 0))];
}

export function fakeEmbedder(embed: (text: string, mode: EmbeddingMode) => Promise<number[]> =
  async (text) => termEmbedding(text)) {
  return { embed: vi.fn(embed) };
}

/** Index returning scripted hits and recording every query */
export class RecordingIndex implements VectorIndex {
  readonly calls: Array<{ k: number; filter?: IndexFilter }> = [];

  constructor(private readonly respond: (k: number, filter?: IndexFilter) => IndexHit[] | Promise<IndexHit[]>) {}

  async query(_embedding: readonly number[], k: number, filter?: IndexFilter): Promise<IndexHit[]> {
    this.calls.push({ k, filter });
    return this.respond(k, filter);
  }

  async stats(): Promise<IndexStats> {
    return { totalChunks: 0, companies: [], years: [], sections: [] };
  }
}

export function hit(
  chunkId: string,
  distance: number,
  overrides: { text?: string; company?: Ticker; year?: number; section?: string } = {},
): IndexHit {
  return {
    text: overrides.text ?? `Chunk ${chunkId} text`,
    distance,
    metadata: {
      company: overrides.company ?? 'MSFT',
      year: overrides.year ?? 2023,
      section: overrides.section ?? 'Item 7',
      chunkId,
    },
  };
}

export function evidence(
  chunkId: string,
  distance: number,
  overrides: Partial<Omit<EvidenceItem, 'chunkId' | 'distance'>> = {},
): EvidenceItem {
  return {
    text: overrides.text ?? `Chunk ${chunkId} text`,
    company: overrides.company ?? 'MSFT',
    year: overrides.year ?? 2023,
    section: overrides.section ?? 'Item 7',
    distance,
    chunkId,
  };
}

export function classification(overrides: Partial<ClassificationResult> = {}): ClassificationResult {
  return {
    type: 'simple_direct',
    companies: [],
    years: [],
    metrics: [],
    complexityScore: 1,
    ...overrides,
  };
}
