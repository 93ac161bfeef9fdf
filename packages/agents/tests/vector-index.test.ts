import { describe, it, expect } from 'vitest';
import { LocalVectorIndex, cosineDistance, matchesFilter, type ChunkRecord } from '../memory/vector-index.js';

function record(chunkId: string, embedding: number[], company: 'GOOGL' | 'MSFT' | 'NVDA' = 'MSFT', year = 2023): ChunkRecord {
  return { text: `text ${chunkId}`, embedding, metadata: { company, year, section: 'Item 7', chunkId } };
}

describe('cosineDistance', () => {
  it('maps identical, orthogonal and opposite vectors onto [0, 1]', () => {
    expect(cosineDistance([1, 0], [2, 0])).toBeCloseTo(0, 10);
    expect(cosineDistance([1, 0], [0, 3])).toBeCloseTo(0.5, 10);
    expect(cosineDistance([1, 0], [-1, 0])).toBeCloseTo(1, 10);
  });

  it('treats a zero vector as maximally distant', () => {
    expect(cosineDistance([0, 0], [1, 0])).toBe(1);
  });

  it('rejects vectors of different dimension', () => {
    expect(() => cosineDistance([1, 0], [1, 0, 0])).toThrow('Embedding dimension mismatch: 2 vs 3');
  });
});

describe('matchesFilter', () => {
  const metadata = { company: 'NVDA' as const, year: 2022, section: 'Item 1', chunkId: 'n' };

  it('accepts single values and lists', () => {
    expect(matchesFilter(metadata, undefined)).toBe(true);
    expect(matchesFilter(metadata, { company: 'NVDA' })).toBe(true);
    expect(matchesFilter(metadata, { year: [2021, 2022] })).toBe(true);
    expect(matchesFilter(metadata, { company: ['GOOGL', 'MSFT'] })).toBe(false);
    expect(matchesFilter(metadata, { company: 'NVDA', year: 2023 })).toBe(false);
  });
});

describe('LocalVectorIndex', () => {
  function index(): LocalVectorIndex {
    const idx = new LocalVectorIndex();
    idx.add([
      record('a', [1, 0]),
      record('b', [1, 1], 'GOOGL', 2022),
      record('c', [0, 1], 'NVDA'),
    ]);
    return idx;
  }

  it('returns the k nearest chunks, ascending by distance', async () => {
    const hits = await index().query([1, 0], 2);
    expect(hits.map(h => h.metadata.chunkId)).toEqual(['a', 'b']);
    expect(hits[0].distance).toBeCloseTo(0, 10);
    expect(hits[0].text).toBe('text a');
  });

  it('applies metadata filters before ranking', async () => {
    const hits = await index().query([1, 0], 5, { year: 2023 });
    expect(hits.map(h => h.metadata.chunkId)).toEqual(['a', 'c']);
  });

  it('returns nothing for k <= 0', async () => {
    await expect(index().query([1, 0], 0)).resolves.toEqual([]);
  });

  it('replaces chunks with the same id', () => {
    const idx = index();
    idx.add([record('a', [0, 1])]);
    expect(idx.size).toBe(3);
  });

  it('reports sorted corpus statistics', async () => {
    await expect(index().stats()).resolves.toEqual({
      totalChunks: 3,
      companies: ['GOOGL', 'MSFT', 'NVDA'],
      years: [2022, 2023],
      sections: ['Item 7'],
    });
  });
});
