// PgVectorIndex: PostgreSQL-backed VectorIndex via pgvector
// Cosine distance from `<=>` is halved so it lands on [0, 1] like the local index

import { z } from 'zod';
import { queryWithRetry, toVectorLiteral, type PgConfig } from '../db/pg-client.js';
import { TICKERS } from '../types/query.js';
import type { IndexFilter, IndexHit, IndexStats, VectorIndex } from '../types/evidence.js';
import { filterValues, type ChunkRecord } from './vector-index.js';

const ChunkRowSchema = z.object({
  chunk_id: z.string(),
  company: z.enum(TICKERS),
  year: z.coerce.number().int(),
  section: z.string(),
  text: z.string(),
  distance: z.coerce.number(),
});

const StatsRowSchema = z.object({
  total: z.coerce.number().int(),
  companies: z.array(z.string()).nullable(),
  years: z.array(z.coerce.number().int()).nullable(),
  sections: z.array(z.string()).nullable(),
});

export interface PgVectorIndexOptions {
  /** Connection settings; defaults to the `pg` block of loadSettings() */
  pg?: PgConfig;
  table?: string;
}

export class PgVectorIndex implements VectorIndex {
  private readonly pg: PgConfig | undefined;
  private readonly table: string;

  constructor(options: PgVectorIndexOptions = {}) {
    this.pg = options.pg;
    this.table = options.table ?? 'filing_chunks';
  }

  async query(embedding: readonly number[], k: number, filter?: IndexFilter): Promise<IndexHit[]> {
    if (k <= 0) return [];

    const params: unknown[] = [toVectorLiteral(embedding), k];
    const where: string[] = [];
    const { companies, years } = filterValues(filter);
    if (companies) {
      params.push([...companies]);
      where.push(`company = ANY($${params.length}::text[])`);
    }
    if (years) {
      params.push([...years]);
      where.push(`year = ANY($${params.length}::int[])`);
    }

    const { rows } = await queryWithRetry(
      `SELECT chunk_id, company, year, section, text,
              (embedding <=> $1::vector) / 2 AS distance
         FROM ${this.table}
        ${where.length > 0 ? `WHERE ${where.join(' AND ')}` : ''}
        ORDER BY embedding <=> $1::vector
        LIMIT $2`,
      params,
      { config: this.pg },
    );

    return rows.map(raw => {
      const r = ChunkRowSchema.parse(raw);
      return {
        text: r.text,
        distance: Math.min(1, Math.max(0, r.distance)),
        metadata: {
          company: r.company,
          year: r.year,
          section: r.section,
          chunkId: r.chunk_id,
        },
      };
    });
  }

  async stats(): Promise<IndexStats> {
    const { rows } = await queryWithRetry(
      `SELECT count(*) AS total,
              array_agg(DISTINCT company) AS companies,
              array_agg(DISTINCT year) AS years,
              array_agg(DISTINCT section) AS sections
         FROM ${this.table}`,
      [],
      { config: this.pg },
    );
    const r = StatsRowSchema.parse(rows[0]);
    return {
      totalChunks: r.total,
      companies: [...(r.companies ?? [])].sort(),
      years: [...(r.years ?? [])].sort((a, b) => a - b),
      sections: [...(r.sections ?? [])].sort(),
    };
  }

  /** Insert or replace chunks keyed by chunk_id */
  async upsert(records: readonly ChunkRecord[]): Promise<number> {
    let written = 0;
    for (const { text, embedding, metadata } of records) {
      await queryWithRetry(
        `INSERT INTO ${this.table} (chunk_id, company, year, section, text, embedding)
         VALUES ($1, $2, $3, $4, $5, $6::vector)
         ON CONFLICT (chunk_id) DO UPDATE
           SET company = EXCLUDED.company, year = EXCLUDED.year, section = EXCLUDED.section,
               text = EXCLUDED.text, embedding = EXCLUDED.embedding`,
        [metadata.chunkId, metadata.company, metadata.year, metadata.section, text, toVectorLiteral(embedding)],
        { config: this.pg },
      );
      written++;
    }
    return written;
  }
}
