// Embedding client for OpenAI-compatible /embeddings endpoints (Voyage by default)
// Query embeddings are cached briefly; batch runs repeat the same sub-queries

import { z } from 'zod';
import { validateEmbedding } from '../db/embedding-guard.js';
import type { EmbeddingMode, EmbeddingProvider } from '../types/evidence.js';
import type { Settings } from '../config/settings.js';
import { TimeoutError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('EmbeddingClient');

const EmbeddingResponseSchema = z.object({
  data: z.array(z.object({
    embedding: z.array(z.number()),
    index: z.number().int().optional(),
  })).min(1),
});

interface CacheEntry {
  vector: number[];
  expiresAt: number;
}

export interface EmbeddingClientConfig {
  apiKey?: string;
  baseUrl: string;
  model: string;
  timeoutMs?: number;
  /** Seconds to keep query embeddings; 0 disables the cache */
  cacheTtl?: number;
  /** Most query embeddings held at once; the oldest are dropped first (default: 1000) */
  cacheSize?: number;
  /** Expected vector dimension, checked on every response */
  dimension?: number;
}

export class HttpEmbeddingProvider implements EmbeddingProvider {
  private cache = new Map<string, CacheEntry>();
  private readonly timeoutMs: number;
  private readonly cacheTtl: number;
  private readonly cacheSize: number;

  constructor(private readonly config: EmbeddingClientConfig) {
    this.timeoutMs = config.timeoutMs ?? 15_000;
    this.cacheTtl = config.cacheTtl ?? 300;
    this.cacheSize = config.cacheSize ?? 1000;
  }

  static fromSettings(settings: Settings): HttpEmbeddingProvider {
    return new HttpEmbeddingProvider({
      apiKey: settings.embedding.apiKey,
      baseUrl: settings.embedding.baseUrl,
      model: settings.embedding.model,
      timeoutMs: settings.embedding.timeoutMs,
    });
  }

  async embed(text: string, mode: EmbeddingMode): Promise<number[]> {
    const cacheKey = `${mode}:${text}`;
    if (mode === 'query' && this.cacheTtl > 0) {
      const cached = this.getCached(cacheKey);
      if (cached) return cached;
    }

    const vector = await this.request(text, mode);
    validateEmbedding(vector, { text, dimension: this.config.dimension });

    if (mode === 'query' && this.cacheTtl > 0) this.setCache(cacheKey, vector);
    return vector;
  }

  private async request(text: string, mode: EmbeddingMode): Promise<number[]> {
    if (!this.config.apiKey) {
      throw new Error('EMBEDDING_API_KEY environment variable is not set');
    }

    const base = this.config.baseUrl.endsWith('/') ? this.config.baseUrl : this.config.baseUrl + '/';
    const url = new URL('embeddings', base);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const res = await fetch(url.toString(), {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Accept': 'application/json',
          'Authorization': `Bearer ${this.config.apiKey}`,
        },
        body: JSON.stringify({
          model: this.config.model,
          input: [text],
          input_type: mode,
        }),
        signal: controller.signal,
      });

      if (!res.ok) {
        const body = await res.text().catch(() => '');
        if (res.status === 401) throw new Error('Embeddings: Invalid API key');
        if (res.status === 429) throw new Error('Embeddings: Rate limited by server');
        throw new Error(`Embeddings: HTTP ${res.status} ${body.slice(0, 200)}`.trim());
      }

      const parsed = EmbeddingResponseSchema.parse(await res.json());
      return parsed.data[0].embedding;
    } catch (err) {
      if (controller.signal.aborted) {
        throw new TimeoutError(`Embedding request timed out after ${this.timeoutMs}ms`, this.timeoutMs);
      }
      throw err;
    } finally {
      clearTimeout(timeout);
    }
  }

  private getCached(key: string): number[] | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;
    if (Date.now() > entry.expiresAt) {
      this.cache.delete(key);
      return undefined;
    }
    log.debug('query embedding cache hit', { key: key.slice(0, 80) });
    return entry.vector;
  }

  private setCache(key: string, vector: number[]): void {
    this.cache.delete(key);
    this.cache.set(key, { vector, expiresAt: Date.now() + this.cacheTtl * 1000 });
    if (this.cache.size <= this.cacheSize) return;

    const now = Date.now();
    for (const [k, v] of this.cache) {
      if (now > v.expiresAt) this.cache.delete(k);
    }
    // Map iteration is insertion order, so the first keys are the oldest
    for (const k of this.cache.keys()) {
      if (this.cache.size <= this.cacheSize) break;
      this.cache.delete(k);
    }
  }
}
