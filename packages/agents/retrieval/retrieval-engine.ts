// Retrieval engine: embeds a sub-query and runs one of four strategies against the index
// Output is always ascending by distance; an empty list means "no evidence", not failure

import { ALL_COMPANIES, HYBRID_KEYWORDS } from '../config/vocabulary.js';
import type {
  EmbeddingProvider,
  EvidenceItem,
  IndexFilter,
  IndexHit,
  MultiQueryHit,
  RetrievalStrategy,
  StrategyKind,
  VectorIndex,
} from '../types/evidence.js';
import type { ClassificationResult } from '../types/query.js';
import { PipelineError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Retrieval');

export const DEFAULT_RESULTS_PER_QUERY = 6;
export const DEFAULT_RESULTS_PER_MULTI_QUERY = 5;
const HYBRID_BOOST_PER_KEYWORD = 0.1;

export interface RetrievalEngineConfig {
  index: VectorIndex;
  embedder: EmbeddingProvider;
  defaultResults?: number;
}

export interface RetrieveOptions {
  nResults?: number;
}

type StrategyRunner<K extends StrategyKind> = (
  embedding: readonly number[],
  subQuery: string,
  strategy: Extract<RetrievalStrategy, { kind: K }>,
  n: number,
) => Promise<EvidenceItem[]>;

function toEvidence(hit: IndexHit): EvidenceItem {
  return {
    text: hit.text,
    company: hit.metadata.company,
    year: hit.metadata.year,
    section: hit.metadata.section,
    distance: hit.distance,
    chunkId: hit.metadata.chunkId,
  };
}

function byDistance(a: { distance: number }, b: { distance: number }): number {
  return a.distance - b.distance;
}

/** Keywords present in both the sub-query and the chunk text */
export function keywordMatches(subQuery: string, text: string): number {
  const q = subQuery.toLowerCase();
  const t = text.toLowerCase();
  return HYBRID_KEYWORDS.filter(k => q.includes(k) && t.includes(k)).length;
}

export function hybridRerank(subQuery: string, items: readonly EvidenceItem[]): EvidenceItem[] {
  return items
    .map(item => {
      const matches = keywordMatches(subQuery, item.text);
      if (matches === 0) return item;
      return { ...item, distance: Math.max(0, item.distance * (1 - HYBRID_BOOST_PER_KEYWORD * matches)) };
    })
    .sort(byDistance);
}

/**
 * Strategy per query type: cross-company fans out per company, year-over-year
 * with a year fans out per year, everything else uses the hybrid re-rank.
 */
export function selectStrategy(classification: ClassificationResult): RetrievalStrategy {
  switch (classification.type) {
    case 'cross_company':
      return {
        kind: 'company_focused',
        companies: classification.companies.length > 0 ? classification.companies : ALL_COMPANIES,
      };
    case 'comparative_yoy':
      return classification.years.length > 0
        ? { kind: 'temporal', years: classification.years }
        : { kind: 'hybrid' };
    default:
      return { kind: 'hybrid' };
  }
}

export function describeStrategy(strategy: RetrievalStrategy): string {
  switch (strategy.kind) {
    case 'company_focused':
      return `company_focused(${strategy.companies.join(', ')})`;
    case 'temporal':
      return `temporal(${strategy.years.join(', ')})`;
    default:
      return strategy.kind;
  }
}

/**
 * Merge per-sub-query evidence, deduplicated by chunk id (first occurrence
 * wins and keeps its sub-query) and ascending by distance.
 */
export function mergeEvidence(
  groups: ReadonlyArray<readonly [string, readonly EvidenceItem[]]>,
): MultiQueryHit[] {
  const seen = new Set<string>();
  const merged: MultiQueryHit[] = [];

  for (const [subQuery, items] of groups) {
    for (const item of items) {
      if (seen.has(item.chunkId)) continue;
      seen.add(item.chunkId);
      merged.push({ ...item, sourceQuery: subQuery });
    }
  }

  return merged.sort(byDistance);
}

export class RetrievalEngine {
  private readonly index: VectorIndex;
  private readonly embedder: EmbeddingProvider;
  private readonly defaultResults: number;

  constructor(config: RetrievalEngineConfig) {
    this.index = config.index;
    this.embedder = config.embedder;
    this.defaultResults = config.defaultResults ?? DEFAULT_RESULTS_PER_QUERY;
  }

  private readonly semantic: StrategyRunner<'semantic'> = async (embedding, _q, _s, n) =>
    this.search(embedding, n);

  private readonly hybrid: StrategyRunner<'hybrid'> = async (embedding, subQuery, _s, n) =>
    hybridRerank(subQuery, await this.search(embedding, n));

  private readonly companyFocused: StrategyRunner<'company_focused'> = async (embedding, subQuery, s, n) => {
    if (s.companies.length === 0) return this.semantic(embedding, subQuery, { kind: 'semantic' }, n);
    return this.fanOut(embedding, n, s.companies.map(company => ({ company })));
  };

  private readonly temporal: StrategyRunner<'temporal'> = async (embedding, subQuery, s, n) => {
    if (s.years.length === 0) return this.semantic(embedding, subQuery, { kind: 'semantic' }, n);
    return this.fanOut(embedding, n, s.years.map(year => ({ year })));
  };

  private async search(embedding: readonly number[], k: number, filter?: IndexFilter): Promise<EvidenceItem[]> {
    const hits = await this.index.query(embedding, k, filter);
    return hits.map(toEvidence).sort(byDistance);
  }

  // One filtered query per value, each for ceil(n / count) + 1, merged and cut to n
  private async fanOut(embedding: readonly number[], n: number, filters: readonly IndexFilter[]): Promise<EvidenceItem[]> {
    const perFilter = Math.ceil(n / filters.length) + 1;
    const groups = await Promise.all(filters.map(f => this.search(embedding, perFilter, f)));
    return groups.flat().sort(byDistance).slice(0, n);
  }

  private run(embedding: readonly number[], subQuery: string, strategy: RetrievalStrategy, n: number): Promise<EvidenceItem[]> {
    switch (strategy.kind) {
      case 'semantic':
        return this.semantic(embedding, subQuery, strategy, n);
      case 'hybrid':
        return this.hybrid(embedding, subQuery, strategy, n);
      case 'company_focused':
        return this.companyFocused(embedding, subQuery, strategy, n);
      case 'temporal':
        return this.temporal(embedding, subQuery, strategy, n);
    }
  }

  /**
   * Evidence for one sub-query, ascending by distance.
   * @throws PipelineError (stage `retrieval`) when embedding or the index fails
   */
  async retrieve(
    subQuery: string,
    strategy: RetrievalStrategy = { kind: 'semantic' },
    options: RetrieveOptions = {},
  ): Promise<EvidenceItem[]> {
    const n = options.nResults ?? this.defaultResults;
    if (n <= 0) return [];

    try {
      const embedding = await this.embedder.embed(subQuery, 'query');
      const items = await this.run(embedding, subQuery, strategy, n);
      log.debug('retrieved evidence', {
        subQuery,
        strategy: describeStrategy(strategy),
        count: items.length,
      });
      return items;
    } catch (err) {
      throw new PipelineError(
        `Retrieval failed for "${subQuery}": ${errorMessage(err)}`,
        'retrieval',
        err,
      );
    }
  }

  /**
   * Retrieve every sub-query in turn and merge the results. Any failure
   * rejects the whole call.
   */
  async multiQuery(
    subQueries: readonly string[],
    strategy: RetrievalStrategy = { kind: 'semantic' },
    nPerQuery = DEFAULT_RESULTS_PER_MULTI_QUERY,
  ): Promise<MultiQueryHit[]> {
    const groups: Array<[string, EvidenceItem[]]> = [];
    for (const subQuery of subQueries) {
      groups.push([subQuery, await this.retrieve(subQuery, strategy, { nResults: nPerQuery })]);
    }
    return mergeEvidence(groups);
  }
}
