// Query decomposer: turns one question into independently retrievable sub-queries
// Deterministic per type except complex_multi_aspect, which asks the model

import type { GenerativeModel } from '../bridge/anthropic-model.js';
import { ALL_COMPANIES, COMPANY_NAMES, DEFAULT_TARGET_YEAR } from '../config/vocabulary.js';
import type { ClassificationResult, QueryType, Ticker, Year } from '../types/query.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Decomposer');

type DecompositionRule = (query: string, c: ClassificationResult) => string[] | Promise<string[]>;

function targetYear(c: ClassificationResult): Year {
  return c.years[0] ?? DEFAULT_TARGET_YEAR;
}

function companiesOrAll(c: ClassificationResult): readonly Ticker[] {
  return c.companies.length > 0 ? c.companies : ALL_COMPANIES;
}

/** Companies for a segment question: classified ones, else exactly one named company, else all */
export function segmentCompanies(query: string, c: ClassificationResult): readonly Ticker[] {
  if (c.companies.length > 0) return c.companies;
  const lower = query.toLowerCase();
  const named = ALL_COMPANIES.filter(t => lower.includes(COMPANY_NAMES[t].toLowerCase()));
  return named.length === 1 ? named : ALL_COMPANIES;
}

export function decomposeYoY(query: string, c: ClassificationResult): string[] {
  if (c.years.length < 2) return [query];
  const metrics = c.metrics.length > 0 ? c.metrics : ['revenue'];
  return companiesOrAll(c).flatMap(company =>
    metrics.flatMap(metric => c.years.map(year => `${company} ${metric} ${year}`)),
  );
}

export function decomposeCrossCompany(_query: string, c: ClassificationResult): string[] {
  const metrics = c.metrics.length > 0 ? c.metrics : ['operating margin'];
  const year = targetYear(c);
  return companiesOrAll(c).flatMap(company => metrics.map(metric => `${company} ${metric} ${year}`));
}

export function decomposeSegment(query: string, c: ClassificationResult): string[] {
  const year = targetYear(c);
  return segmentCompanies(query, c).flatMap(company => [
    `${company} total revenue ${year}`,
    `${company} segment revenue breakdown ${year}`,
  ]);
}

export function buildDecompositionPrompt(query: string, c: ClassificationResult): string {
  return `Break down this complex financial query into 2-4 simpler sub-queries that can be answered independently.
Each sub-query should ask for a specific metric for a specific company and year.

Original query: "${query}"
Companies mentioned: ${JSON.stringify(c.companies)}
Years mentioned: ${JSON.stringify(c.years)}
Metrics mentioned: ${JSON.stringify(c.metrics)}

Format each sub-query on its own line as: "[COMPANY] [METRIC] [YEAR]"

Sub-queries:`;
}

/** One sub-query per non-empty line, list markers stripped, echoed header skipped */
export function parseSubQueries(response: string): string[] {
  return response
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0 && !/^sub-queries\b/i.test(line))
    .map(line => line.replace(/^\d+\.\s*/, '').replace(/^-\s*/, '').trim())
    .filter(line => line.length > 0);
}

export class QueryDecomposer {
  private readonly rules: Record<QueryType, DecompositionRule>;

  constructor(private readonly model: GenerativeModel) {
    this.rules = {
      simple_direct: (query) => [query],
      comparative_yoy: decomposeYoY,
      cross_company: decomposeCrossCompany,
      segment_analysis: decomposeSegment,
      complex_multi_aspect: (query, c) => this.decomposeWithModel(query, c),
    };
  }

  /** Never empty; falls back to the original query */
  async decompose(query: string, classification: ClassificationResult): Promise<string[]> {
    const subQueries = await this.rules[classification.type](query, classification);
    return subQueries.length > 0 ? subQueries : [query];
  }

  private async decomposeWithModel(query: string, c: ClassificationResult): Promise<string[]> {
    try {
      const response = await this.model.generate(buildDecompositionPrompt(query, c), {
        temperature: 0,
        maxTokens: 500,
      });
      const subQueries = parseSubQueries(response);
      return subQueries.length > 0 ? subQueries : [query];
    } catch (err) {
      log.warn('model decomposition failed', { error: errorMessage(err) });
      return [query];
    }
  }
}
