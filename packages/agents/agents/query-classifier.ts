// Query classifier: entity extraction, rule-based typing, model fallback
// Never throws: an unusable model answer degrades to complex_multi_aspect

import type { GenerativeModel } from '../bridge/anthropic-model.js';
import {
  COMPANY_ALIASES,
  COMPLEXITY_KEYWORDS,
  MAX_YEAR,
  METRIC_VOCABULARY,
  MIN_YEAR,
  QUERY_PATTERNS,
  QUERY_TYPE_DESCRIPTIONS,
} from '../config/vocabulary.js';
import { QUERY_TYPES, isQueryType, type ClassificationResult, type QueryType, type Ticker, type Year } from '../types/query.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Classifier');

export interface ExtractedEntities {
  companies: Ticker[];
  years: Year[];
  metrics: string[];
}

export function extractCompanies(lowerQuery: string): Ticker[] {
  return COMPANY_ALIASES
    .filter(([, aliases]) => aliases.some(alias => lowerQuery.includes(alias)))
    .map(([ticker]) => ticker);
}

export function extractYears(lowerQuery: string): Year[] {
  const years = new Set<Year>();
  for (const m of lowerQuery.matchAll(/\b(20\d{2})\b/g)) {
    const year = Number(m[1]);
    if (year >= MIN_YEAR && year <= MAX_YEAR) years.add(year);
  }
  return [...years].sort((a, b) => a - b);
}

export function extractMetrics(lowerQuery: string): string[] {
  return METRIC_VOCABULARY.filter(metric => lowerQuery.includes(metric));
}

export function extractEntities(query: string): ExtractedEntities {
  const lower = query.toLowerCase();
  return {
    companies: extractCompanies(lower),
    years: extractYears(lower),
    metrics: extractMetrics(lower),
  };
}

/** First type in table order with a matching pattern, or null */
export function classifyByPatterns(query: string): QueryType | null {
  const lower = query.toLowerCase();
  for (const [type, patterns] of QUERY_PATTERNS) {
    if (patterns.some(p => p.test(lower))) return type;
  }
  return null;
}

export function complexityScore(query: string, entities: ExtractedEntities): number {
  const lower = query.toLowerCase();
  let score = 1;
  if (entities.companies.length > 1) score += entities.companies.length;
  if (entities.years.length > 1) score += entities.years.length;
  if (entities.metrics.length > 1) score += entities.metrics.length;
  score += COMPLEXITY_KEYWORDS.filter(k => lower.includes(k)).length;
  return score;
}

export function buildClassificationPrompt(query: string): string {
  const categories = QUERY_TYPES
    .map((type, i) => `${i + 1}. ${type.toUpperCase()}: ${QUERY_TYPE_DESCRIPTIONS[type]}`)
    .join('\n');

  return `Classify this financial query into one of these categories:

${categories}

Query: "${query}"

Respond with just the category name.`;
}

/** Exact (case-insensitive) category name, tolerating quotes, bold markers and a trailing period */
export function parseQueryType(response: string): QueryType | null {
  const name = response.trim().replace(/^[*"'`\s]+|[*"'`.\s]+$/g, '').toLowerCase();
  return isQueryType(name) ? name : null;
}

export class QueryClassifier {
  constructor(private readonly model: GenerativeModel) {}

  async classify(query: string): Promise<ClassificationResult> {
    const entities = extractEntities(query);
    const type = classifyByPatterns(query) ?? await this.classifyWithModel(query);

    return {
      type,
      companies: entities.companies,
      years: entities.years,
      metrics: entities.metrics,
      complexityScore: complexityScore(query, entities),
    };
  }

  private async classifyWithModel(query: string): Promise<QueryType> {
    try {
      const response = await this.model.generate(buildClassificationPrompt(query), {
        temperature: 0,
        maxTokens: 50,
      });
      const type = parseQueryType(response);
      if (type) return type;
      log.debug('unrecognised category from model', { response: response.slice(0, 100) });
    } catch (err) {
      log.warn('model classification failed', { error: errorMessage(err) });
    }
    return 'complex_multi_aspect';
  }
}
