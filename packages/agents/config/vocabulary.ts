// Fixed vocabularies for query understanding
// Companies in the filing corpus, their aliases, and the financial term lists

import type { QueryType, Ticker, Year } from '../types/query.js';

// Alias → canonical ticker; table order is the order companies are reported in
export const COMPANY_ALIASES: ReadonlyArray<readonly [Ticker, readonly string[]]> = [
  ['GOOGL', ['google', 'googl', 'alphabet']],
  ['MSFT', ['microsoft', 'msft']],
  ['NVDA', ['nvidia', 'nvda']],
];

export const COMPANY_NAMES: Record<Ticker, string> = {
  GOOGL: 'Google',
  MSFT: 'Microsoft',
  NVDA: 'NVIDIA',
};

/** Every company in the corpus; the default when a query names none */
export const ALL_COMPANIES: readonly Ticker[] = COMPANY_ALIASES.map(([ticker]) => ticker);

export const MIN_YEAR: Year = 2020;
export const MAX_YEAR: Year = 2025;

/** Year used when a query needs one but mentions none */
export const DEFAULT_TARGET_YEAR: Year = 2023;

export const METRIC_VOCABULARY: readonly string[] = [
  'revenue', 'sales', 'income', 'earnings', 'profit', 'margin',
  'operating margin', 'gross margin', 'net income', 'ebitda',
  'cash flow', 'assets', 'liabilities', 'equity', 'expenses',
  'r&d', 'research and development', 'capex', 'operating expenses',
];

export const COMPLEXITY_KEYWORDS: readonly string[] = [
  'compare', 'growth', 'change', 'ratio', 'percentage', 'breakdown',
];

// A query must mention at least one of these to enter the pipeline
export const VALIDATION_KEYWORDS: readonly string[] = [
  'revenue', 'income', 'profit', 'sales', 'margin', 'earnings',
  'financial', 'money', 'dollar', 'billion', 'million', 'growth',
  'year', 'annual', 'quarterly', 'fiscal', 'operating', 'net',
];

// Lexical confirmation terms for the hybrid re-rank
export const HYBRID_KEYWORDS: readonly string[] = [
  'revenue', 'income', 'profit', 'margin', 'earnings', 'sales',
];

type PatternTable = ReadonlyArray<readonly [Exclude<QueryType, 'complex_multi_aspect'>, readonly RegExp[]]>;

// Evaluated in order against the lower-cased query; first type with a match wins.
// complex_multi_aspect is never matched here, only reached as the fallback.
export const QUERY_PATTERNS: PatternTable = [
  ['simple_direct', [
    /what (was|is) .+ (revenue|income|profit|margin)/,
    /(revenue|income|sales|profit) .+ (in|for) \d{4}/,
    /total .+ \d{4}/,
  ]],
  ['comparative_yoy', [
    /(grow|growth|increase|decrease|change)\b.*\bfrom \d{4} to \d{4}/,
    /compare .+ \d{4} (and|to|vs\.?) \d{4}/,
    /(year over year|year-over-year|yoy|annually)/,
  ]],
  ['cross_company', [
    /which company .+ (highest|lowest|best|worst)/,
    /compare .+ (across|between) .+ (companies|google|microsoft|nvidia)/,
    /(google|microsoft|nvidia) .+ (vs\.?|versus|compared to)/,
  ]],
  ['segment_analysis', [
    /percentage of .+ revenue/,
    /what portion .+ came from/,
    /breakdown .+ by segment/,
  ]],
];

export const QUERY_TYPE_DESCRIPTIONS: Record<QueryType, string> = {
  simple_direct: 'Asking for a single metric for one company/year',
  comparative_yoy: 'Comparing metrics across different years',
  cross_company: 'Comparing metrics across different companies',
  complex_multi_aspect: 'Requires multiple calculations/comparisons',
  segment_analysis: 'Asking about business segment breakdowns',
};
