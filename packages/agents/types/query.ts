// Query understanding - classification and decomposition types

export const QUERY_TYPES = [
  'simple_direct',
  'comparative_yoy',
  'cross_company',
  'complex_multi_aspect',
  'segment_analysis',
] as const;

export type QueryType = typeof QUERY_TYPES[number];

export const TICKERS = ['GOOGL', 'MSFT', 'NVDA'] as const;

export type Ticker = typeof TICKERS[number];

/** Fiscal year of a filing, within the corpus range [2020, 2025] */
export type Year = number;

export interface ClassificationResult {
  readonly type: QueryType;
  readonly companies: readonly Ticker[];
  readonly years: readonly Year[];
  readonly metrics: readonly string[];
  /** Informational only; not consumed downstream */
  readonly complexityScore: number;
}

export function isQueryType(value: string): value is QueryType {
  return QUERY_TYPES.some(t => t === value);
}

export function isTicker(value: string): value is Ticker {
  return TICKERS.some(t => t === value);
}
