// Extract dollar amounts and percentages from filing text
// Handles "$211.9 billion", "$1,234 million", "15 million dollars", "22%"
// Informational: reported by explain(), never used to rewrite a model answer

export type FigureKind = 'amount' | 'percentage';

export interface FinancialFigure {
  kind: FigureKind;
  /** Base units for amounts (dollars); percentage points for percentages */
  value: number;
  unit?: 'billion' | 'million' | 'thousand';
  originalText: string;
  position: number;
}

const MULTIPLIERS = {
  billion: 1e9,
  million: 1e6,
  thousand: 1e3,
} as const;

type Unit = keyof typeof MULTIPLIERS;

function isUnit(value: string): value is Unit {
  return value === 'billion' || value === 'million' || value === 'thousand';
}

function parseAmount(numStr: string, unit?: Unit): number {
  const num = parseFloat(numStr.replace(/,/g, ''));
  if (isNaN(num)) return NaN;
  return unit ? num * MULTIPLIERS[unit] : num;
}

// "$394 billion", "$1,234.5"
const DOLLAR_RE = /\$\s?(\d+(?:,\d{3})*(?:\.\d+)?)(?:\s*(billion|million|thousand)\b)?/gi;
// "15 million dollars"
const DOLLARS_WORD_RE = /(?<!\$\s?)\b(\d+(?:,\d{3})*(?:\.\d+)?)\s*(billion|million|thousand)?\s*dollars?\b/gi;
// "22%", "5.5 %"
const PCT_RE = /(\d+(?:\.\d+)?)\s*%/g;

function collectAmounts(text: string, re: RegExp, out: FinancialFigure[]): void {
  for (const m of text.matchAll(re)) {
    if (m.index === undefined) continue;
    const rawUnit = m[2]?.toLowerCase();
    const unit = rawUnit && isUnit(rawUnit) ? rawUnit : undefined;
    const value = parseAmount(m[1], unit);
    if (isNaN(value)) continue;
    out.push({ kind: 'amount', value, unit, originalText: m[0].trim(), position: m.index });
  }
}

/**
 * All amounts and percentages in the text, in order of appearance.
 */
export function extractFinancialFigures(text: string): FinancialFigure[] {
  const figures: FinancialFigure[] = [];
  collectAmounts(text, DOLLAR_RE, figures);
  collectAmounts(text, DOLLARS_WORD_RE, figures);

  for (const m of text.matchAll(PCT_RE)) {
    if (m.index === undefined) continue;
    figures.push({ kind: 'percentage', value: parseFloat(m[1]), originalText: m[0], position: m.index });
  }

  return figures.sort((a, b) => a.position - b.position);
}

/**
 * Percentage change from `previous` to `current`; 0 when there is no base.
 */
export function growthRate(previous: number, current: number): number {
  if (previous === 0) return 0;
  return ((current - previous) / previous) * 100;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Value that immediately follows a metric name, e.g. "operating margin: 42%" → 42.
 */
export function findMetricValue(text: string, metric: string): number | undefined {
  const lower = text.toLowerCase();
  const name = escapeRegExp(metric.toLowerCase());

  const amount = new RegExp(`${name}[:\\s]+\\$?(\\d+(?:,\\d{3})*(?:\\.\\d+)?)\\s*(billion|million|thousand)?`).exec(lower);
  if (amount) {
    const unit = amount[2] && isUnit(amount[2]) ? amount[2] : undefined;
    const value = parseAmount(amount[1], unit);
    if (!isNaN(value)) return value;
  }

  const pct = new RegExp(`${name}[:\\s]+(\\d+(?:\\.\\d+)?)\\s*%`).exec(lower);
  if (pct) return parseFloat(pct[1]);

  return undefined;
}
