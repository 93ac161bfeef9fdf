// Synthesizer: builds context from evidence, prompts the model, parses the labeled answer
// Confidence is whatever the model reports; sources are derived from evidence only

import type { GenerativeModel } from '../bridge/anthropic-model.js';
import { SynthesizedAnswerSchema, type SourceCitation, type SynthesizedAnswer } from '../types/answer.js';
import type { EvidenceBySubQuery, EvidenceItem } from '../types/evidence.js';
import type { QueryType } from '../types/query.js';
import { errorMessage } from '../utils/errors.js';
import { extractExcerpt } from '../utils/excerpt.js';
import { createLogger } from '../utils/logger.js';
import { parseLabeledResponse, type ResponseParser } from '../utils/response-parser.js';

const log = createLogger('Synthesizer');

const CONTEXT_ITEMS_PER_SUBQUERY = 3;
const CONTEXT_TEXT_LIMIT = 500;
const SOURCES_PER_SUBQUERY = 2;
export const MAX_SOURCES = 5;

export const NO_EVIDENCE_CONTEXT = 'No relevant excerpts were found in the filings for this query.';
export const SYNTHESIS_ERROR_ANSWER =
  "I'm sorry, I couldn't generate an answer from the retrieved filings because of an error.";

type TemplateName = 'direct' | 'yoy' | 'cross_company' | 'complex';

interface TemplateInput {
  query: string;
  subQueries: readonly string[];
  context: string;
}

const OUTPUT_FORMAT = (answer: string, reasoning: string) => `Format your response as:
ANSWER: [${answer}]
REASONING: [${reasoning}]
CONFIDENCE: [high/medium/low]`;

const TEMPLATES: Record<TemplateName, (input: TemplateInput) => string> = {
  direct: ({ query, context }) => `Based on the following context from SEC filings, answer this financial query directly and precisely.

Query: ${query}

Context:
${context}

Provide a direct answer with specific numbers and sources. If you find the exact information, state it clearly. If not, explain what information is available.

${OUTPUT_FORMAT('Direct answer with specific numbers', 'Brief explanation of how you found this information')}`,

  yoy: ({ query, subQueries, context }) => `Based on the context from SEC filings, answer this comparative financial query.

Query: ${query}
Sub-queries analyzed: ${subQueries.join(', ')}

Context:
${context}

Calculate and compare the metrics across the specified time periods. Show:
1. The specific values for each year
2. The change (absolute and percentage if applicable)
3. Any relevant context about the change

${OUTPUT_FORMAT('Comparison with specific numbers and growth/decline percentages', 'Explanation of the calculation and data sources')}`,

  cross_company: ({ query, subQueries, context }) => `Based on the context from SEC filings, answer this cross-company comparison query.

Query: ${query}
Companies being compared through sub-queries: ${subQueries.join(', ')}

Context:
${context}

Compare the metrics across companies and determine:
1. The specific value for each company
2. Which company ranks highest/lowest
3. Any notable differences or context

${OUTPUT_FORMAT('Clear ranking with specific numbers for each company', 'Explanation of the comparison and data sources')}`,

  complex: ({ query, subQueries, context }) => `Based on the context from SEC filings, answer this complex financial query.

Original Query: ${query}
Sub-queries analyzed: ${subQueries.join(', ')}

Context:
${context}

Synthesize a comprehensive answer that addresses all aspects of the original query. Include:
1. Direct answers to each component
2. Any calculations or comparisons needed
3. Overall insights or patterns

${OUTPUT_FORMAT('Comprehensive answer addressing all query aspects', 'Detailed explanation of analysis and synthesis process')}`,
};

const TEMPLATE_FOR_TYPE: Record<QueryType, TemplateName> = {
  simple_direct: 'direct',
  comparative_yoy: 'yoy',
  cross_company: 'cross_company',
  complex_multi_aspect: 'complex',
  segment_analysis: 'complex',
};

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) + '...' : text;
}

/** Evidence lists in sub-query order; sub-queries missing from the map count as empty */
function orderedEvidence(
  subQueries: readonly string[],
  evidence: EvidenceBySubQuery,
): Array<[string, readonly EvidenceItem[]]> {
  const keys = [...subQueries, ...[...evidence.keys()].filter(k => !subQueries.includes(k))];
  return [...new Set(keys)].map((k): [string, readonly EvidenceItem[]] => [k, evidence.get(k) ?? []]);
}

export function buildContext(subQueries: readonly string[], evidence: EvidenceBySubQuery): string {
  const parts: string[] = [];
  for (const [subQuery, items] of orderedEvidence(subQueries, evidence)) {
    if (items.length === 0) continue;
    parts.push(`Results for '${subQuery}':`);
    items.slice(0, CONTEXT_ITEMS_PER_SUBQUERY).forEach((item, i) => {
      parts.push(`  [${i + 1}] ${item.company} ${item.year}: ${truncate(item.text, CONTEXT_TEXT_LIMIT)}`);
    });
    parts.push('');
  }
  return parts.length > 0 ? parts.join('\n') : NO_EVIDENCE_CONTEXT;
}

export function buildPrompt(
  query: string,
  subQueries: readonly string[],
  context: string,
  type: QueryType,
): string {
  return TEMPLATES[TEMPLATE_FOR_TYPE[type]]({ query, subQueries, context });
}

/**
 * Top evidence per sub-query turned into citations, deduplicated by
 * (company, year, section), most relevant first, at most five.
 */
export function extractSources(subQueries: readonly string[], evidence: EvidenceBySubQuery): SourceCitation[] {
  const seen = new Set<string>();
  const sources: SourceCitation[] = [];

  for (const [subQuery, items] of orderedEvidence(subQueries, evidence)) {
    for (const item of items.slice(0, SOURCES_PER_SUBQUERY)) {
      const key = `${item.company}_${item.year}_${item.section}`;
      if (seen.has(key)) continue;
      seen.add(key);
      sources.push({
        company: item.company,
        year: item.year,
        excerpt: extractExcerpt(item.text, subQuery),
        section: item.section,
        relevanceScore: Math.round((1 - item.distance) * 1000) / 1000,
      });
    }
  }

  return sources
    .sort((a, b) => b.relevanceScore - a.relevanceScore)
    .slice(0, MAX_SOURCES);
}

export class Synthesizer {
  constructor(
    private readonly model: GenerativeModel,
    private readonly parse: ResponseParser = parseLabeledResponse,
  ) {}

  async synthesize(
    query: string,
    subQueries: readonly string[],
    evidence: EvidenceBySubQuery,
    type: QueryType,
  ): Promise<SynthesizedAnswer> {
    const context = buildContext(subQueries, evidence);
    const prompt = buildPrompt(query, subQueries, context, type);
    const sources = extractSources(subQueries, evidence);

    let fields: { answer: string; reasoning: string; confidence: SynthesizedAnswer['confidence'] };
    try {
      const raw = await this.model.generate(prompt, { temperature: 0.1, maxTokens: 1000 });
      fields = this.parse(raw);
    } catch (err) {
      log.error('synthesis call failed', { error: errorMessage(err) });
      fields = {
        answer: SYNTHESIS_ERROR_ANSWER,
        reasoning: `Synthesis error: ${errorMessage(err)}`,
        confidence: 'low',
      };
    }

    return SynthesizedAnswerSchema.parse({
      query,
      answer: fields.answer,
      reasoning: fields.reasoning,
      subQueries: [...subQueries],
      sources,
      confidence: fields.confidence,
    });
  }
}
