import { describe, it, expect } from 'vitest';
import {
  NO_EVIDENCE_CONTEXT,
  SYNTHESIS_ERROR_ANSWER,
  Synthesizer,
  buildContext,
  buildPrompt,
  extractSources,
} from '../agents/synthesizer.js';
import type { EvidenceItem } from '../types/evidence.js';
import { extractExcerpt } from '../utils/excerpt.js';
import { evidence, failingModel, fakeModel } from './helpers.js';

const SENTENCE_A = 'Microsoft Cloud revenue increased 22% to $112 billion driven by Azure consumption growth';
const SENTENCE_B = 'Operating expenses increased modestly due to investments in artificial intelligence';

function evidenceMap(entries: Array<[string, EvidenceItem[]]>): Map<string, readonly EvidenceItem[]> {
  return new Map(entries);
}

describe('buildContext', () => {
  it('lists the top three items per sub-query with company and year', () => {
    const ctx = buildContext(['MSFT revenue 2023'], evidenceMap([
      ['MSFT revenue 2023', [
        evidence('a', 0.1, { text: 'A' }),
        evidence('b', 0.2, { text: 'B', year: 2022 }),
        evidence('c', 0.3, { text: 'C', company: 'NVDA' }),
        evidence('d', 0.4, { text: 'D' }),
      ]],
    ]));

    expect(ctx).toBe([
      "Results for 'MSFT revenue 2023':",
      '  [1] MSFT 2023: A',
      '  [2] MSFT 2022: B',
      '  [3] NVDA 2023: C',
      '',
    ].join('\n'));
  });

  it('truncates long chunks to 500 characters plus an ellipsis', () => {
    const ctx = buildContext(['q'], evidenceMap([['q', [evidence('a', 0.1, { text: 'x'.repeat(600) })]]]));
    expect(ctx.split('\n')[1]).toBe(`  [1] MSFT 2023: ${'x'.repeat(500)}...`);
  });

  it('skips sub-queries without evidence', () => {
    const ctx = buildContext(['empty', 'full'], evidenceMap([
      ['empty', []],
      ['full', [evidence('a', 0.1, { text: 'A' })]],
    ]));
    expect(ctx).toBe("Results for 'full':\n  [1] MSFT 2023: A\n");
  });

  it('says so when there is no evidence at all', () => {
    expect(buildContext(['q'], new Map())).toBe(NO_EVIDENCE_CONTEXT);
  });
});

describe('buildPrompt', () => {
  it('picks the template by query type', () => {
    expect(buildPrompt('q', ['a'], 'ctx', 'simple_direct')).toContain('answer this financial query directly and precisely');
    expect(buildPrompt('q', ['a'], 'ctx', 'comparative_yoy')).toContain('The change (absolute and percentage if applicable)');
    expect(buildPrompt('q', ['a', 'b'], 'ctx', 'cross_company')).toContain('Companies being compared through sub-queries: a, b');
    expect(buildPrompt('q', ['a'], 'ctx', 'segment_analysis')).toContain('Original Query: q');
    expect(buildPrompt('q', ['a'], 'ctx', 'complex_multi_aspect')).toContain('Original Query: q');
  });

  it('always asks for the three labeled fields', () => {
    const prompt = buildPrompt('q', [], 'ctx', 'simple_direct');
    expect(prompt).toContain('ANSWER: [');
    expect(prompt).toContain('REASONING: [');
    expect(prompt).toContain('CONFIDENCE: [high/medium/low]');
  });
});

describe('extractSources', () => {
  it('takes the top two per sub-query, deduplicated by company/year/section', () => {
    const sources = extractSources(['q1', 'q2'], evidenceMap([
      ['q1', [
        evidence('a', 0.1, { section: 'Item 7' }),
        evidence('b', 0.2, { section: 'Item 7' }),
        evidence('c', 0.05, { section: 'Item 8' }),
      ]],
      ['q2', [
        evidence('d', 0.3, { company: 'NVDA' }),
        evidence('e', 0.4, { company: 'NVDA', year: 2022 }),
      ]],
    ]));

    expect(sources.map(s => [s.company, s.year, s.section, s.relevanceScore])).toEqual([
      ['MSFT', 2023, 'Item 7', 0.9],
      ['NVDA', 2023, 'Item 7', 0.7],
      ['NVDA', 2022, 'Item 7', 0.6],
    ]);
  });

  it('rounds relevance to three decimals and caps the list at five', () => {
    const items = [1, 2, 3, 4, 5, 6].map(i => evidence(`c${i}`, 0.1234 * i, { year: 2019 + i }));
    const entries: Array<[string, EvidenceItem[]]> = items.map((item, i) => [`q${i}`, [item]]);
    const sources = extractSources(entries.map(([k]) => k), evidenceMap(entries));

    expect(sources).toHaveLength(5);
    expect(sources.map(s => s.relevanceScore)).toEqual([0.877, 0.753, 0.63, 0.506, 0.383]);
  });

  it('uses the best-matching sentence as the excerpt', () => {
    const text = `Short one. ${SENTENCE_B}. ${SENTENCE_A}. Tail.`;
    const [source] = extractSources(['MSFT cloud revenue 2023'], evidenceMap([
      ['MSFT cloud revenue 2023', [evidence('a', 0.1, { text })]],
    ]));
    expect(source.excerpt).toBe(SENTENCE_A);
  });
});

describe('extractExcerpt', () => {
  it('falls back to the first 200 characters', () => {
    const text = 'y'.repeat(250);
    expect(extractExcerpt(text, 'revenue')).toBe(`${'y'.repeat(200)}...`);
  });

  it('returns short text unchanged when nothing scores', () => {
    expect(extractExcerpt('Too short.', 'revenue')).toBe('Too short.');
  });
});

describe('Synthesizer', () => {
  const subQueries = ['MSFT cloud revenue 2023'];
  const ev = evidenceMap([['MSFT cloud revenue 2023', [evidence('a', 0.25, { text: `${SENTENCE_A}.` })]]]);

  it('parses the model output into a validated answer', async () => {
    const model = fakeModel(async () => 'ANSWER: $111.6 billion\nREASONING: Cloud segment disclosure.\nCONFIDENCE: high');
    const answer = await new Synthesizer(model).synthesize('What was Microsoft cloud revenue in 2023?', subQueries, ev, 'simple_direct');

    expect(answer).toEqual({
      query: 'What was Microsoft cloud revenue in 2023?',
      answer: '$111.6 billion',
      reasoning: 'Cloud segment disclosure.',
      subQueries,
      sources: [{
        company: 'MSFT',
        year: 2023,
        excerpt: SENTENCE_A,
        section: 'Item 7',
        relevanceScore: 0.75,
      }],
      confidence: 'high',
    });
    expect(model.generate.mock.calls[0][1]).toEqual({ temperature: 0.1, maxTokens: 1000 });
    expect(model.generate.mock.calls[0][0]).toContain(`  [1] MSFT 2023: ${SENTENCE_A}.`);
  });

  it('reports a low-confidence error answer when the call fails', async () => {
    const answer = await new Synthesizer(failingModel('quota exceeded'))
      .synthesize('What was Microsoft cloud revenue in 2023?', subQueries, ev, 'simple_direct');

    expect(answer.answer).toBe(SYNTHESIS_ERROR_ANSWER);
    expect(answer.reasoning).toBe('Synthesis error: quota exceeded');
    expect(answer.confidence).toBe('low');
    expect(answer.sources).toHaveLength(1);
  });

  it('accepts a custom response parser', async () => {
    const model = fakeModel(async () => 'raw');
    const answer = await new Synthesizer(model, raw => ({ answer: raw.toUpperCase(), reasoning: 'custom', confidence: 'medium' }))
      .synthesize('q?', [], new Map(), 'complex_multi_aspect');

    expect(answer).toMatchObject({ answer: 'RAW', reasoning: 'custom', confidence: 'medium', sources: [] });
  });
});
