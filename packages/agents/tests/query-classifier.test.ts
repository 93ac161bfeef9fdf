import { describe, it, expect } from 'vitest';
import {
  QueryClassifier,
  classifyByPatterns,
  complexityScore,
  extractEntities,
  parseQueryType,
} from '../agents/query-classifier.js';
import { failingModel, fakeModel } from './helpers.js';

describe('extractEntities', () => {
  it('maps aliases to tickers in alias-table order without duplicates', () => {
    const e = extractEntities('Compare NVDA, Alphabet and Google against Microsoft');
    expect(e.companies).toEqual(['GOOGL', 'MSFT', 'NVDA']);
  });

  it('keeps only years in range, deduplicated and ascending', () => {
    const e = extractEntities('Revenue in 2023, 2019, 2021 and again 2023, plus 2030');
    expect(e.years).toEqual([2021, 2023]);
  });

  it('matches metric vocabulary by substring', () => {
    const e = extractEntities('What was the operating margin and net income?');
    expect(e.metrics).toEqual(['income', 'margin', 'operating margin', 'net income']);
  });
});

describe('classifyByPatterns', () => {
  it('classifies a direct lookup', () => {
    expect(classifyByPatterns("What was Microsoft's total revenue in 2023?")).toBe('simple_direct');
  });

  it('classifies growth between two years as year-over-year', () => {
    expect(classifyByPatterns("How much did Microsoft's cloud revenue grow from 2022 to 2023?"))
      .toBe('comparative_yoy');
  });

  it('classifies ranking questions as cross-company', () => {
    expect(classifyByPatterns('Which company had the highest operating margin in 2023?')).toBe('cross_company');
  });

  it('classifies segment questions', () => {
    expect(classifyByPatterns('What portion of NVIDIA revenue came from data center?')).toBe('segment_analysis');
    expect(classifyByPatterns('Breakdown of Google revenue by segment')).toBe('segment_analysis');
  });

  it('tries types in table order', () => {
    // matches both a simple-direct and a year-over-year pattern
    expect(classifyByPatterns('What was the revenue change year over year?')).toBe('simple_direct');
  });

  it('does not treat "what were" or earnings questions as direct lookups', () => {
    expect(classifyByPatterns("What were NVIDIA's earnings in 2022 and 2023 year over year?")).toBe('comparative_yoy');
    expect(classifyByPatterns("What was the breakdown of Google's earnings by segment?")).toBe('segment_analysis');
  });

  it('returns null when nothing matches', () => {
    expect(classifyByPatterns("Summarize NVIDIA's financial position")).toBeNull();
  });
});

describe('complexityScore', () => {
  it('adds counts for multiple entities and one per complexity keyword', () => {
    const query = 'Compare revenue growth for Google and Microsoft between 2022 and 2023';
    const e = extractEntities(query);
    // 1 + 2 companies + 2 years + 0 (single metric) + compare + growth
    expect(complexityScore(query, e)).toBe(7);
  });

  it('is 1 for a plain lookup', () => {
    const query = "What was Microsoft's total revenue in 2023?";
    expect(complexityScore(query, extractEntities(query))).toBe(1);
  });
});

describe('parseQueryType', () => {
  it('accepts category names case-insensitively', () => {
    expect(parseQueryType('  SEGMENT_ANALYSIS \n')).toBe('segment_analysis');
    expect(parseQueryType('**Cross_Company**.')).toBe('cross_company');
  });

  it('rejects anything else', () => {
    expect(parseQueryType('The query is CROSS_COMPANY')).toBeNull();
    expect(parseQueryType('')).toBeNull();
  });
});

describe('QueryClassifier', () => {
  it('does not call the model when a pattern matches', async () => {
    const model = fakeModel(async () => 'CROSS_COMPANY');
    const result = await new QueryClassifier(model).classify("What was Microsoft's total revenue in 2023?");

    expect(result).toEqual({
      type: 'simple_direct',
      companies: ['MSFT'],
      years: [2023],
      metrics: ['revenue'],
      complexityScore: 1,
    });
    expect(model.generate).not.toHaveBeenCalled();
  });

  it('asks the model with temperature 0 and 50 tokens when no pattern matches', async () => {
    const model = fakeModel(async () => 'COMPLEX_MULTI_ASPECT');
    const result = await new QueryClassifier(model).classify("Summarize NVIDIA's financial position");

    expect(result.type).toBe('complex_multi_aspect');
    expect(result.companies).toEqual(['NVDA']);
    expect(model.generate).toHaveBeenCalledOnce();
    const [prompt, options] = model.generate.mock.calls[0];
    expect(prompt).toContain('Query: "Summarize NVIDIA\'s financial position"');
    expect(prompt).toContain('5. SEGMENT_ANALYSIS: Asking about business segment breakdowns');
    expect(options).toEqual({ temperature: 0, maxTokens: 50 });
  });

  it('uses the model answer when it names a category', async () => {
    const model = fakeModel(async () => 'segment_analysis');
    const result = await new QueryClassifier(model).classify('How is Alphabet organised financially?');
    expect(result.type).toBe('segment_analysis');
  });

  it('falls back to complex_multi_aspect on unparseable output', async () => {
    const model = fakeModel(async () => 'I think this is about revenue');
    const result = await new QueryClassifier(model).classify("Summarize NVIDIA's financial position");
    expect(result.type).toBe('complex_multi_aspect');
  });

  it('falls back to complex_multi_aspect when the call fails', async () => {
    const result = await new QueryClassifier(failingModel()).classify("Summarize NVIDIA's financial position");
    expect(result.type).toBe('complex_multi_aspect');
  });
});
