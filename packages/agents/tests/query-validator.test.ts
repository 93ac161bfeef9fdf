import { describe, it, expect } from 'vitest';
import { preprocessQuery, validateQuery } from '../utils/query-validator.js';

describe('preprocessQuery', () => {
  it('trims and collapses whitespace', () => {
    expect(preprocessQuery('  What was\tNVIDIA   revenue\n in 2023? ')).toBe('What was NVIDIA revenue in 2023?');
  });
});

describe('validateQuery', () => {
  it('accepts a financial question', () => {
    expect(validateQuery("What was Microsoft's total revenue in 2023?")).toEqual({ valid: true });
  });

  it('rejects queries shorter than five characters after trimming', () => {
    expect(validateQuery('  net  ')).toEqual({ valid: false, reason: 'Query too short' });
  });

  it('rejects queries longer than 500 characters', () => {
    expect(validateQuery(`revenue ${'a'.repeat(500)}`)).toEqual({ valid: false, reason: 'Query too long' });
  });

  it('accepts exactly 500 characters', () => {
    expect(validateQuery(`revenue ${'a'.repeat(492)}`)).toEqual({ valid: true });
  });

  it('rejects questions without financial vocabulary', () => {
    expect(validateQuery("What's the weather today?")).toEqual({
      valid: false,
      reason: "Query doesn't appear to be financial-related",
    });
  });

  it('matches keywords case-insensitively', () => {
    expect(validateQuery('NVIDIA EARNINGS OUTLOOK')).toEqual({ valid: true });
  });
});
