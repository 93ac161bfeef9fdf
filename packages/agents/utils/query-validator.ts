// Gatekeeping for incoming questions, applied before any model call

import { VALIDATION_KEYWORDS } from '../config/vocabulary.js';

export const MIN_QUERY_LENGTH = 5;
export const MAX_QUERY_LENGTH = 500;

export type ValidationResult =
  | { valid: true }
  | { valid: false; reason: string };

/** Trim and collapse internal whitespace */
export function preprocessQuery(query: string): string {
  return query.trim().replace(/\s+/g, ' ');
}

export function validateQuery(query: string): ValidationResult {
  if (query.trim().length < MIN_QUERY_LENGTH) {
    return { valid: false, reason: 'Query too short' };
  }
  if (query.length > MAX_QUERY_LENGTH) {
    return { valid: false, reason: 'Query too long' };
  }
  const lower = query.toLowerCase();
  if (!VALIDATION_KEYWORDS.some(k => lower.includes(k))) {
    return { valid: false, reason: "Query doesn't appear to be financial-related" };
  }
  return { valid: true };
}
