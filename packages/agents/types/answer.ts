// Synthesis - the terminal answer returned to callers

import { z } from 'zod';
import { TICKERS } from './query.js';

export const CONFIDENCE_LEVELS = ['high', 'medium', 'low'] as const;

export type Confidence = typeof CONFIDENCE_LEVELS[number];

export const SourceCitationSchema = z.object({
  company: z.enum(TICKERS),
  year: z.number().int(),
  excerpt: z.string(),
  section: z.string(),
  relevanceScore: z.number(),
});

export const SynthesizedAnswerSchema = z.object({
  query: z.string(),
  answer: z.string(),
  reasoning: z.string(),
  subQueries: z.array(z.string()).readonly(),
  sources: z.array(SourceCitationSchema.readonly()).max(5).readonly(),
  confidence: z.enum(CONFIDENCE_LEVELS),
}).readonly();

export type SourceCitation = z.infer<typeof SourceCitationSchema>;
export type SynthesizedAnswer = z.infer<typeof SynthesizedAnswerSchema>;

export function isConfidence(value: string): value is Confidence {
  return CONFIDENCE_LEVELS.some(c => c === value);
}
