// Pick the sentence of a chunk that best matches a sub-query, for source citations

export const EXCERPT_MAX_LENGTH = 200;
const MIN_SENTENCE_LENGTH = 50;

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) + '...' : text;
}

/**
 * Score each sentence longer than 50 characters by how many sub-query terms it
 * contains; the first highest-scoring sentence wins. With no scoring sentence
 * the start of the chunk is used.
 */
export function extractExcerpt(text: string, query: string, maxLength = EXCERPT_MAX_LENGTH): string {
  const terms = query.toLowerCase().match(/\b\w+\b/g) ?? [];

  let best = '';
  let bestScore = 0;
  for (const sentence of text.split(/[.!?]+/)) {
    if (sentence.length <= MIN_SENTENCE_LENGTH) continue;
    const lower = sentence.toLowerCase();
    const score = terms.filter(t => lower.includes(t)).length;
    if (score > bestScore) {
      bestScore = score;
      best = sentence.trim();
    }
  }

  return truncate(best || text, maxLength);
}
