// Embedding quality guard: validates embedding vectors before they reach the index
// Catches truncated, zeroed or NaN-filled responses from the embedding endpoint

/**
 * Error thrown when an embedding fails quality validation.
 */
export class EmbeddingQualityError extends Error {
  constructor(
    message: string,
    public readonly l2Norm: number,
    public readonly dimension: number,
  ) {
    super(message);
    this.name = 'EmbeddingQualityError';
  }
}

function context(text?: string): string {
  return text ? ` for text "${text.slice(0, 50)}..."` : '';
}

/**
 * Validate an embedding vector.
 *
 * Checks:
 * 1. Non-empty, and of the expected dimension when one is given.
 * 2. Every component finite.
 * 3. Non-zero L2 norm, not constant.
 *
 * @throws EmbeddingQualityError if validation fails
 */
export function validateEmbedding(
  embedding: readonly number[],
  options: { text?: string; dimension?: number } = {},
): void {
  const n = embedding.length;
  if (n === 0) {
    throw new EmbeddingQualityError('Empty embedding vector', 0, 0);
  }

  if (options.dimension !== undefined && n !== options.dimension) {
    throw new EmbeddingQualityError(
      `Embedding dimension ${n} does not match expected ${options.dimension}${context(options.text)}`,
      0,
      n,
    );
  }

  let normSum = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const v of embedding) {
    if (!Number.isFinite(v)) {
      throw new EmbeddingQualityError(`Embedding contains non-finite values${context(options.text)}`, NaN, n);
    }
    normSum += v * v;
    if (v < min) min = v;
    if (v > max) max = v;
  }
  const l2Norm = Math.sqrt(normSum);

  if (l2Norm === 0) {
    throw new EmbeddingQualityError(`Embedding is all zeros${context(options.text)}`, 0, n);
  }

  if (n > 1 && max === min) {
    throw new EmbeddingQualityError(
      `Embedding is constant (${min.toFixed(6)})${context(options.text)}`,
      l2Norm,
      n,
    );
  }
}

/**
 * Compute an embedding and validate the result.
 *
 * @throws EmbeddingQualityError if the embedding fails quality checks
 */
export async function computeValidatedEmbedding(
  computeFn: (text: string) => Promise<number[]>,
  text: string,
  dimension?: number,
): Promise<number[]> {
  const embedding = await computeFn(text);
  validateEmbedding(embedding, { text, dimension });
  return embedding;
}
