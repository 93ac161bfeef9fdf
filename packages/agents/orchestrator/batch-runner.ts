// Batch runner: answers many questions, one after another by default,
// collecting each answer with its duration and reporting progress

import type { SynthesizedAnswer } from '../types/answer.js';
import { errorMessage } from '../utils/errors.js';

export interface BatchOptions {
  /** Max questions in flight (default: 1, strictly sequential) */
  concurrency?: number;
  /** Progress callback */
  onProgress?: (progress: BatchProgress) => void;
}

export interface BatchProgress {
  completed: number;
  total: number;
  current: string;
  status: 'running' | 'completed' | 'failed';
  error?: string;
}

export interface BatchItem {
  query: string;
  answer: SynthesizedAnswer | null;
  error?: string;
  durationMs: number;
}

export interface BatchResult {
  items: BatchItem[];
  totalDurationMs: number;
}

export type Answerer = (query: string) => Promise<SynthesizedAnswer>;

export class BatchRunner {
  constructor(private readonly answer: Answerer) {}

  /**
   * Answer every query; a failure is recorded on its item and the batch moves on.
   */
  async run(queries: readonly string[], options: BatchOptions = {}): Promise<BatchResult> {
    const { concurrency = 1, onProgress } = options;
    const size = Math.max(1, concurrency);
    const totalStart = Date.now();
    const items: BatchItem[] = [];

    // Process in batches respecting concurrency limit
    for (let i = 0; i < queries.length; i += size) {
      const batch = queries.slice(i, i + size);

      const batchPromises = batch.map(async (query): Promise<BatchItem> => {
        const start = Date.now();

        onProgress?.({
          completed: items.length,
          total: queries.length,
          current: query,
          status: 'running',
        });

        try {
          const answer = await this.answer(query);
          onProgress?.({
            completed: items.length + 1,
            total: queries.length,
            current: query,
            status: 'completed',
          });
          return { query, answer, durationMs: Date.now() - start };
        } catch (err) {
          const error = errorMessage(err);
          onProgress?.({
            completed: items.length + 1,
            total: queries.length,
            current: query,
            status: 'failed',
            error,
          });
          return { query, answer: null, error, durationMs: Date.now() - start };
        }
      });

      items.push(...await Promise.all(batchPromises));
    }

    return { items, totalDurationMs: Date.now() - totalStart };
  }
}

/** Answers in input order, failed items as null */
export function answersOf(result: BatchResult): Array<SynthesizedAnswer | null> {
  return result.items.map(item => item.answer);
}
