// Orchestrator: runs a question through validation, classification, decomposition,
// per-sub-query retrieval and synthesis. answer() never throws.

import { randomUUID } from 'node:crypto';
import { QueryClassifier } from '../agents/query-classifier.js';
import { QueryDecomposer } from '../agents/query-decomposer.js';
import { Synthesizer } from '../agents/synthesizer.js';
import { AnthropicModel, type GenerativeModel } from '../bridge/anthropic-model.js';
import { HttpEmbeddingProvider } from '../bridge/embedding-client.js';
import { createVectorIndex } from '../config/database.js';
import { loadSettings, type Settings } from '../config/settings.js';
import {
  DEFAULT_RESULTS_PER_MULTI_QUERY,
  DEFAULT_RESULTS_PER_QUERY,
  RetrievalEngine,
  describeStrategy,
  mergeEvidence,
  selectStrategy,
} from '../retrieval/retrieval-engine.js';
import { SynthesizedAnswerSchema, type SynthesizedAnswer } from '../types/answer.js';
import type {
  EmbeddingProvider,
  EvidenceItem,
  IndexStats,
  MultiQueryHit,
  RetrievalStrategy,
  VectorIndex,
} from '../types/evidence.js';
import { DOMAIN_EVENT_TYPES, SimpleEventBus, type DomainEventType, type EventBus } from '../types/events.js';
import { QUERY_TYPES, type ClassificationResult, type QueryType } from '../types/query.js';
import { mapSettled, withTimeout, type Settled } from '../utils/async.js';
import { errorMessage } from '../utils/errors.js';
import { extractFinancialFigures, type FinancialFigure } from '../utils/financial-figures.js';
import { createLogger, setLogLevel } from '../utils/logger.js';
import { preprocessQuery, validateQuery } from '../utils/query-validator.js';
import { BatchRunner, type BatchOptions, type BatchResult } from './batch-runner.js';

const log = createLogger('Orchestrator');

export const DEFAULT_RETRIEVAL_CONCURRENCY = 3;
export const DEFAULT_RETRIEVAL_TIMEOUT_MS = 30_000;
const EXPLAIN_FIGURE_SOURCES = 3;

export interface OrchestratorConfig {
  model: GenerativeModel;
  index: VectorIndex;
  embedder: EmbeddingProvider;
  /** Evidence items per sub-query (default: 6) */
  resultsPerQuery?: number;
  /** Sub-query retrievals in flight (default: 3) */
  retrievalConcurrency?: number;
  /** Per sub-query retrieval budget in ms (default: 30000) */
  retrievalTimeoutMs?: number;
  eventBus?: EventBus;
  onEvent?: (event: { type: DomainEventType; payload: unknown }) => void;
}

export interface AnswerOptions {
  /** Log every stage at info level */
  verbose?: boolean;
}

export interface ExplainResult {
  query: string;
  valid: boolean;
  rejection?: string;
  classification?: ClassificationResult;
  subQueries: string[];
  strategy?: RetrievalStrategy;
  strategyDescription?: string;
  evidence: MultiQueryHit[];
  /** Sub-queries whose retrieval failed or timed out; they contribute no evidence */
  retrievalErrors: Array<{ subQuery: string; error: string }>;
  /** Amounts and percentages found in the closest evidence */
  figures: FinancialFigure[];
}

export type ComponentStatus = 'ready' | 'unavailable';

export interface SystemStats {
  index: IndexStats | null;
  indexError?: string;
  components: {
    classifier: ComponentStatus;
    decomposer: ComponentStatus;
    retrieval: ComponentStatus;
    synthesizer: ComponentStatus;
  };
  supportedQueryTypes: readonly QueryType[];
  retrieval: {
    resultsPerQuery: number;
    concurrency: number;
    timeoutMs: number;
  };
}

export const SYSTEM_ERROR_REASONING = 'System error during processing';
export const VALIDATION_FAILED_REASONING = 'Query validation failed';

export class Orchestrator {
  private readonly classifier: QueryClassifier;
  private readonly decomposer: QueryDecomposer;
  private readonly retrieval: RetrievalEngine;
  private readonly synthesizer: Synthesizer;
  private readonly index: VectorIndex;
  private readonly eventBus: EventBus;
  private readonly resultsPerQuery: number;
  private readonly concurrency: number;
  private readonly timeoutMs: number;

  constructor(config: OrchestratorConfig) {
    this.eventBus = config.eventBus ?? new SimpleEventBus();
    this.index = config.index;
    this.resultsPerQuery = config.resultsPerQuery ?? DEFAULT_RESULTS_PER_QUERY;
    this.concurrency = config.retrievalConcurrency ?? DEFAULT_RETRIEVAL_CONCURRENCY;
    this.timeoutMs = config.retrievalTimeoutMs ?? DEFAULT_RETRIEVAL_TIMEOUT_MS;

    this.classifier = new QueryClassifier(config.model);
    this.decomposer = new QueryDecomposer(config.model);
    this.retrieval = new RetrievalEngine({
      index: config.index,
      embedder: config.embedder,
      defaultResults: this.resultsPerQuery,
    });
    this.synthesizer = new Synthesizer(config.model);

    if (config.onEvent) {
      const handler = config.onEvent;
      for (const type of DOMAIN_EVENT_TYPES) {
        this.eventBus.on(type, (e) => handler({ type: e.type, payload: e.payload }));
      }
    }
  }

  /**
   * Wire the production collaborators from settings: Anthropic model,
   * HTTP embeddings and the configured index backend.
   */
  static async fromSettings(settings: Settings = loadSettings()): Promise<Orchestrator> {
    setLogLevel(settings.logLevel);
    return new Orchestrator({
      model: AnthropicModel.fromSettings(settings),
      embedder: HttpEmbeddingProvider.fromSettings(settings),
      index: await createVectorIndex(settings),
      resultsPerQuery: settings.resultsPerQuery,
      retrievalConcurrency: settings.retrievalConcurrency,
      retrievalTimeoutMs: settings.retrievalTimeoutMs,
    });
  }

  private emit(type: DomainEventType, requestId: string, payload: unknown): void {
    try {
      this.eventBus.emit({ eventId: randomUUID(), type, timestamp: new Date(), requestId, payload });
    } catch (err) {
      log.warn('event handler failed', { type, error: errorMessage(err) });
    }
  }

  async answer(query: string, options: AnswerOptions = {}): Promise<SynthesizedAnswer> {
    const requestId = randomUUID();
    const trace = options.verbose
      ? (message: string, data?: Record<string, unknown>) => log.trace(message, { requestId, ...data })
      : (message: string, data?: Record<string, unknown>) => log.debug(message, { requestId, ...data });

    const cleaned = preprocessQuery(query);
    this.emit('QueryReceived', requestId, { query: cleaned });

    try {
      const validation = validateQuery(query);
      if (!validation.valid) {
        trace('query rejected', { reason: validation.reason });
        this.emit('QueryRejected', requestId, { query: cleaned, reason: validation.reason });
        return SynthesizedAnswerSchema.parse({
          query: cleaned,
          answer: `Invalid query: ${validation.reason}`,
          reasoning: VALIDATION_FAILED_REASONING,
          subQueries: [],
          sources: [],
          confidence: 'low',
        });
      }

      const classification = await this.classifier.classify(cleaned);
      trace('classified', { ...classification });
      this.emit('QueryClassified', requestId, classification);

      const subQueries = await this.decomposer.decompose(cleaned, classification);
      trace('decomposed', { subQueries });
      this.emit('QueryDecomposed', requestId, { subQueries });

      const strategy = selectStrategy(classification);
      const evidence = await this.retrieveAll(requestId, subQueries, strategy, trace);

      const answer = await this.synthesizer.synthesize(cleaned, subQueries, evidence, classification.type);
      trace('synthesized', { confidence: answer.confidence, sources: answer.sources.length });
      this.emit('AnswerSynthesized', requestId, { confidence: answer.confidence, sources: answer.sources.length });
      return answer;
    } catch (err) {
      const message = errorMessage(err);
      log.error('query processing failed', { requestId, error: message });
      this.emit('AnswerFailed', requestId, { error: message });
      return SynthesizedAnswerSchema.parse({
        query: cleaned,
        answer: `An error occurred while processing your query: ${message}`,
        reasoning: SYSTEM_ERROR_REASONING,
        subQueries: [],
        sources: [],
        confidence: 'low',
      });
    }
  }

  // Every sub-query settles before synthesis; a failed or timed-out one contributes no evidence
  private async retrieveAll(
    requestId: string,
    subQueries: readonly string[],
    strategy: RetrievalStrategy,
    trace: (message: string, data?: Record<string, unknown>) => void,
  ): Promise<Map<string, readonly EvidenceItem[]>> {
    const settled = await this.settleRetrievals(subQueries, strategy, this.resultsPerQuery);

    const evidence = new Map<string, readonly EvidenceItem[]>();
    settled.forEach((result, i) => {
      const subQuery = subQueries[i];
      if (result.status === 'fulfilled') {
        evidence.set(subQuery, result.value);
        trace('retrieved', { subQuery, strategy: describeStrategy(strategy), count: result.value.length });
        this.emit('RetrievalCompleted', requestId, { subQuery, count: result.value.length });
      } else {
        const error = errorMessage(result.reason);
        evidence.set(subQuery, []);
        log.warn('sub-query retrieval failed', { requestId, subQuery, error });
        this.emit('RetrievalFailed', requestId, { subQuery, error });
      }
    });
    return evidence;
  }

  private settleRetrievals(
    subQueries: readonly string[],
    strategy: RetrievalStrategy,
    nResults: number,
  ): Promise<Settled<EvidenceItem[]>[]> {
    return mapSettled(subQueries, this.concurrency, (subQuery) =>
      withTimeout(
        this.retrieval.retrieve(subQuery, strategy, { nResults }),
        this.timeoutMs,
        `retrieval for "${subQuery}"`,
      ),
    );
  }

  /**
   * Answer each query in turn; progress is reported per query.
   */
  async batchAnswer(
    queries: readonly string[],
    options: Pick<BatchOptions, 'onProgress'> & AnswerOptions = {},
  ): Promise<BatchResult> {
    const runner = new BatchRunner(q => this.answer(q, { verbose: options.verbose }));
    return runner.run(queries, { concurrency: 1, onProgress: options.onProgress });
  }

  /**
   * How a query would be processed (classification, sub-queries, strategy and
   * merged evidence) without a synthesis call. Sub-queries are retrieved
   * under the same concurrency and timeout as answer(); failures are listed
   * in retrievalErrors.
   */
  async explain(query: string): Promise<ExplainResult> {
    const cleaned = preprocessQuery(query);
    const validation = validateQuery(query);
    if (!validation.valid) {
      return {
        query: cleaned,
        valid: false,
        rejection: validation.reason,
        subQueries: [],
        evidence: [],
        retrievalErrors: [],
        figures: [],
      };
    }

    const classification = await this.classifier.classify(cleaned);
    const subQueries = await this.decomposer.decompose(cleaned, classification);
    const strategy = selectStrategy(classification);
    const settled = await this.settleRetrievals(subQueries, strategy, DEFAULT_RESULTS_PER_MULTI_QUERY);

    const retrievalErrors: ExplainResult['retrievalErrors'] = [];
    const groups = settled.map((result, i): [string, EvidenceItem[]] => {
      const subQuery = subQueries[i];
      if (result.status === 'fulfilled') return [subQuery, result.value];
      const error = errorMessage(result.reason);
      log.warn('sub-query retrieval failed', { subQuery, error });
      retrievalErrors.push({ subQuery, error });
      return [subQuery, []];
    });
    const evidence = mergeEvidence(groups);
    const figures = evidence
      .slice(0, EXPLAIN_FIGURE_SOURCES)
      .flatMap(item => extractFinancialFigures(item.text));

    return {
      query: cleaned,
      valid: true,
      classification,
      subQueries,
      strategy,
      strategyDescription: describeStrategy(strategy),
      evidence,
      retrievalErrors,
      figures,
    };
  }

  async getSystemStats(): Promise<SystemStats> {
    let index: IndexStats | null = null;
    let indexError: string | undefined;
    try {
      index = await this.index.stats();
    } catch (err) {
      indexError = errorMessage(err);
      log.warn('index statistics unavailable', { error: indexError });
    }

    return {
      index,
      ...(indexError !== undefined ? { indexError } : {}),
      components: {
        classifier: 'ready',
        decomposer: 'ready',
        retrieval: index ? 'ready' : 'unavailable',
        synthesizer: 'ready',
      },
      supportedQueryTypes: QUERY_TYPES,
      retrieval: {
        resultsPerQuery: this.resultsPerQuery,
        concurrency: this.concurrency,
        timeoutMs: this.timeoutMs,
      },
    };
  }
}
