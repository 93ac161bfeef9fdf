// Filing Q&A: question answering over SEC 10-K filings
// Classify → decompose → retrieve per sub-query → synthesize

export { Orchestrator } from './orchestrator/coordinator.js';
export type {
  OrchestratorConfig,
  AnswerOptions,
  ExplainResult,
  SystemStats,
} from './orchestrator/coordinator.js';
export { BatchRunner, answersOf } from './orchestrator/batch-runner.js';
export type { BatchOptions, BatchProgress, BatchItem, BatchResult } from './orchestrator/batch-runner.js';

export { QueryClassifier } from './agents/query-classifier.js';
export { QueryDecomposer } from './agents/query-decomposer.js';
export { Synthesizer } from './agents/synthesizer.js';
export { RetrievalEngine, selectStrategy, describeStrategy } from './retrieval/retrieval-engine.js';

export { LocalVectorIndex, PgVectorIndex } from './memory/index.js';
export type { ChunkRecord } from './memory/index.js';

export { AnthropicModel } from './bridge/anthropic-model.js';
export type { GenerativeModel, GenerateOptions } from './bridge/anthropic-model.js';
export { HttpEmbeddingProvider } from './bridge/embedding-client.js';
export type { EmbeddingClientConfig } from './bridge/embedding-client.js';

// Index factory, backend from FINQA_INDEX_BACKEND
export { loadSettings, createVectorIndex } from './config/index.js';
export type { Settings, IndexBackend } from './config/index.js';

export { getPool, closePool, healthCheck, runMigrations } from './db/pg-client.js';
export { EmbeddingQualityError, validateEmbedding } from './db/embedding-guard.js';

export { PipelineError, TimeoutError, ConfigError } from './utils/errors.js';
export { createLogger, setLogLevel } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
export { preprocessQuery, validateQuery } from './utils/query-validator.js';
export { parseLabeledResponse } from './utils/response-parser.js';
export type { ParsedAnswer, ResponseParser } from './utils/response-parser.js';
export { extractFinancialFigures, growthRate, findMetricValue } from './utils/financial-figures.js';
export type { FinancialFigure } from './utils/financial-figures.js';

export * from './types/index.js';
