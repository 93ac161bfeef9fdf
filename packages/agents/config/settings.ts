// Runtime settings: environment variables (plus .env) parsed into a typed object
// Every component receives its settings explicitly; nothing reads process.env after this

import 'dotenv/config';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const SettingsSchema = z.object({
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  FINQA_MODEL: z.string().min(1).default('claude-haiku-4-5-20251001'),

  EMBEDDING_API_KEY: z.string().min(1).optional(),
  EMBEDDING_BASE_URL: z.string().url().default('https://api.voyageai.com/v1'),
  EMBEDDING_MODEL: z.string().min(1).default('voyage-finance-2'),
  EMBEDDING_TIMEOUT_MS: intFromEnv(15_000),

  FINQA_INDEX_BACKEND: z
    .enum(['postgres', 'pg', 'local'])
    .default('local')
    .transform(v => (v === 'pg' ? 'postgres' : v)),
  FINQA_RESULTS_PER_QUERY: intFromEnv(6),
  FINQA_RETRIEVAL_CONCURRENCY: intFromEnv(3),
  FINQA_RETRIEVAL_TIMEOUT_MS: intFromEnv(30_000),
  FINQA_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('warn'),

  PG_HOST: z.string().default('localhost'),
  PG_PORT: intFromEnv(5432),
  PG_USER: z.string().default('finqa'),
  PG_PASSWORD: z.string().default(''),
  PG_DATABASE: z.string().default('finqa'),
  PG_POOL_MAX: intFromEnv(10),
});

type RawSettings = z.infer<typeof SettingsSchema>;

export type IndexBackend = RawSettings['FINQA_INDEX_BACKEND'];

export interface Settings {
  anthropicApiKey?: string;
  model: string;
  embedding: {
    apiKey?: string;
    baseUrl: string;
    model: string;
    timeoutMs: number;
  };
  indexBackend: IndexBackend;
  resultsPerQuery: number;
  retrievalConcurrency: number;
  retrievalTimeoutMs: number;
  logLevel: RawSettings['FINQA_LOG_LEVEL'];
  pg: {
    host: string;
    port: number;
    user: string;
    password: string;
    database: string;
    poolMax: number;
  };
}

// Blank variables count as unset so `FOO=` in a .env file falls back to the default
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value.trim();
  }
  return out;
}

/**
 * Parse settings from an environment map.
 * @throws ConfigError naming the first invalid variable
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = SettingsSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue ? String(issue.path[0] ?? '') : '';
    throw new ConfigError(
      `Invalid value for ${variable || 'configuration'}: ${issue?.message ?? 'unknown error'}`,
      variable || undefined,
    );
  }

  const s = parsed.data;
  return {
    anthropicApiKey: s.ANTHROPIC_API_KEY,
    model: s.FINQA_MODEL,
    embedding: {
      apiKey: s.EMBEDDING_API_KEY,
      baseUrl: s.EMBEDDING_BASE_URL,
      model: s.EMBEDDING_MODEL,
      timeoutMs: s.EMBEDDING_TIMEOUT_MS,
    },
    indexBackend: s.FINQA_INDEX_BACKEND,
    resultsPerQuery: s.FINQA_RESULTS_PER_QUERY,
    retrievalConcurrency: s.FINQA_RETRIEVAL_CONCURRENCY,
    retrievalTimeoutMs: s.FINQA_RETRIEVAL_TIMEOUT_MS,
    logLevel: s.FINQA_LOG_LEVEL,
    pg: {
      host: s.PG_HOST,
      port: s.PG_PORT,
      user: s.PG_USER,
      password: s.PG_PASSWORD,
      database: s.PG_DATABASE,
      poolMax: s.PG_POOL_MAX,
    },
  };
}
