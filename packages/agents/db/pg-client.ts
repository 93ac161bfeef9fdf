// PG client: connection pool singleton for the pgvector-backed filing index
// Provides pool management, health check, migration runner, and vector helpers

import { readFileSync, readdirSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Pool, QueryResult, QueryResultRow } from 'pg';
import { loadSettings, type Settings } from '../config/settings.js';
import { createLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

const log = createLogger('pg-client');

export type PgConfig = Settings['pg'];

// pg is dynamically imported so it's only loaded when the postgres backend is selected.
// The pending promise is cached so concurrent first callers share one pool.
let _poolPromise: Promise<Pool> | null = null;

async function loadPg(): Promise<typeof import('pg').default> {
  const mod = await import('pg');
  return mod.default;
}

async function createPool(config?: PgConfig): Promise<Pool> {
  const pg = await loadPg();
  const c = config ?? loadSettings().pg;

  const pool = new pg.Pool({
    host: c.host,
    port: c.port,
    user: c.user,
    password: c.password,
    database: c.database,
    max: c.poolMax,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
    statement_timeout: 30_000,
    application_name: 'filing-qa',
  });

  // Never crash the process on idle-client errors
  pool.on('error', (err) => {
    log.warn('pool background error, resetting pool', { error: err.message });
    void resetPool();
  });

  // HNSW recall vs. latency for pgvector
  pool.on('connect', (client) => {
    client.query('SET hnsw.ef_search = 100').catch((err: Error) => {
      log.warn('failed to SET hnsw.ef_search', { error: err.message });
    });
  });

  return pool;
}

/**
 * Returns the shared pg.Pool singleton, creating it on first call.
 * `config` only applies to the call that creates the pool; defaults to
 * the `pg` block of loadSettings().
 */
export function getPool(config?: PgConfig): Promise<Pool> {
  if (!_poolPromise) {
    const pending = createPool(config);
    _poolPromise = pending;
    void pending.catch((err: unknown) => {
      log.error('pool creation failed', { error: errorMessage(err) });
      if (_poolPromise === pending) _poolPromise = null;
    });
  }
  return _poolPromise;
}

// Detach the current pool; a pool whose creation failed has nothing to end
async function detachPool(): Promise<Pool | null> {
  const pending = _poolPromise;
  _poolPromise = null;
  if (!pending) return null;
  return pending.then(
    (pool) => pool,
    () => null,
  );
}

/**
 * Verify database connectivity. Returns true if the pool can reach the database.
 */
export async function healthCheck(config?: PgConfig): Promise<boolean> {
  try {
    const pool = await getPool(config);
    const result = await pool.query<{ ok: number }>('SELECT 1 AS ok');
    return result.rows[0]?.ok === 1;
  } catch (err) {
    log.warn('health check failed', { error: errorMessage(err) });
    return false;
  }
}

export function migrationsDir(): string {
  return join(dirname(fileURLToPath(import.meta.url)), 'migrations');
}

/**
 * Run all pending SQL migrations from db/migrations/ in version order.
 * Each migration is wrapped in a transaction with its version recording.
 */
export async function runMigrations(dir = migrationsDir(), config?: PgConfig): Promise<string[]> {
  const pool = await getPool(config);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )
  `);

  const { rows: applied } = await pool.query<{ version: string }>(
    'SELECT version FROM schema_migrations ORDER BY version',
  );
  const appliedSet = new Set(applied.map(r => r.version));

  const migrationFiles = readdirSync(dir)
    .filter(f => f.endsWith('.sql'))
    .sort();

  const ran: string[] = [];
  for (const file of migrationFiles) {
    const version = file.replace('.sql', '');
    if (appliedSet.has(version)) continue;

    const sql = readFileSync(join(dir, file), 'utf-8');

    const client = await pool.connect();
    try {
      await client.query('BEGIN');
      await client.query(sql);
      await client.query(
        'INSERT INTO schema_migrations (version) VALUES ($1)',
        [version],
      );
      await client.query('COMMIT');
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    } finally {
      client.release();
    }

    log.info('applied migration', { version });
    ran.push(version);
  }

  return ran;
}

/**
 * Close the pool and release all connections.
 */
export async function closePool(): Promise<void> {
  const pool = await detachPool();
  if (pool) await pool.end();
}

/**
 * Drop the current pool so the next getPool() creates a fresh one.
 */
export async function resetPool(): Promise<void> {
  const pool = await detachPool();
  if (!pool) return;
  try {
    await pool.end();
  } catch (err) {
    log.debug('ending a broken pool failed', { error: errorMessage(err) });
  }
}

const RECOVERABLE_MESSAGES = [
  'Connection terminated',
  'recovery mode',
  'the database system is starting up',
  'connection refused',
  'terminating connection',
];

export function isRecoverable(err: unknown): boolean {
  const msg = errorMessage(err);
  return RECOVERABLE_MESSAGES.some(m => msg.includes(m));
}

export interface QueryRetryOptions {
  /** Connection settings used if this call creates the pool */
  config?: PgConfig;
  maxRetries?: number;
  retryDelayMs?: number;
}

/**
 * Execute a query with automatic retry on connection/recovery errors.
 * Uses exponential backoff: base delay * 3^attempt (1s → 3s → 9s by default).
 */
export async function queryWithRetry<T extends QueryResultRow>(
  queryText: string,
  params: unknown[],
  options: QueryRetryOptions = {},
): Promise<QueryResult<T>> {
  const { config, maxRetries = 2, retryDelayMs = 1000 } = options;
  for (let attempt = 0; ; attempt++) {
    try {
      const pool = await getPool(config);
      return await pool.query<T>(queryText, params);
    } catch (err: unknown) {
      if (attempt < maxRetries && isRecoverable(err)) {
        const delay = retryDelayMs * Math.pow(3, attempt);
        log.warn(`queryWithRetry attempt ${attempt + 1}/${maxRetries} failed, retrying`, {
          error: errorMessage(err),
          delayMs: delay,
        });
        await resetPool();
        await new Promise(r => setTimeout(r, delay));
        continue;
      }

      log.error(`queryWithRetry failed after ${attempt + 1} attempt(s)`, { error: errorMessage(err) });
      throw err;
    }
  }
}

/**
 * Convert an embedding to a pgvector literal string: `[0.1,0.2,...]`
 */
export function toVectorLiteral(vec: readonly number[]): string {
  return `[${vec.map(v => v.toFixed(6)).join(',')}]`;
}
