// Index factory: selects the vector index backend from FINQA_INDEX_BACKEND
// Supported values: 'local' (default), 'postgres' (alias 'pg')

import type { VectorIndex } from '../types/evidence.js';
import { loadSettings, type IndexBackend, type Settings } from './settings.js';

export type { IndexBackend } from './settings.js';

/**
 * Create a VectorIndex for the configured backend.
 * - `postgres`: PgVectorIndex (pgvector table filing_chunks) on `settings.pg`
 * - `local`: LocalVectorIndex (in-memory, empty until loaded with add())
 */
export async function createVectorIndex(
  settings: Pick<Settings, 'indexBackend' | 'pg'> = loadSettings(),
): Promise<VectorIndex> {
  const backend: IndexBackend = settings.indexBackend;

  switch (backend) {
    case 'postgres': {
      const { PgVectorIndex } = await import('../memory/pg-vector-index.js');
      return new PgVectorIndex({ pg: settings.pg });
    }
    case 'local': {
      const { LocalVectorIndex } = await import('../memory/vector-index.js');
      return new LocalVectorIndex();
    }
  }
}
