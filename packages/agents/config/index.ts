export { loadSettings } from './settings.js';
export type { Settings, IndexBackend } from './settings.js';
export { createVectorIndex } from './database.js';
export * from './vocabulary.js';
