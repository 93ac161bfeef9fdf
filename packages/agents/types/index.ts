export * from './query.js';
export * from './evidence.js';
export * from './answer.js';
export * from './events.js';
