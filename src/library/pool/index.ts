export * from './future.js';
export * from './worker-pool.js';
