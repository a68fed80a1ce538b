export * from './reconciliation-engine.js';
