export * from './config-store.js';
export * from './config.js';
export * from './loader.js';
