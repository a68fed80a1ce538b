export * from './config-watcher.js';
export * from './latest-signal.js';
