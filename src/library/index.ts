export * from './@log/index.js';
export * from './config/index.js';
export * from './dns/index.js';
export * from './driver.js';
export * from './engine/index.js';
export * from './errors.js';
export * from './pool/index.js';
export * from './resolver/index.js';
export * from './watcher/index.js';
