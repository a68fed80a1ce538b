export * from './public-ip-resolver.js';
export * from './services.js';
