export * from './ddns-provider.js';
export * from './providers/index.js';
export * from './reconcile.js';
export * from './record-mutator.js';
