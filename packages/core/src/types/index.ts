export * from './target.js';
export * from './actions.js';
export * from './guard.js';
export * from './transaction.js';
