export * from './id.js';
export * from './process.js';
