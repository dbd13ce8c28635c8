export * from './trace-matcher.js';
export * from './replay-matcher.js';
