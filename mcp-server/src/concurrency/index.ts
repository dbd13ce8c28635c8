export * from './types.js';
export * from './oracle.js';
