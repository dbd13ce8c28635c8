// ═══════════════════════════════════════════════════════════════════════════
// EVENT LOG MODULE
// CSV loading, case grouping and cut-off slicing
// ═══════════════════════════════════════════════════════════════════════════

export * from './types.js';
export * from './reader.js';
export * from './timestamps.js';
export * from './operations.js';
