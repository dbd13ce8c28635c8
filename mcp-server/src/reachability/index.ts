// ═══════════════════════════════════════════════════════════════════════════
// REACHABILITY GRAPH MODULE
// ═══════════════════════════════════════════════════════════════════════════

export * from './types.js';
export * from './graph.js';
