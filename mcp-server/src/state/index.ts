// ═══════════════════════════════════════════════════════════════════════════
// STATE RECONSTRUCTION MODULE
// Per-case control-flow state of in-flight process instances
// ═══════════════════════════════════════════════════════════════════════════

export * from './types.js';
export * from './state-computer.js';
export * from './serialize.js';
