// ═══════════════════════════════════════════════════════════════════════════
// PROCESS MODEL MODULE
// BPMN parsing and structural queries
// ═══════════════════════════════════════════════════════════════════════════

export * from './types.js';
export * from './bpmn-model.js';
