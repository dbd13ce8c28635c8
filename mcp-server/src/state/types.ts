// ═══════════════════════════════════════════════════════════════════════════
// CASE STATE TYPES
// Snapshot of one in-flight case, enough to resume simulation from "now"
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Tokens and running activities of a case
 */
export interface ControlFlowState {
  /** Sequence flows holding a token (sorted) */
  flows: string[];
  /** Ids of the ongoing model activities (sorted) */
  activities: string[];
}

/**
 * Activity started but not yet finished
 */
export interface OngoingActivity {
  /** Model activity id, null when the log label is not a model activity */
  id: string | null;
  start_time: Date;
  resource: string;
  enabled_time: Date | null;
}

export interface EnabledActivity {
  id: string;
  /** null when no enabling time could be determined */
  enabled_time: Date | null;
}

export interface EnabledGateway {
  id: string;
  enabled_time: Date;
}

export interface CaseState {
  control_flow_state: ControlFlowState;
  ongoing_activities: OngoingActivity[];
  enabled_activities: EnabledActivity[];
  enabled_gateways: EnabledGateway[];
}

/**
 * CaseState with timestamps rendered as ISO 8601 strings
 */
export interface SerializedCaseState {
  control_flow_state: ControlFlowState;
  ongoing_activities: Array<{
    id: string | null;
    start_time: string;
    resource: string;
    enabled_time: string | null;
  }>;
  enabled_activities: Array<{ id: string; enabled_time: string | null }>;
  enabled_gateways: Array<{ id: string; enabled_time: string }>;
}
