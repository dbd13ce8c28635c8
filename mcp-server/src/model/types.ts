// ═══════════════════════════════════════════════════════════════════════════
// PROCESS MODEL TYPES
// Elements of a BPMN process model as seen by state reconstruction
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Task-like element (any BPMN activity type)
 */
export interface Activity {
  id: string;
  /** Display name, `Unnamed Task <id>` when the element has none */
  name: string;
}

/**
 * Directed sequence flow between two flow nodes
 */
export interface SequenceFlow {
  id: string;
  sourceRef: string;
  targetRef: string;
}

/**
 * Summary of a loaded model
 */
export interface ProcessModelSummary {
  activities: Activity[];
  gateways: string[];
  start_events: string[];
  end_events: string[];
  sequence_flow_count: number;
}

/**
 * BPMN element names treated as activities
 */
export const ACTIVITY_ELEMENTS: ReadonlySet<string> = new Set([
  'task',
  'userTask',
  'serviceTask',
  'manualTask',
  'scriptTask',
  'sendTask',
  'receiveTask',
  'businessRuleTask',
  'callActivity',
]);

export const GATEWAY_ELEMENTS: ReadonlySet<string> = new Set([
  'exclusiveGateway',
  'parallelGateway',
  'inclusiveGateway',
  'eventBasedGateway',
  'complexGateway',
]);
