// ═══════════════════════════════════════════════════════════════════════════
// REACHABILITY GRAPH TYPES
// Markings (sets of flow tokens) and activity-labeled transitions between them
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Set of sequence-flow ids currently holding a token
 */
export type Marking = ReadonlySet<string>;

/**
 * Transition between two markings, fired by one activity
 */
export interface ReachabilityEdge {
  id: number;
  source: number;
  target: number;
  /** Model activity id */
  activity: string;
}

/**
 * Read access the state computer needs from a reachability graph
 */
export interface ReachabilityGraphReader {
  /** Node holding exactly this marking (order-independent) */
  getNodeIdForMarking(marking: Iterable<string>): number | undefined;
  /** Incoming edge ids, ascending */
  getIncomingEdges(nodeId: number): readonly number[];
  getEdge(edgeId: number): ReachabilityEdge | undefined;
  getMarking(nodeId: number): Marking | undefined;
}

/**
 * Serialized graph, as exported by the tool that built it
 */
export interface SerializedReachabilityGraph {
  initial: number;
  markings: Array<{ id: number; flows: string[] }>;
  edges: ReachabilityEdge[];
}

/**
 * Canonical key of a marking: its sorted member ids
 */
export function markingKey(marking: Iterable<string>): string {
  return JSON.stringify(Array.from(marking).sort());
}
