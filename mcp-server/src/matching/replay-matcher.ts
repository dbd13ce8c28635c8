/**
 * Replay-based trace matcher.
 *
 * Walks the reachability graph from its initial marking, firing one edge per
 * activity label. Labels that are not model activities are stepped over.
 * When several outgoing edges carry the same activity the lowest edge id wins.
 */

import { getLogger } from '../logging/audit.js';
import { ReachabilityGraph } from '../reachability/graph.js';
import { Marking } from '../reachability/types.js';
import { TRACE_START, TraceMatcher } from './trace-matcher.js';

const log = getLogger('replay-matcher');

const EMPTY_MARKING: Marking = new Set<string>();

export type ActivityResolver = (label: string) => string | undefined;

export class ReplayTraceMatcher implements TraceMatcher {
  private readonly graph: ReachabilityGraph;
  private readonly resolveActivity: ActivityResolver;

  constructor(graph: ReachabilityGraph, resolveActivity: ActivityResolver) {
    this.graph = graph;
    this.resolveActivity = resolveActivity;
  }

  getBestMarkingStateFor(trace: readonly string[]): Marking {
    let nodeId = this.graph.getInitialNodeId();
    if (nodeId === undefined) {
      return EMPTY_MARKING;
    }

    for (const label of trace) {
      if (label === TRACE_START) continue;

      const activityId = this.resolveActivity(label);
      if (activityId === undefined) {
        log.debug(`Skipping '${label}': not an activity of the model`);
        continue;
      }

      const next = this.fire(nodeId, activityId);
      if (next === undefined) {
        log.debug(`No transition for '${label}' from marking ${nodeId}`);
        return EMPTY_MARKING;
      }
      nodeId = next;
    }

    return this.graph.getMarking(nodeId) ?? EMPTY_MARKING;
  }

  private fire(nodeId: number, activityId: string): number | undefined {
    for (const edgeId of this.graph.getOutgoingEdges(nodeId)) {
      const edge = this.graph.getEdge(edgeId);
      if (edge?.activity === activityId) {
        return edge.target;
      }
    }
    return undefined;
  }
}
