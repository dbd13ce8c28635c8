/**
 * State Computer
 *
 * Reconstructs, per case, the control-flow state of an in-flight process
 * instance: the flows holding tokens, the running activities and the
 * activities and gateways enabled at the moment the log was cut.
 *
 * The trace matcher places the case's whole trace in the reachability graph
 * as if every activity had completed. Running activities have not, so the
 * marking is narrowed to the state before each of them fired. Enabled
 * elements are then read off the remaining flows.
 */

import { getLogger } from '../logging/audit.js';
import { BpmnModel } from '../model/bpmn-model.js';
import { Marking, ReachabilityGraphReader } from '../reachability/types.js';
import { TRACE_START, TraceMatcher } from '../matching/trace-matcher.js';
import { ConcurrencyOracle } from '../concurrency/types.js';
import { LogEvent } from '../event-log/types.js';
import {
  groupByCase,
  sortByStartTime,
  maxEndTime,
  minStartTime,
} from '../event-log/operations.js';
import {
  CaseState,
  OngoingActivity,
  EnabledActivity,
  EnabledGateway,
} from './types.js';

const log = getLogger('state-computer');

/** Offset of the oracle probe after the case's latest finished event */
const PROBE_OFFSET_MS = 1000;

export interface StateComputerDependencies {
  model: BpmnModel;
  graph: ReachabilityGraphReader;
  matcher: TraceMatcher;
  oracle: ConcurrencyOracle;
}

function intersect(flows: ReadonlySet<string>, marking: Marking): Set<string> {
  const result = new Set<string>();
  for (const flow of flows) {
    if (marking.has(flow)) {
      result.add(flow);
    }
  }
  return result;
}

export class StateComputer {
  private readonly model: BpmnModel;
  private readonly graph: ReachabilityGraphReader;
  private readonly matcher: TraceMatcher;
  private readonly oracle: ConcurrencyOracle;

  constructor(dependencies: StateComputerDependencies) {
    this.model = dependencies.model;
    this.graph = dependencies.graph;
    this.matcher = dependencies.matcher;
    this.oracle = dependencies.oracle;
  }

  /**
   * Compute the state of every case in the log. Cases whose reconstructed
   * state has an enabled end event are left out.
   */
  computeCaseStates(events: readonly LogEvent[]): Map<string, CaseState> {
    const caseStates = new Map<string, CaseState>();
    const cases = groupByCase(events);

    for (const [caseId, caseEvents] of cases) {
      const state = this.computeCaseState(caseId, caseEvents);
      if (state) {
        caseStates.set(caseId, state);
      }
    }

    log.info(`Reconstructed ${caseStates.size} of ${cases.size} cases`, {
      cases: cases.size,
      reconstructed: caseStates.size,
      dropped: cases.size - caseStates.size,
    });
    return caseStates;
  }

  /**
   * Compute the state of a single case, or null when the case is complete
   * from the model's point of view
   */
  computeCaseState(caseId: string, events: readonly LogEvent[]): CaseState | null {
    const group = sortByStartTime(events);
    const finished = group.filter(event => event.endTime !== null);

    const ongoingActivities = group
      .filter(event => event.endTime === null)
      .map(event => this.describeOngoing(caseId, event));
    const ongoingIds = new Set<string>();
    for (const activity of ongoingActivities) {
      if (activity.id !== null) {
        ongoingIds.add(activity.id);
      }
    }

    const trace = [TRACE_START, ...group.map(event => event.activity)];
    const stateMarking = this.matcher.getBestMarkingStateFor(trace);
    const stateFlows = Array.from(this.narrowToOngoing(stateMarking, ongoingIds)).sort();

    const enabledActivities = this.findEnabledActivities(stateFlows, group, finished);
    const enabledGateways = this.findEnabledGateways(stateFlows, finished, ongoingIds);

    const endEvent = enabledGateways.find(gateway => this.model.isEndEvent(gateway.id));
    if (endEvent) {
      log.debug(`Case ${caseId} has reached end event '${endEvent.id}', leaving it out`);
      return null;
    }

    return {
      control_flow_state: {
        flows: stateFlows,
        activities: Array.from(ongoingIds).sort(),
      },
      ongoing_activities: ongoingActivities,
      enabled_activities: enabledActivities,
      enabled_gateways: enabledGateways,
    };
  }

  private describeOngoing(caseId: string, event: LogEvent): OngoingActivity {
    const id = this.model.getTaskIdByName(event.activity) ?? null;

    let enabledTime: Date | null = null;
    if (id !== null && this.oracle.hasActivity(event.activity)) {
      enabledTime = event.enabledTime;
      if (enabledTime === null) {
        log.debug(`Ongoing '${id}' in case ${caseId} has no enabled time in the log`);
      }
    }

    return {
      id,
      start_time: event.startTime,
      resource: event.resource,
      enabled_time: enabledTime,
    };
  }

  /**
   * For each running activity, intersect the flows with the marking that held
   * just before the activity fired into the matched marking. The first
   * incoming edge carrying the activity, in ascending edge id order, is used.
   */
  private narrowToOngoing(stateMarking: Marking, ongoingIds: ReadonlySet<string>): Set<string> {
    let stateFlows = new Set(stateMarking);

    const nodeId = this.graph.getNodeIdForMarking(stateMarking);
    if (nodeId === undefined) {
      return stateFlows;
    }

    const incomingEdges = this.graph.getIncomingEdges(nodeId);
    for (const activityId of ongoingIds) {
      for (const edgeId of incomingEdges) {
        const edge = this.graph.getEdge(edgeId);
        if (edge?.activity !== activityId) continue;

        const sourceMarking = this.graph.getMarking(edge.source);
        if (sourceMarking) {
          stateFlows = intersect(stateFlows, sourceMarking);
        }
        break;
      }
    }
    return stateFlows;
  }

  private findEnabledActivities(
    stateFlows: readonly string[],
    group: readonly LogEvent[],
    finished: readonly LogEvent[]
  ): EnabledActivity[] {
    const enabled: EnabledActivity[] = [];
    const seen = new Set<string>();

    for (const flowId of stateFlows) {
      const target = this.model.getFlowTarget(flowId);
      if (target === undefined || !this.model.isActivity(target) || seen.has(target)) continue;
      seen.add(target);

      enabled.push({
        id: target,
        enabled_time: this.activityEnabledTime(target, group, finished),
      });
    }
    return enabled;
  }

  private activityEnabledTime(
    activityId: string,
    group: readonly LogEvent[],
    finished: readonly LogEvent[]
  ): Date | null {
    // Nothing has finished yet: the case start is the only reference point
    if (finished.length === 0) {
      return minStartTime(group);
    }

    const latestEnd = maxEndTime(finished);
    const activityName = this.model.getActivityName(activityId);
    if (latestEnd === null || activityName === undefined) {
      return null;
    }

    if (!this.oracle.hasActivity(activityName)) {
      this.oracle.registerActivity(activityName);
    }

    const probeTime = new Date(latestEnd.getTime() + PROBE_OFFSET_MS);
    const enabledTime = this.oracle.enabledSince(finished, {
      activity: activityName,
      startTime: probeTime,
      endTime: probeTime,
    });
    return enabledTime ?? null;
  }

  /**
   * Gateways (and events) the remaining flows point at. A gateway that a
   * running activity can still feed is not enabled yet.
   */
  private findEnabledGateways(
    stateFlows: readonly string[],
    finished: readonly LogEvent[],
    ongoingIds: ReadonlySet<string>
  ): EnabledGateway[] {
    const enabled: EnabledGateway[] = [];
    const seen = new Set<string>();

    for (const flowId of stateFlows) {
      const target = this.model.getFlowTarget(flowId);
      if (target === undefined || this.model.isActivity(target) || seen.has(target)) continue;
      seen.add(target);

      const upstream = this.model.getUpstreamTasksThroughGateways(target);
      if (Array.from(upstream).some(taskId => ongoingIds.has(taskId))) continue;

      const enabledTime = this.gatewayEnabledTime(target, finished);
      if (enabledTime !== null) {
        enabled.push({ id: target, enabled_time: enabledTime });
      }
    }
    return enabled;
  }

  /**
   * Latest end among finished upstream tasks, falling back to the latest end
   * of any finished event of the case
   */
  private gatewayEnabledTime(gatewayId: string, finished: readonly LogEvent[]): Date | null {
    const upstream = this.model.getUpstreamTasksThroughGateways(gatewayId);
    const latestEnd = maxEndTime(finished);
    if (upstream.size === 0) {
      return latestEnd;
    }

    const upstreamEvents = finished.filter(event => {
      const taskId = this.model.getTaskIdByName(event.activity);
      return taskId !== undefined && upstream.has(taskId);
    });
    return maxEndTime(upstreamEvents) ?? latestEnd;
  }
}
