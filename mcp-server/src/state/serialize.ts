import { CaseState, SerializedCaseState } from './types.js';

function iso(value: Date | null): string | null {
  return value === null ? null : value.toISOString();
}

/**
 * Render a case state with ISO 8601 timestamps
 */
export function serializeCaseState(state: CaseState): SerializedCaseState {
  return {
    control_flow_state: {
      flows: [...state.control_flow_state.flows],
      activities: [...state.control_flow_state.activities],
    },
    ongoing_activities: state.ongoing_activities.map(activity => ({
      id: activity.id,
      start_time: activity.start_time.toISOString(),
      resource: activity.resource,
      enabled_time: iso(activity.enabled_time),
    })),
    enabled_activities: state.enabled_activities.map(activity => ({
      id: activity.id,
      enabled_time: iso(activity.enabled_time),
    })),
    enabled_gateways: state.enabled_gateways.map(gateway => ({
      id: gateway.id,
      enabled_time: gateway.enabled_time.toISOString(),
    })),
  };
}

/**
 * Render case states keyed by case id. Any case id, `__proto__` included,
 * becomes an own key.
 */
export function serializeCaseStates(
  states: Iterable<readonly [string, CaseState]>
): Record<string, SerializedCaseState> {
  return Object.fromEntries(
    Array.from(states, ([caseId, state]) => [caseId, serializeCaseState(state)] as const)
  );
}
