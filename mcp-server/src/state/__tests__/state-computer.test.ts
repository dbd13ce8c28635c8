/**
 * State Computer Tests
 *
 * Claims fixture: Register Claim (Task_A) splits into Check Documents
 * (Task_B) and Assess Damage (Task_C), which join before Notify Customer
 * (Task_D) and the end event.
 */
import { readFileSync } from 'fs';
import { join } from 'path';

import { BpmnModel } from '../../model/bpmn-model.js';
import { ReachabilityGraph } from '../../reachability/graph.js';
import { Marking } from '../../reachability/types.js';
import { ReplayTraceMatcher } from '../../matching/replay-matcher.js';
import { TRACE_START, TraceMatcher } from '../../matching/trace-matcher.js';
import { TableConcurrencyOracle } from '../../concurrency/oracle.js';
import { ConcurrencyTable } from '../../concurrency/types.js';
import { LogEvent } from '../../event-log/types.js';
import { StateComputer } from '../state-computer.js';
import { serializeCaseState, serializeCaseStates } from '../serialize.js';

const FIXTURES = join(__dirname, '../../../tests/fixtures');

const model = BpmnModel.fromXml(readFileSync(join(FIXTURES, 'claims.bpmn'), 'utf-8'));
const graph = ReachabilityGraph.fromJSON(
  JSON.parse(readFileSync(join(FIXTURES, 'claims-graph.json'), 'utf-8'))
);

function at(time: string): Date {
  return new Date(`2025-03-03T${time}:00.000Z`);
}

function done(activity: string, start: string, end: string, resource = ''): LogEvent {
  return { caseId: 'c1', activity, resource, startTime: at(start), endTime: at(end), enabledTime: null };
}

function running(activity: string, start: string, resource = '', enabled?: string): LogEvent {
  return {
    caseId: 'c1',
    activity,
    resource,
    startTime: at(start),
    endTime: null,
    enabledTime: enabled === undefined ? null : at(enabled),
  };
}

function fixedMatcher(...flows: string[]): TraceMatcher {
  const marking: Marking = new Set(flows);
  return { getBestMarkingStateFor: () => marking };
}

function replayComputer(table: ConcurrencyTable = {}): StateComputer {
  return new StateComputer({
    model,
    graph,
    matcher: new ReplayTraceMatcher(graph, label => model.getTaskIdByName(label)),
    oracle: new TableConcurrencyOracle(table),
  });
}

function fixedComputer(matcher: TraceMatcher, table: ConcurrencyTable = {}): StateComputer {
  return new StateComputer({ model, graph, matcher, oracle: new TableConcurrencyOracle(table) });
}

describe('StateComputer', () => {
  describe('ongoing activities', () => {
    const events = [
      done('Register Claim', '08:00', '09:00', 'alice'),
      running('Check Documents', '09:30', 'bob', '09:00'),
    ];

    it('should narrow the marking to the state before the running activity', () => {
      const state = replayComputer().computeCaseState('c1', events);
      expect(state?.control_flow_state).toEqual({ flows: ['Flow_4'], activities: ['Task_B'] });
    });

    it('should keep the reconstructed flows within the matched marking', () => {
      const matched = new ReplayTraceMatcher(graph, label => model.getTaskIdByName(label))
        .getBestMarkingStateFor([TRACE_START, 'Register Claim', 'Check Documents']);
      const state = replayComputer().computeCaseState('c1', events);
      for (const flow of state?.control_flow_state.flows ?? []) {
        expect(matched.has(flow)).toBe(true);
      }
    });

    it('should describe the running activity', () => {
      const state = replayComputer().computeCaseState('c1', events);
      expect(state?.ongoing_activities).toEqual([
        { id: 'Task_B', start_time: at('09:30'), resource: 'bob', enabled_time: null },
      ]);
    });

    it('should take the logged enabled time once the oracle knows the activity', () => {
      const state = replayComputer({ 'Check Documents': [] }).computeCaseState('c1', events);
      expect(state?.ongoing_activities[0]?.enabled_time).toEqual(at('09:00'));
    });

    it('should enable the other branch at the end of the last finished activity', () => {
      const state = replayComputer().computeCaseState('c1', events);
      expect(state?.enabled_activities).toEqual([{ id: 'Task_C', enabled_time: at('09:00') }]);
      expect(state?.enabled_gateways).toEqual([]);
    });

    it('should leave a running first activity holding no flows', () => {
      const state = replayComputer().computeCaseState('c1', [running('Register Claim', '11:00', 'dave')]);
      expect(state).toEqual({
        control_flow_state: { flows: [], activities: ['Task_A'] },
        ongoing_activities: [{ id: 'Task_A', start_time: at('11:00'), resource: 'dave', enabled_time: null }],
        enabled_activities: [],
        enabled_gateways: [],
      });
    });

    it('should use the first incoming edge, by id, that carries the activity', () => {
      const branching = new ReachabilityGraph();
      const current = branching.addMarking(['x', 'y', 'z']);
      const later = branching.addMarking(['x', 'y', 'q']);
      const earlier = branching.addMarking(['x', 'z']);
      branching.addEdge(later, current, 'Task_B', 5);
      branching.addEdge(earlier, current, 'Task_B', 2);

      const computer = new StateComputer({
        model,
        graph: branching,
        matcher: fixedMatcher('x', 'y', 'z'),
        oracle: new TableConcurrencyOracle(),
      });
      const state = computer.computeCaseState('c1', [running('Check Documents', '09:30')]);
      expect(state?.control_flow_state.flows).toEqual(['x', 'z']);
    });

    it('should report unknown activities without a model id', () => {
      const state = fixedComputer(fixedMatcher('Flow_1')).computeCaseState('c1', [
        running('Coffee Break', '07:00'),
      ]);
      expect(state?.ongoing_activities).toEqual([
        { id: null, start_time: at('07:00'), resource: '', enabled_time: null },
      ]);
      expect(state?.control_flow_state).toEqual({ flows: ['Flow_1'], activities: [] });
    });
  });

  describe('enabled activities', () => {
    it('should use the case start when nothing has finished', () => {
      const state = fixedComputer(fixedMatcher('Flow_1')).computeCaseState('c1', [
        running('Coffee Break', '07:00'),
        running('Lunch', '07:30'),
      ]);
      expect(state?.enabled_activities).toEqual([{ id: 'Task_A', enabled_time: at('07:00') }]);
    });

    it('should ask the oracle once something has finished', () => {
      const events = [
        done('Register Claim', '08:00', '09:00'),
        done('Check Documents', '09:05', '10:00'),
      ];
      const state = replayComputer().computeCaseState('c1', events);
      expect(state?.enabled_activities).toEqual([{ id: 'Task_C', enabled_time: at('10:00') }]);
    });

    it('should skip finished activities concurrent with the enabled one', () => {
      const events = [
        done('Register Claim', '08:00', '09:00'),
        done('Check Documents', '09:05', '10:00'),
      ];
      const state = replayComputer({ 'Assess Damage': ['Check Documents'] }).computeCaseState('c1', events);
      expect(state?.enabled_activities).toEqual([{ id: 'Task_C', enabled_time: at('09:00') }]);
    });

    it('should leave the enabled time empty when the oracle finds none', () => {
      const events = [
        done('Register Claim', '08:00', '09:00'),
        done('Check Documents', '09:05', '10:00'),
      ];
      const state = replayComputer({
        'Assess Damage': ['Register Claim', 'Check Documents'],
      }).computeCaseState('c1', events);
      expect(state?.enabled_activities).toEqual([{ id: 'Task_C', enabled_time: null }]);
    });

    it('should register unknown activities with the oracle', () => {
      const oracle = new TableConcurrencyOracle();
      const computer = new StateComputer({
        model,
        graph,
        matcher: new ReplayTraceMatcher(graph, label => model.getTaskIdByName(label)),
        oracle,
      });
      computer.computeCaseState('c1', [done('Register Claim', '08:00', '09:00')]);
      expect(oracle.hasActivity('Check Documents')).toBe(true);
      expect(oracle.hasActivity('Assess Damage')).toBe(true);
    });
  });

  describe('enabled gateways', () => {
    it('should enable a join at the end of its finished upstream task', () => {
      const events = [
        done('Register Claim', '08:00', '09:00'),
        done('Check Documents', '09:05', '10:00'),
      ];
      const state = replayComputer().computeCaseState('c1', events);
      expect(state?.control_flow_state.flows).toEqual(['Flow_4', 'Flow_5']);
      expect(state?.enabled_gateways).toEqual([{ id: 'Gateway_Join', enabled_time: at('10:00') }]);
    });

    it('should not enable a gateway while an upstream task is running', () => {
      const events = [
        done('Register Claim', '08:00', '09:00'),
        done('Check Documents', '09:05', '10:00'),
        running('Assess Damage', '09:10'),
      ];
      const state = fixedComputer(fixedMatcher('Flow_5')).computeCaseState('c1', events);
      expect(state?.enabled_gateways).toEqual([]);
    });

    it('should list a gateway once when several flows reach it', () => {
      const events = [
        done('Register Claim', '08:00', '09:00'),
        done('Check Documents', '09:05', '10:00'),
        done('Assess Damage', '09:10', '10:20'),
      ];
      const state = fixedComputer(fixedMatcher('Flow_6', 'Flow_5')).computeCaseState('c1', events);
      expect(state?.enabled_gateways).toEqual([{ id: 'Gateway_Join', enabled_time: at('10:20') }]);
    });

    it('should fall back to the latest end when no upstream task has finished', () => {
      const events = [done('Check Documents', '09:05', '10:00')];
      const state = fixedComputer(fixedMatcher('Flow_2')).computeCaseState('c1', events);
      expect(state?.enabled_gateways).toEqual([{ id: 'Gateway_Split', enabled_time: at('10:00') }]);
    });

    it('should not enable a gateway when nothing has finished', () => {
      const state = fixedComputer(fixedMatcher('Flow_2')).computeCaseState('c1', [
        running('Coffee Break', '07:00'),
      ]);
      expect(state?.enabled_gateways).toEqual([]);
    });
  });

  describe('case selection', () => {
    const completed = [
      done('Register Claim', '07:00', '07:30'),
      done('Assess Damage', '07:40', '08:10'),
      done('Check Documents', '07:45', '08:00'),
      done('Notify Customer', '08:20', '08:30'),
    ];

    it('should drop a case that has reached an end event', () => {
      expect(replayComputer().computeCaseState('c1', completed)).toBeNull();
    });

    it('should return only the cases still in flight', () => {
      const events: LogEvent[] = [
        ...completed.map(event => ({ ...event, caseId: 'closed' })),
        { ...running('Register Claim', '11:00'), caseId: 'open' },
      ];
      const states = replayComputer().computeCaseStates(events);
      expect(Array.from(states.keys())).toEqual(['open']);
    });

    it('should return an empty state when the trace does not fit the graph', () => {
      const state = fixedComputer(fixedMatcher()).computeCaseState('c1', [
        done('Register Claim', '08:00', '09:00'),
      ]);
      expect(state).toEqual({
        control_flow_state: { flows: [], activities: [] },
        ongoing_activities: [],
        enabled_activities: [],
        enabled_gateways: [],
      });
    });

    it('should produce the same state on every run', () => {
      const events = [
        running('Check Documents', '09:30', 'bob'),
        done('Register Claim', '08:00', '09:00', 'alice'),
      ];
      const first = replayComputer().computeCaseStates(events);
      const second = replayComputer().computeCaseStates([...events].reverse());
      expect(first).toEqual(second);
    });
  });

  describe('serializeCaseState', () => {
    it('should render timestamps as ISO strings', () => {
      const state = replayComputer().computeCaseState('c1', [
        done('Register Claim', '08:00', '09:00', 'alice'),
        running('Check Documents', '09:30', 'bob'),
      ]);
      expect(state).not.toBeNull();
      if (!state) return;

      expect(serializeCaseState(state)).toEqual({
        control_flow_state: { flows: ['Flow_4'], activities: ['Task_B'] },
        ongoing_activities: [
          { id: 'Task_B', start_time: '2025-03-03T09:30:00.000Z', resource: 'bob', enabled_time: null },
        ],
        enabled_activities: [{ id: 'Task_C', enabled_time: '2025-03-03T09:00:00.000Z' }],
        enabled_gateways: [],
      });
    });

    it('should key every case by its id, whatever the id', () => {
      const states = replayComputer().computeCaseStates([
        { ...running('Register Claim', '11:00'), caseId: '__proto__' },
        { ...running('Register Claim', '11:30'), caseId: 'constructor' },
      ]);
      const cases = serializeCaseStates(states);

      expect(Object.keys(cases)).toEqual(['__proto__', 'constructor']);
      expect(Object.getPrototypeOf(cases)).toBe(Object.prototype);
      expect(Object.getOwnPropertyDescriptor(cases, '__proto__')?.value).toEqual(
        serializeCaseState({
          control_flow_state: { flows: [], activities: ['Task_A'] },
          ongoing_activities: [{ id: 'Task_A', start_time: at('11:00'), resource: '', enabled_time: null }],
          enabled_activities: [],
          enabled_gateways: [],
        })
      );
    });
  });
});
