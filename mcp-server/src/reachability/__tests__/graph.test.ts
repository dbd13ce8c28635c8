/**
 * Reachability Graph Tests
 */
import { readFileSync } from 'fs';
import { join } from 'path';

import { ReachabilityGraph, GraphFormatError } from '../graph.js';
import { markingKey } from '../types.js';

const FIXTURES = join(__dirname, '../../../tests/fixtures');
const CLAIMS_GRAPH: unknown = JSON.parse(readFileSync(join(FIXTURES, 'claims-graph.json'), 'utf-8'));

describe('ReachabilityGraph', () => {
  describe('markingKey', () => {
    it('should not depend on member order', () => {
      expect(markingKey(['b', 'a'])).toBe(markingKey(new Set(['a', 'b'])));
      expect(markingKey([])).toBe('[]');
    });
  });

  describe('building', () => {
    it('should give a repeated marking its existing id', () => {
      const graph = new ReachabilityGraph();
      const first = graph.addMarking(['f1', 'f2']);
      const again = graph.addMarking(['f2', 'f1']);
      expect(again).toBe(first);
      expect(graph.size).toEqual({ markings: 1, edges: 0 });
    });

    it('should make the first marking the initial node', () => {
      const graph = new ReachabilityGraph();
      graph.addMarking(['start']);
      graph.addMarking(['next']);
      expect(graph.getInitialNodeId()).toBe(0);
    });

    it('should keep edge lists in ascending id order', () => {
      const graph = new ReachabilityGraph();
      const source = graph.addMarking(['a']);
      const target = graph.addMarking(['b']);
      graph.addEdge(source, target, 'X', 7);
      graph.addEdge(source, target, 'Y', 2);
      graph.addEdge(source, target, 'Z', 4);

      expect(graph.getIncomingEdges(target)).toEqual([2, 4, 7]);
      expect(graph.getOutgoingEdges(source)).toEqual([2, 4, 7]);
    });

    it('should reject edges between unknown nodes', () => {
      const graph = new ReachabilityGraph();
      graph.addMarking(['a']);
      expect(() => graph.addEdge(0, 9, 'X')).toThrow(
        'Invalid reachability graph: edge 0 -> 9 references an unknown node'
      );
    });

    it('should reject a reused edge id', () => {
      const graph = new ReachabilityGraph();
      graph.addMarking(['a']);
      graph.addEdge(0, 0, 'X', 1);
      expect(() => graph.addEdge(0, 0, 'Y', 1)).toThrow(GraphFormatError);
    });
  });

  describe('fromJSON', () => {
    const graph = ReachabilityGraph.fromJSON(CLAIMS_GRAPH);

    it('should load every marking and edge', () => {
      expect(graph.size).toEqual({ markings: 6, edges: 6 });
      expect(graph.getInitialNodeId()).toBe(0);
    });

    it('should find nodes by marking regardless of order', () => {
      expect(graph.getNodeIdForMarking(['Flow_5', 'Flow_4'])).toBe(2);
      expect(graph.getNodeIdForMarking(new Set(['Flow_4']))).toBeUndefined();
    });

    it('should index incoming and outgoing edges', () => {
      expect(graph.getIncomingEdges(4)).toEqual([3, 4]);
      expect(graph.getOutgoingEdges(1)).toEqual([1, 2]);
      expect(graph.getEdge(4)).toEqual({ id: 4, source: 3, target: 4, activity: 'Task_B' });
      expect(Array.from(graph.getMarking(3) ?? []).sort()).toEqual(['Flow_3', 'Flow_6']);
    });

    it('should serialize back to the same structure', () => {
      expect(graph.toJSON()).toEqual(CLAIMS_GRAPH);
    });

    it('should reject documents of the wrong shape', () => {
      let caught: unknown;
      try {
        ReachabilityGraph.fromJSON({ initial: 'zero', markings: [], edges: [] });
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(GraphFormatError);
      expect(caught).toMatchObject({
        message: 'Invalid reachability graph: does not match the expected shape',
        issues: [expect.stringContaining('initial')],
      });
    });

    it('should reject two markings with the same flows', () => {
      expect(() =>
        ReachabilityGraph.fromJSON({
          initial: 0,
          markings: [
            { id: 0, flows: ['a'] },
            { id: 1, flows: ['a'] },
          ],
          edges: [],
        })
      ).toThrow('Invalid reachability graph: markings 0 and 1 hold the same flows');
    });

    it('should reject an unknown initial node', () => {
      expect(() =>
        ReachabilityGraph.fromJSON({ initial: 9, markings: [{ id: 0, flows: [] }], edges: [] })
      ).toThrow('Invalid reachability graph: initial node 9 does not exist');
    });
  });

  describe('load', () => {
    it('should read a graph file', async () => {
      const graph = await ReachabilityGraph.load(join(FIXTURES, 'claims-graph.json'));
      expect(graph.getNodeIdForMarking(['Flow_8'])).toBe(5);
    });

    it('should fail on a file that is not JSON', async () => {
      await expect(ReachabilityGraph.load(join(FIXTURES, 'claims.bpmn'))).rejects.toBeInstanceOf(
        GraphFormatError
      );
    });
  });
});
