/**
 * In-memory reachability graph.
 *
 * Nodes are markings indexed by their canonical key; edges carry the activity
 * id that fires them. Edge lists are kept in ascending id order so that any
 * scan over them is deterministic.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';

import {
  Marking,
  ReachabilityEdge,
  ReachabilityGraphReader,
  SerializedReachabilityGraph,
  markingKey,
} from './types.js';

/**
 * Raised when a serialized graph is structurally invalid
 */
export class GraphFormatError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(`Invalid reachability graph: ${message}`);
    this.name = 'GraphFormatError';
    this.issues = issues;
  }
}

export const SerializedGraphSchema = z.object({
  initial: z.number().int(),
  markings: z.array(
    z.object({
      id: z.number().int(),
      flows: z.array(z.string()),
    })
  ),
  edges: z.array(
    z.object({
      id: z.number().int(),
      source: z.number().int(),
      target: z.number().int(),
      activity: z.string().min(1),
    })
  ),
});

function insertSorted(list: number[], value: number): void {
  let index = list.length;
  while (index > 0 && (list[index - 1] ?? -Infinity) > value) {
    index--;
  }
  list.splice(index, 0, value);
}

export class ReachabilityGraph implements ReachabilityGraphReader {
  private readonly markings = new Map<number, Marking>();
  private readonly markingToKey = new Map<string, number>();
  private readonly edges = new Map<number, ReachabilityEdge>();
  private readonly incomingEdges = new Map<number, number[]>();
  private readonly outgoingEdges = new Map<number, number[]>();
  private nextMarkingId = 0;
  private nextEdgeId = 0;
  private initialNodeId: number | undefined;

  /**
   * Add a marking, returning its node id. A marking already present keeps
   * its existing id.
   */
  addMarking(flows: Iterable<string>, id?: number): number {
    const marking = new Set(flows);
    const key = markingKey(marking);
    const existing = this.markingToKey.get(key);
    if (existing !== undefined) return existing;

    const nodeId = id ?? this.nextMarkingId;
    if (this.markings.has(nodeId)) {
      throw new GraphFormatError(`node id ${nodeId} is already in use`);
    }
    this.nextMarkingId = Math.max(this.nextMarkingId, nodeId + 1);

    this.markings.set(nodeId, marking);
    this.markingToKey.set(key, nodeId);
    this.incomingEdges.set(nodeId, []);
    this.outgoingEdges.set(nodeId, []);
    if (this.initialNodeId === undefined) {
      this.initialNodeId = nodeId;
    }
    return nodeId;
  }

  addEdge(source: number, target: number, activity: string, id?: number): number {
    const incoming = this.incomingEdges.get(target);
    const outgoing = this.outgoingEdges.get(source);
    if (!incoming || !outgoing) {
      throw new GraphFormatError(`edge ${source} -> ${target} references an unknown node`);
    }

    const edgeId = id ?? this.nextEdgeId;
    if (this.edges.has(edgeId)) {
      throw new GraphFormatError(`edge id ${edgeId} is already in use`);
    }
    this.nextEdgeId = Math.max(this.nextEdgeId, edgeId + 1);

    this.edges.set(edgeId, { id: edgeId, source, target, activity });
    insertSorted(incoming, edgeId);
    insertSorted(outgoing, edgeId);
    return edgeId;
  }

  setInitialNode(nodeId: number): void {
    if (!this.markings.has(nodeId)) {
      throw new GraphFormatError(`initial node ${nodeId} does not exist`);
    }
    this.initialNodeId = nodeId;
  }

  getInitialNodeId(): number | undefined {
    return this.initialNodeId;
  }

  getNodeIdForMarking(marking: Iterable<string>): number | undefined {
    return this.markingToKey.get(markingKey(marking));
  }

  getMarking(nodeId: number): Marking | undefined {
    return this.markings.get(nodeId);
  }

  getEdge(edgeId: number): ReachabilityEdge | undefined {
    return this.edges.get(edgeId);
  }

  getIncomingEdges(nodeId: number): readonly number[] {
    return this.incomingEdges.get(nodeId) ?? [];
  }

  getOutgoingEdges(nodeId: number): readonly number[] {
    return this.outgoingEdges.get(nodeId) ?? [];
  }

  get size(): { markings: number; edges: number } {
    return { markings: this.markings.size, edges: this.edges.size };
  }

  toJSON(): SerializedReachabilityGraph {
    return {
      initial: this.initialNodeId ?? 0,
      markings: Array.from(this.markings, ([id, marking]) => ({
        id,
        flows: Array.from(marking).sort(),
      })),
      edges: Array.from(this.edges.values()).sort((a, b) => a.id - b.id),
    };
  }

  /**
   * Build a graph from its serialized form
   */
  static fromJSON(raw: unknown): ReachabilityGraph {
    const result = SerializedGraphSchema.safeParse(raw);
    if (!result.success) {
      throw new GraphFormatError(
        'does not match the expected shape',
        result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
      );
    }

    const data = result.data;
    const graph = new ReachabilityGraph();
    for (const marking of data.markings) {
      const nodeId = graph.addMarking(marking.flows, marking.id);
      if (nodeId !== marking.id) {
        throw new GraphFormatError(
          `markings ${nodeId} and ${marking.id} hold the same flows`,
          [`markings.${marking.id}`]
        );
      }
    }
    for (const edge of data.edges) {
      graph.addEdge(edge.source, edge.target, edge.activity, edge.id);
    }
    graph.setInitialNode(data.initial);
    return graph;
  }

  static async load(path: string): Promise<ReachabilityGraph> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(path, 'utf-8'));
    } catch (error) {
      throw new GraphFormatError(
        `cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    return ReachabilityGraph.fromJSON(raw);
  }
}
