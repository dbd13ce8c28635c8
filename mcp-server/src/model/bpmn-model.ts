/**
 * BPMN Process Model
 *
 * Parses a BPMN 2.0 XML document into activities, sequence flows and end
 * events, and answers the structural queries state reconstruction needs:
 * name/id lookup, flow endpoints, end-event membership and upstream tasks of
 * a gateway.
 *
 * Element names are matched without their namespace prefix, so `bpmn:endEvent`,
 * `bpmn2:endEvent` and a bare `endEvent` all count as end events.
 */

import { readFile } from 'fs/promises';
import { XMLParser, XMLValidator } from 'fast-xml-parser';

import {
  Activity,
  SequenceFlow,
  ProcessModelSummary,
  ACTIVITY_ELEMENTS,
  GATEWAY_ELEMENTS,
} from './types.js';

const ATTRIBUTES_KEY = '@attrs';

/**
 * Raised when a model document cannot be read or lacks required attributes
 */
export class ModelParseError extends Error {
  readonly reason: string;
  readonly source?: string;
  readonly details?: Record<string, unknown>;

  constructor(reason: string, details?: Record<string, unknown>, source?: string) {
    super(`Invalid process model${source ? ` ${source}` : ''}: ${reason}`);
    this.name = 'ModelParseError';
    this.reason = reason;
    if (details) {
      this.details = details;
    }
    if (source) {
      this.source = source;
    }
  }
}

type Attributes = Record<string, string>;

interface ParsedElements {
  activities: Activity[];
  sequenceFlows: SequenceFlow[];
  startEvents: string[];
  endEvents: string[];
  gateways: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function attributesOf(element: unknown): Attributes {
  const attributes: Attributes = {};
  if (!isRecord(element)) return attributes;

  const raw = element[ATTRIBUTES_KEY];
  if (!isRecord(raw)) return attributes;

  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string') {
      attributes[key] = value;
    }
  }
  return attributes;
}

/**
 * Depth-first walk over the parsed document, calling `visit` for every
 * element (in document order within each parent).
 */
function walkElements(node: unknown, visit: (tag: string, attributes: Attributes) => void): void {
  if (!isRecord(node)) return;

  for (const [tag, value] of Object.entries(node)) {
    if (tag === ATTRIBUTES_KEY || tag === '#text' || tag.startsWith('?')) continue;

    const children = Array.isArray(value) ? value : [value];
    for (const child of children) {
      visit(tag, attributesOf(child));
      walkElements(child, visit);
    }
  }
}

function requireAttribute(attributes: Attributes, name: string, element: string): string {
  const value = attributes[name];
  if (value === undefined || value.length === 0) {
    throw new ModelParseError(`<${element}> is missing required attribute '${name}'`, {
      element,
      attribute: name,
      ...(attributes['id'] ? { id: attributes['id'] } : {}),
    });
  }
  return value;
}

function parseDocument(xml: string): ParsedElements {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new ModelParseError(`malformed XML: ${validation.err.msg}`, {
      line: validation.err.line,
      column: validation.err.col,
    });
  }

  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '',
    attributesGroupName: ATTRIBUTES_KEY,
    removeNSPrefix: true,
    parseAttributeValue: false,
    parseTagValue: false,
  });
  const document: unknown = parser.parse(xml);

  if (!isRecord(document) || !('definitions' in document)) {
    throw new ModelParseError('document has no <definitions> root element');
  }

  const parsed: ParsedElements = {
    activities: [],
    sequenceFlows: [],
    startEvents: [],
    endEvents: [],
    gateways: [],
  };

  walkElements(document, (tag, attributes) => {
    if (ACTIVITY_ELEMENTS.has(tag)) {
      const id = requireAttribute(attributes, 'id', tag);
      parsed.activities.push({ id, name: attributes['name'] ?? `Unnamed Task ${id}` });
    } else if (tag === 'sequenceFlow') {
      parsed.sequenceFlows.push({
        id: requireAttribute(attributes, 'id', tag),
        sourceRef: requireAttribute(attributes, 'sourceRef', tag),
        targetRef: requireAttribute(attributes, 'targetRef', tag),
      });
    } else if (tag === 'endEvent') {
      parsed.endEvents.push(requireAttribute(attributes, 'id', tag));
    } else if (tag === 'startEvent') {
      parsed.startEvents.push(requireAttribute(attributes, 'id', tag));
    } else if (GATEWAY_ELEMENTS.has(tag)) {
      parsed.gateways.push(requireAttribute(attributes, 'id', tag));
    }
  });

  return parsed;
}

/**
 * Immutable view of a BPMN process model
 */
export class BpmnModel {
  private readonly activities = new Map<string, string>();
  private readonly taskNameToId = new Map<string, string>();
  private readonly sequenceFlows = new Map<string, SequenceFlow>();
  private readonly incomingSources = new Map<string, string[]>();
  private readonly startEvents: ReadonlySet<string>;
  private readonly endEvents: ReadonlySet<string>;
  private readonly gateways: ReadonlySet<string>;
  private readonly upstreamCache = new Map<string, ReadonlySet<string>>();

  private constructor(elements: ParsedElements) {
    for (const activity of elements.activities) {
      const existing = this.taskNameToId.get(activity.name);
      if (existing !== undefined && existing !== activity.id) {
        throw new ModelParseError(`activity name '${activity.name}' is used by more than one task`, {
          name: activity.name,
          ids: [existing, activity.id],
        });
      }
      this.activities.set(activity.id, activity.name);
      this.taskNameToId.set(activity.name, activity.id);
    }

    // Adjacency index for backward traversal: target -> sources
    for (const flow of elements.sequenceFlows) {
      this.sequenceFlows.set(flow.id, flow);
      const sources = this.incomingSources.get(flow.targetRef);
      if (sources) {
        sources.push(flow.sourceRef);
      } else {
        this.incomingSources.set(flow.targetRef, [flow.sourceRef]);
      }
    }

    this.startEvents = new Set(elements.startEvents);
    this.endEvents = new Set(elements.endEvents);
    this.gateways = new Set(elements.gateways);
  }

  /**
   * Parse a model from its XML text
   */
  static fromXml(xml: string): BpmnModel {
    return new BpmnModel(parseDocument(xml));
  }

  /**
   * Read and parse a model file
   */
  static async load(path: string): Promise<BpmnModel> {
    let xml: string;
    try {
      xml = await readFile(path, 'utf-8');
    } catch (error) {
      throw new ModelParseError(
        `cannot read file: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        path
      );
    }

    try {
      return BpmnModel.fromXml(xml);
    } catch (error) {
      if (error instanceof ModelParseError) {
        throw new ModelParseError(error.reason, error.details, path);
      }
      throw error;
    }
  }

  isActivity(elementId: string): boolean {
    return this.activities.has(elementId);
  }

  isEndEvent(elementId: string): boolean {
    return this.endEvents.has(elementId);
  }

  getActivityName(activityId: string): string | undefined {
    return this.activities.get(activityId);
  }

  /**
   * Reverse lookup from a log activity label to the model's task id
   */
  getTaskIdByName(name: string): string | undefined {
    return this.taskNameToId.get(name);
  }

  getFlowTarget(flowId: string): string | undefined {
    return this.sequenceFlows.get(flowId)?.targetRef;
  }

  getFlowSource(flowId: string): string | undefined {
    return this.sequenceFlows.get(flowId)?.sourceRef;
  }

  /**
   * Tasks that can feed `startId`, searching backwards through gateways and
   * events. Each path stops at the first task it reaches. A task start yields
   * itself; an empty set means nothing upstream constrains the element.
   */
  getUpstreamTasksThroughGateways(startId: string): ReadonlySet<string> {
    const cached = this.upstreamCache.get(startId);
    if (cached) return cached;

    const visited = new Set<string>();
    const stack = [startId];
    const tasksFound = new Set<string>();

    let current: string | undefined;
    while ((current = stack.pop()) !== undefined) {
      if (this.activities.has(current)) {
        tasksFound.add(current);
        continue;
      }
      for (const source of this.incomingSources.get(current) ?? []) {
        if (!visited.has(source)) {
          visited.add(source);
          stack.push(source);
        }
      }
    }

    this.upstreamCache.set(startId, tasksFound);
    return tasksFound;
  }

  getActivities(): Activity[] {
    return Array.from(this.activities, ([id, name]) => ({ id, name }));
  }

  describe(): ProcessModelSummary {
    return {
      activities: this.getActivities().sort((a, b) => a.id.localeCompare(b.id)),
      gateways: Array.from(this.gateways).sort(),
      start_events: Array.from(this.startEvents).sort(),
      end_events: Array.from(this.endEvents).sort(),
      sequence_flow_count: this.sequenceFlows.size,
    };
  }
}
