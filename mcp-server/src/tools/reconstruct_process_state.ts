/**
 * Tool: reconstruct_process_state
 *
 * Reconstructs the runtime state of every in-flight case of a process:
 * which sequence flows hold tokens, which activities are running, and which
 * activities and gateways are enabled (and since when).
 *
 * Inputs are a BPMN model, the model's reachability graph (JSON) and a CSV
 * event log. Cases that have reached an end event are left out.
 */

import { z } from 'zod';

import { createAuditContext } from '../logging/audit.js';
import {
  checkRateLimit,
  enforceRowLimit,
  validateCutoff,
  withTimeout,
} from '../policies/limits.js';
import { BpmnModel } from '../model/index.js';
import { ReachabilityGraph } from '../reachability/index.js';
import { ReplayTraceMatcher } from '../matching/index.js';
import { TableConcurrencyOracle, ConcurrencyTableSchema } from '../concurrency/index.js';
import {
  ColumnMappingSchema,
  LogEvent,
  computeLogStats,
  readEventLog,
  sliceAt,
} from '../event-log/index.js';
import {
  StateComputer,
  SerializedCaseState,
  serializeCaseStates,
} from '../state/index.js';

// ============================================================================
// Zod Schema
// ============================================================================

export const ReconstructProcessStateSchema = z.object({
  model_path: z.string().min(1).describe('Path to the BPMN 2.0 model file'),
  graph_path: z.string().min(1).describe('Path to the reachability graph JSON file'),
  event_log_path: z.string().min(1).describe('Path to the CSV event log'),
  column_mapping: ColumnMappingSchema.optional().describe(
    'Maps standard keys (case_id, activity, resource, start_time, end_time, enable_time) to CSV column names'
  ),
  concurrency: ConcurrencyTableSchema.optional().describe(
    'Activity name -> names of activities that may run concurrently with it'
  ),
  cutoff: z.string().optional().describe(
    'ISO timestamp to reconstruct the state at. Later starts are ignored, later ends count as ongoing.'
  ),
  case_ids: z.array(z.string()).optional().describe('Only reconstruct these cases'),
  max_cases: z.number().int().min(1).max(10000).default(100).describe(
    'Maximum number of case states to return'
  ),
});

export type ReconstructProcessStateInput = z.infer<typeof ReconstructProcessStateSchema>;

export interface ReconstructProcessStateResult {
  cases: Record<string, SerializedCaseState>;
  summary: {
    /** Cases present in the (sliced, filtered) log */
    total_cases: number;
    reconstructed_cases: number;
    /** Cases left out because they reached an end event */
    dropped_cases: number;
    returned_cases: number;
    events: number;
    earliest_start: string | null;
    latest_end: string | null;
  };
  metadata: {
    computed_at: string;
    model_path: string;
    graph_path: string;
    event_log_path: string;
    cutoff: string | null;
    graph_size: { markings: number; edges: number };
  };
}

// ============================================================================
// Tool Definition
// ============================================================================

export const reconstructProcessStateTool = {
  name: 'reconstruct_process_state',
  description: `Reconstruct the current state of in-flight process cases.

Matches each case's executed activities against the process model's
reachability graph, then corrects for activities that are still running.

Returns per case:
- control_flow_state.flows: sequence flows currently holding a token
- control_flow_state.activities: model activities currently running
- ongoing_activities: running activities with start time, resource, enabled time
- enabled_activities: activities ready to start, with their enabled time
- enabled_gateways: gateways ready to fire, with their enabled time

Cases whose state reaches an end event are complete and are not returned.

Parameters:
- model_path: BPMN 2.0 model file
- graph_path: reachability graph JSON ({ initial, markings, edges })
- event_log_path: CSV event log
- column_mapping: CSV column names (optional)
- concurrency: concurrency table for enabled-time estimation (optional)
- cutoff: reconstruct the state at this timestamp (optional)
- case_ids: restrict to these cases (optional)
- max_cases: maximum case states returned (default: 100)`,
  inputSchema: {
    type: 'object' as const,
    properties: {
      model_path: {
        type: 'string',
        description: 'Path to the BPMN 2.0 model file',
      },
      graph_path: {
        type: 'string',
        description: 'Path to the reachability graph JSON file',
      },
      event_log_path: {
        type: 'string',
        description: 'Path to the CSV event log',
      },
      column_mapping: {
        type: 'object',
        properties: {
          case_id: { type: 'string' },
          activity: { type: 'string' },
          resource: { type: 'string' },
          start_time: { type: 'string' },
          end_time: { type: 'string' },
          enable_time: { type: 'string' },
        },
        description: 'CSV column names for the standard keys (optional)',
      },
      concurrency: {
        type: 'object',
        additionalProperties: { type: 'array', items: { type: 'string' } },
        description: 'Activity name -> concurrently executable activity names (optional)',
      },
      cutoff: {
        type: 'string',
        description: 'ISO 8601 timestamp to reconstruct the state at (optional)',
      },
      case_ids: {
        type: 'array',
        items: { type: 'string' },
        description: 'Case ids to reconstruct (optional)',
      },
      max_cases: {
        type: 'number',
        description: 'Maximum number of case states to return (default: 100)',
      },
    },
    required: ['model_path', 'graph_path', 'event_log_path'],
  },
};

// ============================================================================
// Execution
// ============================================================================

function filterCases(events: LogEvent[], caseIds?: string[]): LogEvent[] {
  if (!caseIds || caseIds.length === 0) {
    return events;
  }
  const wanted = new Set(caseIds);
  return events.filter(event => wanted.has(event.caseId));
}

export async function executeReconstructProcessState(
  rawInput: unknown
): Promise<ReconstructProcessStateResult> {
  const input = ReconstructProcessStateSchema.parse(rawInput);

  const auditContext = createAuditContext('reconstruct_process_state', input);

  try {
    checkRateLimit(auditContext);
    const cutoff = input.cutoff !== undefined ? validateCutoff(input.cutoff, auditContext) : null;

    const [model, graph, loadedEvents] = await withTimeout(
      Promise.all([
        BpmnModel.load(input.model_path),
        ReachabilityGraph.load(input.graph_path),
        readEventLog(input.event_log_path, input.column_mapping),
      ]),
      undefined,
      'reconstruct_process_state:load'
    );

    const sliced = cutoff ? sliceAt(loadedEvents, cutoff) : loadedEvents;
    const events = filterCases(sliced, input.case_ids);

    const computer = new StateComputer({
      model,
      graph,
      matcher: new ReplayTraceMatcher(graph, label => model.getTaskIdByName(label)),
      oracle: new TableConcurrencyOracle(input.concurrency),
    });
    const caseStates = computer.computeCaseStates(events);
    const stats = computeLogStats(events);

    const returned = enforceRowLimit(Array.from(caseStates), input.max_cases, auditContext);
    const cases = serializeCaseStates(returned);

    const result: ReconstructProcessStateResult = {
      cases,
      summary: {
        total_cases: stats.cases,
        reconstructed_cases: caseStates.size,
        dropped_cases: stats.cases - caseStates.size,
        returned_cases: returned.length,
        events: stats.events,
        earliest_start: stats.earliest_start,
        latest_end: stats.latest_end,
      },
      metadata: {
        computed_at: new Date().toISOString(),
        model_path: input.model_path,
        graph_path: input.graph_path,
        event_log_path: input.event_log_path,
        cutoff: cutoff ? cutoff.toISOString() : null,
        graph_size: graph.size,
      },
    };

    auditContext.success(returned.length);
    return result;
  } catch (error) {
    auditContext.error(error);
    throw error;
  }
}
