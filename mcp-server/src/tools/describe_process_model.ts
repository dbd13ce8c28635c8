/**
 * Tool: describe_process_model
 *
 * Loads a BPMN model and lists its activities, gateways, start and end
 * events. Useful for checking which activity names an event log must use
 * before reconstructing case states.
 */

import { z } from 'zod';

import { createAuditContext } from '../logging/audit.js';
import { checkRateLimit, withTimeout } from '../policies/limits.js';
import { BpmnModel, ProcessModelSummary } from '../model/index.js';

// ============================================================================
// Zod Schema
// ============================================================================

export const DescribeProcessModelSchema = z.object({
  model_path: z.string().min(1).describe('Path to the BPMN 2.0 model file'),
});

export type DescribeProcessModelInput = z.infer<typeof DescribeProcessModelSchema>;

export interface DescribeProcessModelResult extends ProcessModelSummary {
  model_path: string;
}

// ============================================================================
// Tool Definition
// ============================================================================

export const describeProcessModelTool = {
  name: 'describe_process_model',
  description: `Describe a BPMN process model.

Returns:
- activities: id and name of every task-like element
- gateways, start_events, end_events: element ids
- sequence_flow_count: number of sequence flows

Activity names are what the event log's activity column must contain.`,
  inputSchema: {
    type: 'object' as const,
    properties: {
      model_path: {
        type: 'string',
        description: 'Path to the BPMN 2.0 model file',
      },
    },
    required: ['model_path'],
  },
};

// ============================================================================
// Execution
// ============================================================================

export async function executeDescribeProcessModel(
  rawInput: unknown
): Promise<DescribeProcessModelResult> {
  const input = DescribeProcessModelSchema.parse(rawInput);

  const auditContext = createAuditContext('describe_process_model', input);

  try {
    checkRateLimit(auditContext);
    const model = await withTimeout(
      BpmnModel.load(input.model_path),
      undefined,
      'describe_process_model:load'
    );

    const summary = model.describe();
    auditContext.success(summary.activities.length);
    return { model_path: input.model_path, ...summary };
  } catch (error) {
    auditContext.error(error);
    throw error;
  }
}
