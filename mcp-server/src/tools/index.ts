/**
 * Tool Registry
 *
 * Exports every MCP tool definition and its executor.
 */

export {
  reconstructProcessStateTool,
  executeReconstructProcessState,
  ReconstructProcessStateSchema,
  type ReconstructProcessStateInput,
  type ReconstructProcessStateResult,
} from './reconstruct_process_state.js';

export {
  describeProcessModelTool,
  executeDescribeProcessModel,
  DescribeProcessModelSchema,
  type DescribeProcessModelInput,
  type DescribeProcessModelResult,
} from './describe_process_model.js';

import { reconstructProcessStateTool, executeReconstructProcessState } from './reconstruct_process_state.js';
import { describeProcessModelTool, executeDescribeProcessModel } from './describe_process_model.js';

export const allTools = [
  reconstructProcessStateTool,
  describeProcessModelTool,
];

export type ToolExecutor = (input: unknown) => Promise<unknown>;

export const toolExecutors: Record<string, ToolExecutor> = {
  reconstruct_process_state: executeReconstructProcessState,
  describe_process_model: executeDescribeProcessModel,
};

export async function executeTool(toolName: string, input: unknown): Promise<unknown> {
  const executor = toolExecutors[toolName];
  if (!executor) {
    throw new Error(`Unknown tool: ${toolName}`);
  }
  return executor(input);
}
