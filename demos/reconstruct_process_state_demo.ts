#!/usr/bin/env npx tsx
/**
 * Demo: reconstruct_process_state Tool
 *
 * Reconstructs the state of in-flight insurance claims from the claims
 * fixtures: a BPMN model, its reachability graph and a CSV event log.
 *
 * Usage:
 *   npm run demo
 */

import { join } from 'path';

import { executeDescribeProcessModel } from '../mcp-server/src/tools/describe_process_model.js';
import { executeReconstructProcessState } from '../mcp-server/src/tools/reconstruct_process_state.js';

const FIXTURES = join(__dirname, '../mcp-server/tests/fixtures');

// ANSI colors for terminal output
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  magenta: '\x1b[35m',
};

function printHeader(text: string): void {
  console.log(`\n${colors.bright}${colors.cyan}${'═'.repeat(70)}${colors.reset}`);
  console.log(`${colors.bright}${colors.cyan}  ${text}${colors.reset}`);
  console.log(`${colors.cyan}${'═'.repeat(70)}${colors.reset}\n`);
}

function time(value: string | null): string {
  return value === null ? `${colors.dim}unknown${colors.reset}` : value.replace('T', ' ').slice(0, 19);
}

async function runDemo(): Promise<void> {
  printHeader('Ongoing Process State - reconstruct_process_state Demo');

  const modelPath = join(FIXTURES, 'claims.bpmn');
  const model = await executeDescribeProcessModel({ model_path: modelPath });

  console.log(`${colors.bright}Claims Process:${colors.reset}`);
  console.log(`  ${model.activities.map(a => `${colors.cyan}${a.name}${colors.reset}`).join(' → ')}`);
  console.log(`  ${colors.dim}(Check Documents and Assess Damage run in parallel)${colors.reset}\n`);

  const cutoff = '2025-03-03T09:45:00.000Z';
  const result = await executeReconstructProcessState({
    model_path: modelPath,
    graph_path: join(FIXTURES, 'claims-graph.json'),
    event_log_path: join(FIXTURES, 'claims-log.csv'),
    cutoff,
  });

  printHeader(`Case States at ${time(cutoff)}`);

  console.log(`  Cases in log:        ${colors.cyan}${result.summary.total_cases}${colors.reset}`);
  console.log(`  In flight:           ${colors.green}${result.summary.reconstructed_cases}${colors.reset}`);
  console.log(`  Completed (dropped): ${colors.yellow}${result.summary.dropped_cases}${colors.reset}`);

  for (const [caseId, state] of Object.entries(result.cases)) {
    console.log(`\n${colors.bright}${caseId}${colors.reset}`);
    console.log(`${colors.dim}─────────────────────────────────────${colors.reset}`);
    console.log(`  Tokens on: ${state.control_flow_state.flows.join(', ') || colors.dim + 'none' + colors.reset}`);

    for (const ongoing of state.ongoing_activities) {
      console.log(
        `  ${colors.magenta}running${colors.reset}  ${ongoing.id ?? '?'} ` +
        `since ${time(ongoing.start_time)} ${colors.dim}(${ongoing.resource || 'no resource'})${colors.reset}`
      );
    }
    for (const enabled of state.enabled_activities) {
      console.log(`  ${colors.green}enabled${colors.reset}  ${enabled.id} since ${time(enabled.enabled_time)}`);
    }
    for (const gateway of state.enabled_gateways) {
      console.log(`  ${colors.yellow}gateway${colors.reset}  ${gateway.id} since ${time(gateway.enabled_time)}`);
    }
  }

  printHeader('Demo Complete');
}

runDemo().catch((error: unknown) => {
  console.error(`\n${colors.bright}${colors.red}Error:${colors.reset}`, error);
  process.exit(1);
});
