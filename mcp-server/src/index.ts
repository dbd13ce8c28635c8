#!/usr/bin/env node
/**
 * Ongoing Process State MCP Server
 *
 * Reconstructs the runtime state of in-flight process cases from a BPMN
 * model, its reachability graph and an event log, and exposes this over the
 * Model Context Protocol (MCP).
 *
 * Architecture:
 * - Tools: reconstruct_process_state, describe_process_model
 * - Policies: case limits, load timeouts, rate limiting
 * - Audit: structured logging of all tool calls (stderr, optional file)
 *
 * Usage:
 *   node dist/mcp-server/src/index.js
 *   LOG_LEVEL=debug AUDIT_LOG_PATH=./audit.log node dist/mcp-server/src/index.js
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { ZodError } from 'zod';

import { allTools, executeTool } from './tools/index.js';
import { logServerEvent } from './logging/audit-logger.js';
import {
  PolicyConfig,
  PolicyViolationError,
  TimeoutError,
  getPolicyConfig,
  policyConfigFromEnv,
  updatePolicyConfig,
} from './policies/limits.js';
import { ModelParseError } from './model/index.js';
import { GraphFormatError } from './reachability/index.js';
import { EventLogError } from './event-log/index.js';

/**
 * Server configuration from environment
 */
interface ServerConfig {
  logLevel: string;
  auditLogPath?: string;
  policy: PolicyConfig;
}

function getConfig(): ServerConfig {
  updatePolicyConfig(policyConfigFromEnv());
  const auditLogPath = process.env['AUDIT_LOG_PATH'];
  return {
    logLevel: process.env['LOG_LEVEL'] || 'info',
    ...(auditLogPath ? { auditLogPath } : {}),
    policy: getPolicyConfig(),
  };
}

/**
 * Create and configure the MCP server
 */
function createMCPServer(): Server {
  const server = new Server(
    {
      name: 'ongoing-process-state-mcp',
      version: '1.0.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  return server;
}

function errorResponse(payload: Record<string, unknown>) {
  return {
    content: [
      {
        type: 'text' as const,
        text: JSON.stringify(payload, null, 2),
      },
    ],
    isError: true,
  };
}

/**
 * Set up request handlers for the MCP server
 */
function setupHandlers(server: Server): void {
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: allTools,
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      const result = await executeTool(name, args);

      return {
        content: [
          {
            type: 'text' as const,
            text: JSON.stringify(result, null, 2),
          },
        ],
      };
    } catch (error) {
      // Policy violations (rate limit, invalid cut-off)
      if (error instanceof PolicyViolationError) {
        return errorResponse({
          error: 'Policy Violation',
          code: 'POLICY_VIOLATION',
          message: error.message,
          violation: error.violation,
          details: error.details,
        });
      }

      if (error instanceof TimeoutError) {
        return errorResponse({
          error: 'Timeout',
          code: 'TIMEOUT',
          message: error.message,
          timeout_ms: error.timeoutMs,
        });
      }

      // Unusable input files
      if (error instanceof ModelParseError) {
        return errorResponse({
          error: 'Invalid Process Model',
          code: 'MODEL_PARSE_ERROR',
          message: error.message,
          source: error.source,
          details: error.details,
        });
      }

      if (error instanceof GraphFormatError) {
        return errorResponse({
          error: 'Invalid Reachability Graph',
          code: 'GRAPH_FORMAT_ERROR',
          message: error.message,
          issues: error.issues,
        });
      }

      if (error instanceof EventLogError) {
        return errorResponse({
          error: 'Invalid Event Log',
          code: 'EVENT_LOG_ERROR',
          message: error.message,
          line: error.line,
          column: error.column,
        });
      }

      if (error instanceof ZodError) {
        return errorResponse({
          error: 'Validation Error',
          code: 'VALIDATION_ERROR',
          message: 'Invalid tool parameters',
          issues: error.issues,
        });
      }

      const errorMessage = error instanceof Error ? error.message : String(error);
      const errorName = error instanceof Error ? error.name : 'UnknownError';

      return errorResponse({
        error: 'Tool Execution Error',
        code: 'EXECUTION_ERROR',
        error_type: errorName,
        message: errorMessage,
      });
    }
  });
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const config = getConfig();

  logServerEvent('start', {
    log_level: config.logLevel,
    audit_log: config.auditLogPath || 'none',
    max_cases_per_response: config.policy.maxCasesPerResponse,
    timeout_ms: config.policy.defaultTimeoutMs,
    tools_count: allTools.length,
  });

  try {
    const server = createMCPServer();
    setupHandlers(server);

    const shutdown = async (signal: string) => {
      logServerEvent('stop', { signal });
      await server.close();
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    const transport = new StdioServerTransport();
    await server.connect(transport);

    logServerEvent('ready', {
      tools: allTools.map(t => t.name),
    });
  } catch (error) {
    logServerEvent('error', {
      message: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logServerEvent('error', {
    message: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
