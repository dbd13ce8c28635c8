/**
 * Audit Logger
 *
 * One winston logger shared by the tool handlers and the reconstruction
 * components. Every tool call gets a request id; its start, outcome, case
 * count and duration are logged against that id, and its parameters are
 * logged with secrets masked.
 *
 * Console output goes to stderr: stdout carries the MCP stdio protocol.
 * Set AUDIT_LOG_PATH to also keep a rotating JSON audit file.
 */

import { v4 as uuidv4 } from 'uuid';
import winston from 'winston';

/**
 * Structured record of one tool call
 */
export interface AuditLogEntry {
  timestamp: string;
  request_id: string;
  tool_name: string;
  params: Record<string, unknown>;
  row_count?: number;
  duration_ms?: number;
  success: boolean;
  error_message?: string;
  error_type?: string;
  policy_violations?: Array<{
    violation: string;
    details?: Record<string, unknown>;
  }>;
}

const auditLogPath = process.env['AUDIT_LOG_PATH'];

const consoleTransport = new winston.transports.Console({
  stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
  format: winston.format.combine(
    winston.format.colorize(),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
      const requestIdValue = meta['request_id'];
      const requestId = typeof requestIdValue === 'string' ? `[${requestIdValue.slice(0, 8)}]` : '';
      const toolValue = meta['tool_name'];
      const tool = typeof toolValue === 'string' ? `<${toolValue}>` : '';
      const componentValue = meta['component'];
      const component = typeof componentValue === 'string' ? `(${componentValue})` : '';
      return `${String(timestamp)} ${level} ${requestId}${tool}${component} ${String(message)}`;
    })
  ),
});

const logger = winston.createLogger({
  level: process.env['LOG_LEVEL'] || 'info',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
    winston.format.json()
  ),
  defaultMeta: { service: 'ongoing-process-state-mcp' },
  transports: [
    consoleTransport,
    ...(auditLogPath
      ? [
          new winston.transports.File({
            filename: auditLogPath,
            maxsize: 10 * 1024 * 1024,
            maxFiles: 5,
            tailable: true,
          }),
        ]
      : []),
  ],
});

// Parameter keys whose values are masked
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /secret/i,
  /token/i,
  /credential/i,
  /apikey/i,
];

/**
 * Copy of tool parameters that is safe to log. Secret-looking keys are
 * masked at any depth and long strings are cut at 500 characters.
 */
export function sanitizeParams(params: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(params)) {
    const isSensitive = SENSITIVE_FIELD_PATTERNS.some(pattern => pattern.test(key));

    if (isSensitive) {
      sanitized[key] = '***REDACTED***';
    } else if (isPlainRecord(value)) {
      sanitized[key] = sanitizeParams(value);
    } else if (typeof value === 'string' && value.length > 500) {
      sanitized[key] = value.slice(0, 500) + '...[truncated]';
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Request id for correlating a tool call's log lines */
export function generateRequestId(): string {
  return uuidv4();
}

/**
 * Child logger for a reconstruction component
 */
export function getLogger(component: string): winston.Logger {
  return logger.child({ component });
}

export function logToolStart(
  requestId: string,
  toolName: string,
  params: Record<string, unknown>
): void {
  logger.info('Tool call started', {
    type: 'tool_start',
    request_id: requestId,
    tool_name: toolName,
    params: sanitizeParams(params),
  });
}

export function logToolSuccess(
  requestId: string,
  toolName: string,
  rowCount: number,
  durationMs: number
): void {
  logger.info('Tool call completed', {
    type: 'tool_success',
    request_id: requestId,
    tool_name: toolName,
    row_count: rowCount,
    duration_ms: durationMs,
  });
}

/**
 * Log a failed tool call with the error's name and message
 */
export function logToolError(
  requestId: string,
  toolName: string,
  error: unknown,
  durationMs: number
): void {
  const errorMessage = error instanceof Error ? error.message : String(error);
  const errorType = error instanceof Error ? error.name : 'UnknownError';

  logger.error('Tool call failed', {
    type: 'tool_error',
    request_id: requestId,
    tool_name: toolName,
    error_message: errorMessage,
    error_type: errorType,
    duration_ms: durationMs,
  });
}

export function logPolicyViolation(
  requestId: string,
  toolName: string,
  violation: string,
  details?: Record<string, unknown>
): void {
  logger.warn('Policy violation', {
    type: 'policy_violation',
    request_id: requestId,
    tool_name: toolName,
    violation,
    details,
  });
}

/**
 * Log a server lifecycle transition; `error` goes out at error level
 */
export function logServerEvent(
  event: 'start' | 'stop' | 'error' | 'ready',
  details?: Record<string, unknown>
): void {
  const level = event === 'error' ? 'error' : 'info';
  logger.log(level, `Server ${event}`, {
    type: `server_${event}`,
    ...details,
  });
}

/**
 * Tracks one tool call from start to completion. Only the first of
 * `success` and `error` is logged.
 */
export class AuditContext {
  readonly requestId: string;
  readonly toolName: string;
  readonly startTime: number;
  private readonly params: Record<string, unknown>;
  private policyViolations: Array<{ violation: string; details?: Record<string, unknown> }> = [];
  private completed = false;

  constructor(toolName: string, params: Record<string, unknown>, requestId?: string) {
    this.requestId = requestId || generateRequestId();
    this.toolName = toolName;
    this.params = params;
    this.startTime = Date.now();

    logToolStart(this.requestId, toolName, params);
  }

  /** Remember a violation for the audit entry and log it right away */
  policyViolation(violation: string, details?: Record<string, unknown>): void {
    this.policyViolations.push({
      violation,
      ...(details ? { details } : {}),
    });
    logPolicyViolation(this.requestId, this.toolName, violation, details);
  }

  success(rowCount: number): void {
    if (this.completed) return;
    this.completed = true;

    logToolSuccess(this.requestId, this.toolName, rowCount, Date.now() - this.startTime);
  }

  error(err: unknown): void {
    if (this.completed) return;
    this.completed = true;

    logToolError(this.requestId, this.toolName, err, Date.now() - this.startTime);
  }

  isCompleted(): boolean {
    return this.completed;
  }

  getPolicyViolations(): Array<{ violation: string; details?: Record<string, unknown> }> {
    return [...this.policyViolations];
  }

  toAuditEntry(success: boolean, rowCount?: number, errorMessage?: string): AuditLogEntry {
    return {
      timestamp: new Date(this.startTime).toISOString(),
      request_id: this.requestId,
      tool_name: this.toolName,
      params: sanitizeParams(this.params),
      ...(rowCount !== undefined ? { row_count: rowCount } : {}),
      duration_ms: Date.now() - this.startTime,
      success,
      ...(errorMessage ? { error_message: errorMessage } : {}),
      ...(this.policyViolations.length > 0 ? { policy_violations: this.policyViolations } : {}),
    };
  }
}

export function createAuditContext(
  toolName: string,
  params: Record<string, unknown>,
  requestId?: string
): AuditContext {
  return new AuditContext(toolName, params, requestId);
}
