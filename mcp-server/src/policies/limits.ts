/**
 * Policy Enforcement Module
 *
 * Operational limits for MCP tool calls:
 * - Maximum number of case states returned per call
 * - Timeout handling for model, graph and log loading
 * - Rate limiting (optional)
 *
 * Limits start from DEFAULT_POLICY_CONFIG and can be overridden from the
 * environment at server start-up.
 */

import { AuditContext } from '../logging/audit.js';
import { parseUtcTimestamp } from '../event-log/timestamps.js';

/**
 * Policy configuration
 */
export interface PolicyConfig {
  /** Maximum number of case states a single call may return */
  maxCasesPerResponse: number;
  /** Default timeout for operations in milliseconds */
  defaultTimeoutMs: number;
  /** Maximum timeout that can be requested */
  maxTimeoutMs: number;
  /** Rate limit: max requests per minute (0 = unlimited) */
  maxRequestsPerMinute: number;
}

export const DEFAULT_POLICY_CONFIG: PolicyConfig = {
  maxCasesPerResponse: 500,
  defaultTimeoutMs: 30000, // 30 seconds
  maxTimeoutMs: 120000, // 2 minutes
  maxRequestsPerMinute: 0, // Unlimited by default
};

let currentConfig: PolicyConfig = { ...DEFAULT_POLICY_CONFIG };

export function updatePolicyConfig(updates: Partial<PolicyConfig>): void {
  currentConfig = { ...currentConfig, ...updates };
}

export function getPolicyConfig(): PolicyConfig {
  return { ...currentConfig };
}

export function resetPolicyConfig(): void {
  currentConfig = { ...DEFAULT_POLICY_CONFIG };
}

function nonNegativeInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim().length === 0) return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : undefined;
}

/**
 * Policy overrides from environment variables. Unset or unparseable values
 * keep their defaults.
 */
export function policyConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<PolicyConfig> {
  const overrides: Partial<PolicyConfig> = {};

  const maxCases = nonNegativeInteger(env['MAX_CASES_PER_RESPONSE']);
  if (maxCases !== undefined) overrides.maxCasesPerResponse = maxCases;

  const timeout = nonNegativeInteger(env['TOOL_TIMEOUT_MS']);
  if (timeout !== undefined) overrides.defaultTimeoutMs = timeout;

  const rate = nonNegativeInteger(env['MAX_REQUESTS_PER_MINUTE']);
  if (rate !== undefined) overrides.maxRequestsPerMinute = rate;

  return overrides;
}

/**
 * Policy violation error
 */
export class PolicyViolationError extends Error {
  readonly violation: string;
  readonly details?: Record<string, unknown>;

  constructor(violation: string, details?: Record<string, unknown>) {
    super(`Policy violation: ${violation}`);
    this.name = 'PolicyViolationError';
    this.violation = violation;
    if (details) {
      this.details = details;
    }
  }
}

/**
 * Timeout error
 */
export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, operationName?: string) {
    super(`${operationName ? `${operationName}: ` : ''}Operation timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Truncate results to the configured limit, recording a violation when
 * anything was cut
 */
export function enforceRowLimit<T>(
  results: T[],
  requestedLimit?: number,
  auditContext?: AuditContext
): T[] {
  const maxLimit = currentConfig.maxCasesPerResponse;
  const effectiveLimit = Math.min(requestedLimit ?? maxLimit, maxLimit);

  if (results.length > effectiveLimit) {
    if (auditContext) {
      auditContext.policyViolation('row_limit_exceeded', {
        requested: results.length,
        limit: effectiveLimit,
        truncated_to: effectiveLimit,
      });
    }
    return results.slice(0, effectiveLimit);
  }

  return results;
}

/**
 * Execute an operation with timeout
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs?: number,
  operationName?: string
): Promise<T> {
  const effectiveTimeout = Math.min(
    timeoutMs ?? currentConfig.defaultTimeoutMs,
    currentConfig.maxTimeoutMs
  );

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new TimeoutError(effectiveTimeout, operationName));
    }, effectiveTimeout);

    operation
      .then(result => {
        clearTimeout(timer);
        resolve(result);
      })
      .catch((error: unknown) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}

/**
 * Rate limiter (simple in-memory implementation)
 */
class RateLimiter {
  private requests: number[] = [];
  private windowMs = 60000; // 1 minute

  canProceed(): boolean {
    if (currentConfig.maxRequestsPerMinute <= 0) {
      return true;
    }

    const now = Date.now();
    this.requests = this.requests.filter(t => now - t < this.windowMs);

    if (this.requests.length >= currentConfig.maxRequestsPerMinute) {
      return false;
    }

    this.requests.push(now);
    return true;
  }

  reset(): void {
    this.requests = [];
  }
}

const rateLimiter = new RateLimiter();

export function resetRateLimiter(): void {
  rateLimiter.reset();
}

export function checkRateLimit(auditContext?: AuditContext): void {
  if (!rateLimiter.canProceed()) {
    if (auditContext) {
      auditContext.policyViolation('rate_limit_exceeded', {
        max_per_minute: currentConfig.maxRequestsPerMinute,
      });
    }
    throw new PolicyViolationError('Rate limit exceeded', {
      max_per_minute: currentConfig.maxRequestsPerMinute,
      retry_after_seconds: 60,
    });
  }
}

/**
 * Validate a cut-off timestamp (zone-less values are UTC)
 */
export function validateCutoff(cutoff: string, auditContext?: AuditContext): Date {
  const parsed = parseUtcTimestamp(cutoff);
  if (parsed === null) {
    if (auditContext) {
      auditContext.policyViolation('invalid_cutoff', { cutoff });
    }
    throw new PolicyViolationError('Invalid cutoff timestamp', { cutoff });
  }
  return parsed;
}
