/**
 * Logging Module
 *
 * Re-exports from audit-logger.
 */

export {
  AuditContext,
  createAuditContext,
  generateRequestId,
  getLogger,
  sanitizeParams,
  logToolStart,
  logToolSuccess,
  logToolError,
  logPolicyViolation,
  logServerEvent,
} from './audit-logger.js';

export type { AuditLogEntry } from './audit-logger.js';
