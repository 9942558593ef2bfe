/**
 * Audit Module
 *
 * Append-only trail of authentication and access events.
 *
 * @module audit
 */

export type {
  AccessAuditParams,
  AuditQuery,
  AuditRecord,
  AuditStore,
  AuthAuditParams,
  NewAuditEvent,
} from './types.js';
export { AuditRecorder, DEFAULT_AUDIT_PAGE_SIZE, MAX_AUDIT_PAGE_SIZE } from './auditRecorder.js';
export type { AuditRecorderDeps } from './auditRecorder.js';
