/**
 * Audit repository for database operations on the audit_events table.
 *
 * The table is append-only: this module inserts and reads, nothing else.
 * Handles snake_case ↔ camelCase mapping between the PostgreSQL schema
 * and the TypeScript AuditEvent type.
 *
 * Metadata is encrypted at rest using AES-256-CBC when an encryption key is
 * supplied (or the AUDIT_ENCRYPTION_KEY environment variable is set). If no
 * key is configured, metadata is stored as plain JSON.
 *
 * @module repositories/auditRepository
 */

import crypto from 'node:crypto';
import { query, type QueryOptions } from '../utils/db.js';
import {
  parseAuditEventType,
  type AuditEvent,
  type AuditEventType,
  type AuditOutcome,
  type PagedResult,
} from '../types/index.js';
import { parseCount, requireEnum, requireRow } from './rows.js';

// ─── Encryption Helpers ──────────────────────────────────────────────────────

const ALGORITHM = 'aes-256-cbc';
const IV_LENGTH = 16;

/**
 * Resolve the AES-256 key. An explicit `null` disables encryption; an
 * omitted key falls back to the environment.
 */
function resolveEncryptionKey(keyHex: string | null | undefined): Buffer | null {
  const hex = keyHex === undefined ? process.env['AUDIT_ENCRYPTION_KEY'] : keyHex;
  if (!hex) {
    return null;
  }
  // Key must be 32 bytes (64 hex characters) for AES-256
  return Buffer.from(hex, 'hex');
}

/**
 * Encrypt a metadata object to a hex string using AES-256-CBC.
 * The IV is prepended to the ciphertext so it can be extracted during decryption.
 *
 * @returns Hex-encoded IV + ciphertext, or plain JSON when no key is configured
 */
export function encryptMetadata(metadata: Record<string, unknown>, keyHex?: string | null): string {
  const key = resolveEncryptionKey(keyHex);
  const json = JSON.stringify(metadata);

  if (!key) {
    return json;
  }

  const iv = crypto.randomBytes(IV_LENGTH);
  const cipher = crypto.createCipheriv(ALGORITHM, key, iv);
  const encrypted = Buffer.concat([cipher.update(json, 'utf8'), cipher.final()]);

  return Buffer.concat([iv, encrypted]).toString('hex');
}

function parseMetadataJson(json: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(json);
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return {};
  }
  return { ...parsed };
}

/**
 * Decrypt a hex string back to a metadata object.
 * Extracts the IV from the first 16 bytes of the decoded buffer.
 */
export function decryptMetadata(data: string, keyHex?: string | null): Record<string, unknown> {
  const key = resolveEncryptionKey(keyHex);

  if (!key) {
    return parseMetadataJson(data);
  }

  const buffer = Buffer.from(data, 'hex');
  const iv = buffer.subarray(0, IV_LENGTH);
  const ciphertext = buffer.subarray(IV_LENGTH);

  const decipher = crypto.createDecipheriv(ALGORITHM, key, iv);
  const decrypted = Buffer.concat([decipher.update(ciphertext), decipher.final()]);

  return parseMetadataJson(decrypted.toString('utf8'));
}

// ─── Row Mapping ─────────────────────────────────────────────────────────────

/** Raw row shape returned by PostgreSQL for the audit_events table. */
interface AuditEventRow {
  id: string;
  tenant_id: string;
  event_type: string;
  actor_id: string | null;
  patient_id: string | null;
  resource_type: string;
  resource_id: string | null;
  outcome: string;
  reason: string | null;
  ip_address: string;
  user_agent: string;
  request_id: string;
  metadata: Buffer | string | null;
  created_at: Date;
}

const AUDIT_COLUMNS = `id, tenant_id, event_type, actor_id, patient_id, resource_type, resource_id, outcome,
       reason, ip_address, user_agent, request_id, metadata, created_at`;

function parseOutcome(value: string): AuditOutcome | null {
  return value === 'success' || value === 'failure' ? value : null;
}

/**
 * Map a database row (snake_case) to an AuditEvent domain object (camelCase).
 * Decrypts the metadata field if present.
 */
function mapRowToAuditEvent(row: AuditEventRow, keyHex: string | null | undefined): AuditEvent {
  let metadata: Record<string, unknown> = {};

  if (row.metadata !== null) {
    // BYTEA columns may come back as Buffer or string depending on driver config
    const metadataStr =
      row.metadata instanceof Buffer ? row.metadata.toString('utf8') : row.metadata;
    metadata = decryptMetadata(metadataStr, keyHex);
  }

  return {
    id: row.id,
    tenantId: row.tenant_id,
    eventType: requireEnum(
      parseAuditEventType(row.event_type),
      'audit_events.event_type',
      row.event_type,
    ),
    actorId: row.actor_id,
    patientId: row.patient_id,
    resourceType: row.resource_type,
    resourceId: row.resource_id,
    outcome: requireEnum(parseOutcome(row.outcome), 'audit_events.outcome', row.outcome),
    reason: row.reason,
    ipAddress: row.ip_address,
    userAgent: row.user_agent,
    requestId: row.request_id,
    metadata,
    createdAt: row.created_at,
  };
}

// ─── Types ───────────────────────────────────────────────────────────────────

/** Fields supplied when appending an audit event. */
export interface NewAuditEvent {
  tenantId: string;
  eventType: AuditEventType;
  actorId: string | null;
  patientId?: string | null;
  resourceType: string;
  resourceId?: string | null;
  outcome: AuditOutcome;
  reason?: string | null;
  ipAddress: string;
  userAgent: string;
  requestId: string;
  metadata?: Record<string, unknown>;
  /** Defaults to the database clock. */
  occurredAt?: Date;
}

export interface AuditQueryOptions extends QueryOptions {
  /** Hex AES-256 key; null stores plain JSON, undefined reads the environment. */
  encryptionKey?: string | null;
}

export interface AuditEventFilter {
  tenantId: string;
  eventType?: AuditEventType;
  actorId?: string;
  patientId?: string;
  outcome?: AuditOutcome;
  from?: Date;
  to?: Date;
  page: number;
  pageSize: number;
}

// ─── Repository Functions ────────────────────────────────────────────────────

/**
 * Append an audit event.
 *
 * Pass a transaction executor in `options` to commit the event together
 * with the change it records.
 */
export async function createAuditEvent(
  event: NewAuditEvent,
  options: AuditQueryOptions = {},
): Promise<AuditEvent> {
  const encryptedMetadata = encryptMetadata(event.metadata ?? {}, options.encryptionKey);

  const result = await query<AuditEventRow>(
    `INSERT INTO audit_events (tenant_id, event_type, actor_id, patient_id, resource_type, resource_id,
                               outcome, reason, ip_address, user_agent, request_id, metadata, created_at)
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, COALESCE($13, NOW()))
     RETURNING ${AUDIT_COLUMNS}`,
    [
      event.tenantId,
      event.eventType,
      event.actorId,
      event.patientId ?? null,
      event.resourceType,
      event.resourceId ?? null,
      event.outcome,
      event.reason ?? null,
      event.ipAddress,
      event.userAgent,
      event.requestId,
      encryptedMetadata,
      event.occurredAt ? event.occurredAt.toISOString() : null,
    ],
    { executor: options.executor, signal: options.signal },
  );

  return mapRowToAuditEvent(requireRow(result, 'audit_events'), options.encryptionKey);
}

/**
 * Find audit events matching a filter, newest first, one page at a time.
 */
export async function findByFilter(
  filter: AuditEventFilter,
  options: AuditQueryOptions = {},
): Promise<PagedResult<AuditEvent>> {
  const conditions: string[] = ['tenant_id = $1'];
  const params: unknown[] = [filter.tenantId];
  let paramIndex = 2;

  if (filter.eventType !== undefined) {
    conditions.push(`event_type = $${paramIndex}`);
    params.push(filter.eventType);
    paramIndex += 1;
  }

  if (filter.actorId !== undefined) {
    conditions.push(`actor_id = $${paramIndex}`);
    params.push(filter.actorId);
    paramIndex += 1;
  }

  if (filter.patientId !== undefined) {
    conditions.push(`patient_id = $${paramIndex}`);
    params.push(filter.patientId);
    paramIndex += 1;
  }

  if (filter.outcome !== undefined) {
    conditions.push(`outcome = $${paramIndex}`);
    params.push(filter.outcome);
    paramIndex += 1;
  }

  if (filter.from !== undefined) {
    conditions.push(`created_at >= $${paramIndex}`);
    params.push(filter.from.toISOString());
    paramIndex += 1;
  }

  if (filter.to !== undefined) {
    conditions.push(`created_at <= $${paramIndex}`);
    params.push(filter.to.toISOString());
    paramIndex += 1;
  }

  const whereClause = conditions.join(' AND ');
  const queryOptions: QueryOptions = { executor: options.executor, signal: options.signal };

  const countResult = await query<{ total: string }>(
    `SELECT COUNT(*) AS total FROM audit_events WHERE ${whereClause}`,
    params,
    queryOptions,
  );

  const offset = (filter.page - 1) * filter.pageSize;
  const result = await query<AuditEventRow>(
    `SELECT ${AUDIT_COLUMNS}
     FROM audit_events
     WHERE ${whereClause}
     ORDER BY created_at DESC
     LIMIT $${paramIndex} OFFSET $${paramIndex + 1}`,
    [...params, filter.pageSize, offset],
    queryOptions,
  );

  return {
    items: result.rows.map((row) => mapRowToAuditEvent(row, options.encryptionKey)),
    total: parseCount(countResult.rows[0]?.total),
    page: filter.page,
    pageSize: filter.pageSize,
  };
}
