/**
 * Core type definitions for the patient access engine.
 * All types are derived from the data model: users, sessions, scopes,
 * patient access grants, consents, and audit events.
 */

// ─── Enums ───────────────────────────────────────────────────────────────────

export enum UserRole {
  SYSTEM_ADMINISTRATOR = 'SystemAdministrator',
  HEALTHCARE_PROVIDER = 'HealthcareProvider',
  NURSE = 'Nurse',
  PATIENT = 'Patient',
  FAMILY_MEMBER = 'FamilyMember',
  RESEARCHER = 'Researcher',
  IT_SUPPORT = 'ITSupport',
  READ_ONLY_USER = 'ReadOnlyUser',
  DATA_ANALYST = 'DataAnalyst',
  IT_ADMINISTRATOR = 'ITAdministrator',
  GUEST = 'Guest',
}

export enum UserStatus {
  ACTIVE = 'Active',
  INACTIVE = 'Inactive',
  LOCKED = 'Locked',
  SUSPENDED = 'Suspended',
  PENDING = 'Pending',
  EXPIRED = 'Expired',
  PENDING_VERIFICATION = 'PendingVerification',
  DELETED = 'Deleted',
}

export enum AccessLevel {
  READ = 'Read',
  WRITE = 'Write',
  ADMIN = 'Admin',
  EMERGENCY = 'Emergency',
  RESEARCH = 'Research',
  ANALYTICS = 'Analytics',
}

export enum ConsentType {
  DATA_SHARING = 'DataSharing',
  RESEARCH_PARTICIPATION = 'ResearchParticipation',
  EMERGENCY_ACCESS = 'EmergencyAccess',
  FAMILY_ACCESS = 'FamilyAccess',
  THIRD_PARTY_ACCESS = 'ThirdPartyAccess',
  MARKETING_COMMUNICATIONS = 'MarketingCommunications',
  AUTOMATED_DECISION_MAKING = 'AutomatedDecisionMaking',
  DATA_PORTABILITY = 'DataPortability',
  DATA_RETENTION = 'DataRetention',
  TREATMENT_CONSENT = 'TreatmentConsent',
}

export enum AuditEventType {
  LOGIN_SUCCESS = 'LoginSuccess',
  LOGIN_FAILURE = 'LoginFailure',
  ACCOUNT_LOCKED = 'AccountLocked',
  ACCOUNT_UNLOCKED = 'AccountUnlocked',
  LOGOUT_SUCCESS = 'LogoutSuccess',
  TOKEN_REFRESH = 'TokenRefresh',
  TOKEN_REFRESH_FAILURE = 'TokenRefreshFailure',
  SESSIONS_REVOKED = 'SessionsRevoked',
  ACCESS_GRANTED = 'AccessGranted',
  ACCESS_REVOKED = 'AccessRevoked',
  ACCESS_EXTENDED = 'AccessExtended',
  ACCESS_DENIED = 'AccessDenied',
  EMERGENCY_ACCESS_GRANTED = 'EmergencyAccessGranted',
  EMERGENCY_ACCESS_USED = 'EmergencyAccessUsed',
  SCOPE_GRANTED = 'ScopeGranted',
  SCOPE_REVOKED = 'ScopeRevoked',
  USER_DELETED = 'UserDeleted',
}

/** Access levels a caller may request from the decision engine. */
export type RequestedAccessLevel = AccessLevel.READ | AccessLevel.WRITE | AccessLevel.ADMIN;

const USER_ROLES: readonly UserRole[] = Object.values(UserRole);
const USER_STATUSES: readonly UserStatus[] = Object.values(UserStatus);
const ACCESS_LEVELS: readonly AccessLevel[] = Object.values(AccessLevel);
const CONSENT_TYPES: readonly ConsentType[] = Object.values(ConsentType);
const AUDIT_EVENT_TYPES: readonly AuditEventType[] = Object.values(AuditEventType);

/**
 * Narrow an untyped value (a token claim or a database column) to a
 * {@link UserRole}. This is the only place a role string becomes a role.
 */
export function parseUserRole(value: unknown): UserRole | null {
  return USER_ROLES.find((role) => role === value) ?? null;
}

export function parseUserStatus(value: unknown): UserStatus | null {
  return USER_STATUSES.find((status) => status === value) ?? null;
}

export function parseAccessLevel(value: unknown): AccessLevel | null {
  return ACCESS_LEVELS.find((level) => level === value) ?? null;
}

export function parseConsentType(value: unknown): ConsentType | null {
  return CONSENT_TYPES.find((type) => type === value) ?? null;
}

export function parseAuditEventType(value: unknown): AuditEventType | null {
  return AUDIT_EVENT_TYPES.find((type) => type === value) ?? null;
}

// ─── Data Models ─────────────────────────────────────────────────────────────

export interface User {
  id: string;
  tenantId: string;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  passwordHash: string;
  role: UserRole;
  status: UserStatus;
  failedLoginAttempts: number;
  lockedUntil: Date | null;
  practitionerId: string | null;
  lastLoginAt: Date | null;
  lastLoginIp: string | null;
  isDeleted: boolean;
  deletedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/** Persisted refresh-token record. Only the SHA-256 hash of the token is stored. */
export interface Session {
  id: string;
  userId: string;
  tenantId: string;
  refreshTokenHash: string;
  createdAt: Date;
  expiresAt: Date;
  lastAccessedAt: Date | null;
  isRevoked: boolean;
  revokedAt: Date | null;
  revocationReason: string | null;
  ipAddress: string | null;
  userAgent: string | null;
}

export interface UserScope {
  id: string;
  userId: string;
  tenantId: string;
  scope: string;
  grantedBy: string;
  grantedAt: Date;
  expiresAt: Date | null;
  isRevoked: boolean;
  revokedAt: Date | null;
}

export interface PatientAccess {
  id: string;
  userId: string;
  patientId: string;
  tenantId: string;
  accessLevel: AccessLevel;
  grantedBy: string;
  reason: string | null;
  grantedAt: Date;
  expiresAt: Date | null;
  isEnabled: boolean;
  emergencyJustification: string | null;
  modifiedAt: Date | null;
  modifiedBy: string | null;
  revokedAt: Date | null;
  revocationReason: string | null;
}

export interface PatientConsent {
  id: string;
  patientId: string;
  tenantId: string;
  consentType: ConsentType;
  isGranted: boolean;
  effectiveFrom: Date;
  expiresAt: Date | null;
  revokedAt: Date | null;
  grantedBy: string;
  witnessName: string | null;
  witnessSignedAt: Date | null;
}

export type AuditOutcome = 'success' | 'failure';

export interface AuditEvent {
  id: string;
  tenantId: string;
  eventType: AuditEventType;
  actorId: string | null;
  patientId: string | null;
  resourceType: string;
  resourceId: string | null;
  outcome: AuditOutcome;
  reason: string | null;
  ipAddress: string;
  userAgent: string;
  requestId: string;
  metadata: Record<string, unknown>;
  createdAt: Date;
}

// ─── Service Types ───────────────────────────────────────────────────────────

/** Request context providing IP, user agent and correlation id for audit logging. */
export interface RequestContext {
  ipAddress: string;
  userAgent: string;
  requestId?: string;
  signal?: AbortSignal;
}

/** The authenticated caller, as established from verified token claims. */
export interface Actor {
  userId: string;
  tenantId: string;
  role: UserRole;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  accessTokenExpiresAt: Date;
  refreshTokenExpiresAt: Date;
}

export interface AccessTokenClaims {
  userId: string;
  username: string;
  role: UserRole;
  tenantId: string;
  scopes: string[];
  practitionerId: string | null;
  issuedAt: Date;
  expiresAt: Date;
}

/** Public projection of a user returned after login. */
export interface UserInfo {
  id: string;
  username: string;
  email: string;
  fullName: string;
  role: UserRole;
  practitionerId: string | null;
  tenantId: string;
  scopes: string[];
}

export interface Page {
  page: number;
  pageSize: number;
}

export interface PagedResult<T> {
  items: T[];
  total: number;
  page: number;
  pageSize: number;
}
