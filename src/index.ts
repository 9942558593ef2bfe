/**
 * Patient Access Engine – public entry point.
 *
 * Re-exports configuration, the engine composition root, the HTTP adapter
 * and the access, audit and authentication services.
 *
 * @module patient-access-engine
 */

// ─── Core Types ───
export {
  AccessLevel,
  AuditEventType,
  ConsentType,
  UserRole,
  UserStatus,
  parseAccessLevel,
  parseUserRole,
} from './types/index.js';
export type {
  AccessTokenClaims,
  Actor,
  AuditEvent,
  AuditOutcome,
  PagedResult,
  PatientAccess,
  PatientConsent,
  RequestContext,
  RequestedAccessLevel,
  Session,
  TokenPair,
  User,
  UserInfo,
  UserScope,
} from './types/index.js';

// ─── Errors ───
export {
  DENY_REASONS,
  ENGINE_ERROR_CODES,
  EngineError,
  extractErrorCode,
  isEngineError,
} from './utils/errors.js';
export type { DenyReason, EngineErrorCode } from './utils/errors.js';

// ─── Configuration & Logging ───
export { ConfigError, loadConfig } from './config/index.js';
export type {
  EmergencyAccessPolicy,
  EngineConfig,
  LockoutPolicy,
  SessionPolicy,
  TokenConfig,
} from './config/index.js';
export { createLogger, silentLogger } from './logging/logger.js';
export type { Logger, LogEntry, LogLevel } from './logging/logger.js';

// ─── Composition ───
export { createEngine, pgDirectory } from './engine.js';
export type { Engine, EngineOptions } from './engine.js';
export { createApp } from './app.js';
export type { AppDependencies } from './app.js';

// ─── HTTP Middleware ───
export { authenticate, extractBearerToken, toActor } from './middleware/authenticate.js';
export { requirePatientAccess } from './middleware/requirePatientAccess.js';
export { getRequestContext, requestContext } from './middleware/requestContext.js';

// ─── Authentication ───
export {
  authenticate as login,
  getCurrentUser,
  logout,
  logoutAll,
  refresh,
  toUserInfo,
} from './services/authService.js';
export type { AuthDeps, AuthFailure, LoginRequest, LoginSuccess } from './services/authService.js';
export {
  grantScope,
  listActiveScopes,
  lockUser,
  revokeScope,
  softDeleteUser,
  unlockUser,
} from './services/credentialService.js';
export type { CredentialAdminDeps } from './services/credentialService.js';
export { createTokenCodec, hashRefreshToken } from './services/tokenService.js';
export type { TokenCodec } from './services/tokenService.js';
export { hashPassword, verifyPassword } from './services/passwordService.js';

// ─── Access & Audit ───
export * from './access/index.js';
export * from './audit/index.js';
