/**
 * Engine composition root.
 *
 * Wires the pg repositories, token codec, audit recorder and services from
 * a loaded {@link EngineConfig}. Tests build the same graph from in-memory
 * stores instead (see `src/test/fakes.ts`).
 *
 * @module engine
 */

import type pg from 'pg';
import type { EngineConfig } from './config/index.js';
import { closePool, createPool, setPool } from './utils/db.js';
import { createLogger, type Logger } from './logging/logger.js';
import * as auditRepository from './repositories/auditRepository.js';
import * as consentRepository from './repositories/consentRepository.js';
import * as patientAccessRepository from './repositories/patientAccessRepository.js';
import * as patientRepository from './repositories/patientRepository.js';
import * as sessionRepository from './repositories/sessionRepository.js';
import * as userRepository from './repositories/userRepository.js';
import * as userScopeRepository from './repositories/userScopeRepository.js';
import * as passwordService from './services/passwordService.js';
import { createTokenCodec, type TokenCodec } from './services/tokenService.js';
import type { AuthDeps } from './services/authService.js';
import type { CredentialAdminDeps } from './services/credentialService.js';
import { AuditRecorder } from './audit/auditRecorder.js';
import { AccessDecisionEngine } from './access/accessDecisionEngine.js';
import { AccessGrantService } from './access/accessGrantService.js';
import { EmergencyAccessService } from './access/emergencyAccessService.js';
import type { DirectoryStore } from './access/types.js';
import type { AppDependencies } from './app.js';

export interface Engine {
  config: Readonly<EngineConfig>;
  logger: Logger;
  codec: TokenCodec;
  audit: AuditRecorder;
  decisions: AccessDecisionEngine;
  grants: AccessGrantService;
  emergency: EmergencyAccessService;
  auth: AuthDeps;
  admin: CredentialAdminDeps;
  /** Dependencies for {@link createApp}. */
  app: AppDependencies;
  close(): Promise<void>;
}

export interface EngineOptions {
  logger?: Logger;
  /** Use an existing pool instead of creating one from `config.db`. */
  pool?: pg.Pool;
  now?: () => Date;
}

/** Directory lookups backed by the users and patients tables. */
export const pgDirectory: DirectoryStore = {
  async userExists(tenantId, userId, options) {
    return (await userRepository.findById(tenantId, userId, options)) !== null;
  },
  patientExists: patientRepository.patientExists,
};

export function createEngine(config: Readonly<EngineConfig>, options: EngineOptions = {}): Engine {
  const logger = options.logger ?? createLogger({ level: config.logLevel });
  const now = options.now;

  setPool(options.pool ?? createPool(config.db));

  const codec = createTokenCodec(config.token, { now });
  const audit = new AuditRecorder({
    store: auditRepository,
    encryptionKey: config.auditEncryptionKey,
    logger,
  });

  const auth: AuthDeps = {
    credentialStore: userRepository,
    scopeStore: userScopeRepository,
    sessionStore: sessionRepository,
    sessionPolicy: config.session,
    passwords: passwordService,
    codec,
    audit,
    lockoutPolicy: config.lockout,
    logger,
    now,
  };

  const admin: CredentialAdminDeps = {
    userStore: userRepository,
    scopeStore: userScopeRepository,
    sessionStore: sessionRepository,
    sessionPolicy: config.session,
    audit,
    logger,
    now,
  };

  const decisions = new AccessDecisionEngine({
    grants: patientAccessRepository,
    consents: consentRepository,
    audit,
    logger,
    now,
  });
  const grants = new AccessGrantService({
    grants: patientAccessRepository,
    directory: pgDirectory,
    audit,
    logger,
    now,
  });
  const emergency = new EmergencyAccessService({
    grants: patientAccessRepository,
    directory: pgDirectory,
    audit,
    policy: config.emergencyAccess,
    logger,
    now,
  });

  return {
    config,
    logger,
    codec,
    audit,
    decisions,
    grants,
    emergency,
    auth,
    admin,
    app: { codec, auth, decisions, access: { grants, emergency }, admin, logger, now },
    close: closePool,
  };
}
