/**
 * Access Module
 *
 * Patient-level access control: the grant ledger, the decision engine and
 * emergency (break-glass) access.
 *
 * @module access
 */

export type {
  AccessDecision,
  ConsentStore,
  DirectoryStore,
  GrantAccessInput,
  GrantStore,
  ListAccessFilter,
  PageRequest,
} from './types.js';
export {
  AccessDecisionEngine,
  ACCESS_LEVEL_RANK,
  INTERNAL_CONTEXT,
  compareGrantPrivilege,
  consentTypesCovering,
  mostPrivilegedGrant,
  rankOf,
} from './accessDecisionEngine.js';
export type { AccessDecisionEngineDeps } from './accessDecisionEngine.js';
export {
  AccessGrantService,
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  normalizePage,
} from './accessGrantService.js';
export type { AccessGrantServiceDeps } from './accessGrantService.js';
export { EmergencyAccessService } from './emergencyAccessService.js';
export type { EmergencyAccessServiceDeps, EmergencyGrant } from './emergencyAccessService.js';
