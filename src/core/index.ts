/**
 * Core Module Public API
 */

// ============================================================================
// Services
// ============================================================================

export { SecurityContext, createSecurityContext } from './security-context.js';
export type {
  CoreContext,
  SecurityCollaborators,
  SecurityContextConfig,
} from './security-context.js';

export { AuthenticationService } from './authentication-service.js';
export type {
  AuthenticationResult,
  AuthenticationServiceConfig,
  AuthenticationServiceDependencies,
  CallerContext,
  TokenRejectionReason,
} from './authentication-service.js';

export { TokenCodec } from './token-codec.js';
export type { TokenCodecOptions } from './token-codec.js';

export { GenerationIndex } from './generation-index.js';
export type { GenerationIndexOptions } from './generation-index.js';

export { LoginEventRegistry } from './login-event-registry.js';
export type { LoginEventRegistryOptions } from './login-event-registry.js';

export { IdentityContext, ANONYMOUS_IDENTITY } from './identity-context.js';
export type { SessionState } from './identity-context.js';

export { RoleResolver } from './role-resolver.js';
export type { RoleResolverConfig } from './role-resolver.js';

export { PermissionResolver, InMemoryPolicyStore } from './permission-resolver.js';
export type {
  Action,
  AclEntry,
  PolicyRule,
  PolicyStore,
  ResourceSecurityProvider,
  SecurityObject,
  SecurityObjectId,
} from './permission-resolver.js';

export { AuditService, InMemoryAuditStorage } from './audit-service.js';
export type { AuditServiceConfig, AuditStorage } from './audit-service.js';

export { CoreContextValidator } from './validators.js';

// ============================================================================
// Types
// ============================================================================

export type {
  Account,
  AnonymousAccount,
  AuditEntry,
  CurrentIdentity,
  GenerationIndexStore,
  IdentityRegistry,
  LoginEventFactory,
  LoginEventStore,
  Result,
  Role,
  SessionTokenFields,
  SystemAccount,
  TenantContext,
  TokenExpiry,
  UserAccount,
  UserRecord,
  UserStatus,
} from './types.js';

// ============================================================================
// Constants & helpers
// ============================================================================

export {
  ADMIN_GROUP_ID,
  CORE_SYSTEM_ACCOUNT_ID,
  DIRECTORY_LOGIN_FEATURE,
  GUEST_ACCOUNT_ID,
  LOST_USER_ID,
  NEVER_EXPIRES,
  ROLE_ADMINISTRATORS,
  ROLE_EVERYONE,
  ROLE_SYSTEM,
  ROLE_USERS,
  createAnonymousAccount,
  createLostUser,
  createSystemAccount,
  createUserAccount,
  err,
  hasRole,
  isLostUser,
  ok,
} from './types.js';
