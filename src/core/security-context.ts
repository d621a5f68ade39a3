/**
 * Security Context - Outbound Facade
 *
 * The single surface request handlers talk to: open a request scope,
 * authenticate, read the current identity and check permissions.
 *
 * Usage:
 * ```typescript
 * const security = createSecurityContext(config, {
 *   tenantContext,
 *   identityRegistry,
 *   generationStore,
 *   loginEventStore,
 * });
 *
 * await security.runInRequestScope(async () => {
 *   await security.authenticateByToken(req.cookies.session, { ipAddress: req.ip });
 *   await security.demandPermissions(['project:edit'], project);
 * });
 * ```
 */

import { AccessDeniedError, sanitizeError } from '../utils/errors.js';
import type { IdentityRejection, PasswordReuseError } from '../utils/errors.js';
import { AuditService } from './audit-service.js';
import type { AuditServiceConfig } from './audit-service.js';
import { AuthenticationService } from './authentication-service.js';
import type { AuthenticationResult, CallerContext } from './authentication-service.js';
import { GenerationIndex } from './generation-index.js';
import { IdentityContext } from './identity-context.js';
import type { SessionState } from './identity-context.js';
import { LoginEventRegistry } from './login-event-registry.js';
import { InMemoryPolicyStore, PermissionResolver } from './permission-resolver.js';
import type {
  Action,
  PolicyRule,
  PolicyStore,
  ResourceSecurityProvider,
  SecurityObject,
} from './permission-resolver.js';
import { RoleResolver } from './role-resolver.js';
import { TokenCodec } from './token-codec.js';
import type {
  Account,
  CurrentIdentity,
  GenerationIndexStore,
  IdentityRegistry,
  LoginEventFactory,
  LoginEventStore,
  Result,
  TenantContext,
} from './types.js';
import { CoreContextValidator } from './validators.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Structurally compatible with the validated configuration file
 * (see AuthCoreConfig), so a ConfigManager result can be passed directly.
 */
export interface SecurityContextConfig {
  token: {
    secret: string;
    /** 0 = tokens never expire */
    lifetimeMinutes?: number;
    bearerSentinel?: string;
  };

  identity?: {
    systemAccountId?: string;
    adminGroupId?: string;
    standalone?: boolean;
  };

  lookupTimeoutMs?: number;

  audit?: AuditServiceConfig;

  authorization?: {
    rules: readonly PolicyRule[];
  };

  /** Clock in epoch milliseconds (default: Date.now) */
  now?: () => number;
}

/** Host-supplied ports. */
export interface SecurityCollaborators {
  tenantContext: TenantContext;
  identityRegistry: IdentityRegistry;
  generationStore: GenerationIndexStore;
  loginEventStore: LoginEventStore;

  /** Defaults to an in-memory store seeded from config.authorization.rules */
  policyStore?: PolicyStore;

  /** Defaults to an AuditService built from config.audit */
  auditService?: AuditService;
}

/**
 * Every service a SecurityContext delegates to, built once per process.
 */
export interface CoreContext {
  authService: AuthenticationService;
  permissionResolver: PermissionResolver;
  identityContext: IdentityContext;
  generations: GenerationIndex;
  loginEvents: LoginEventRegistry;
  auditService: AuditService;
}

const AUDIT_SOURCE = 'authz:resolver';

// ============================================================================
// Security Context Class
// ============================================================================

export class SecurityContext {
  constructor(private readonly core: CoreContext) {
    CoreContextValidator.validate(core);
  }

  /**
   * Run fn in a fresh request scope. Authentication inside fn is visible only
   * to code running within the same scope.
   */
  runInRequestScope<T>(fn: () => T): T {
    return this.core.identityContext.run(fn);
  }

  authenticateByToken(raw: string | null | undefined, caller?: CallerContext): Promise<boolean> {
    return this.core.authService.authenticateByToken(raw, caller);
  }

  authenticateByCredential(
    login: string,
    passwordHash: string,
    loginEventFactory?: LoginEventFactory
  ): Promise<AuthenticationResult> {
    return this.core.authService.authenticateByCredential(login, passwordHash, loginEventFactory);
  }

  authenticateByUserId(
    userId: string,
    loginEventFactory?: LoginEventFactory
  ): Promise<AuthenticationResult> {
    return this.core.authService.authenticateByUserId(userId, loginEventFactory);
  }

  /** Switch the current identity to another account (e.g. impersonation by a system task). */
  assignIdentity(account: Account): Promise<Result<CurrentIdentity, IdentityRejection>> {
    return this.core.authService.assignIdentity(account);
  }

  logout(): void {
    this.core.authService.logout();
  }

  /** Anonymous identity outside a request scope or before authentication. */
  get currentIdentity(): CurrentIdentity {
    return this.core.identityContext.current();
  }

  get isAuthenticated(): boolean {
    return this.currentIdentity.account.authenticated;
  }

  get sessionState(): SessionState {
    return this.core.identityContext.state();
  }

  checkPermissions(
    actions: readonly Action[],
    resource?: SecurityObject,
    provider?: ResourceSecurityProvider
  ): boolean {
    return this.core.permissionResolver.check(this.currentIdentity, actions, resource, provider);
  }

  /**
   * @throws AccessDeniedError when the current identity lacks any of the actions
   */
  async demandPermissions(
    actions: readonly Action[],
    resource?: SecurityObject,
    provider?: ResourceSecurityProvider
  ): Promise<void> {
    const identity = this.currentIdentity;
    try {
      this.core.permissionResolver.demand(identity, actions, resource, provider);
    } catch (error) {
      if (error instanceof AccessDeniedError) {
        await this.auditDenial(identity, actions, error);
      }
      throw error;
    }
  }

  /** The denial stays the caller's error even when the audit backend fails. */
  private async auditDenial(
    identity: CurrentIdentity,
    actions: readonly Action[],
    denial: AccessDeniedError
  ): Promise<void> {
    try {
      await this.core.auditService.log({
        timestamp: new Date(),
        source: AUDIT_SOURCE,
        tenantId: identity.account.tenantId,
        userId: identity.account.id,
        action: 'demand_permissions',
        success: false,
        reason: denial.code,
        metadata: { actions: [...actions], resource: denial.resource },
      });
    } catch (auditError) {
      console.error('[SecurityContext] Audit write failed:', {
        action: 'demand_permissions',
        error: sanitizeError(auditError),
      });
    }
  }

  changePassword(userId: string, passwordHash: string): Promise<Result<number, PasswordReuseError>> {
    return this.core.authService.changePassword(userId, passwordHash);
  }

  logoutAllSessions(userId: string): Promise<void> {
    return this.core.authService.logoutAllSessions(userId);
  }

  resetTenantSessions(): Promise<void> {
    return this.core.authService.resetTenantSessions();
  }

  revokeLoginEvent(userId: string, loginEventId: number): Promise<void> {
    return this.core.authService.revokeLoginEvent(userId, loginEventId);
  }

  /** Factory that records a login event for each sign-in, enabling per-device logout. */
  createLoginEventFactory(): LoginEventFactory {
    return this.core.loginEvents.createFactory();
  }

  /** @internal */
  _getCoreContext(): CoreContext {
    return this.core;
  }
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Wire a SecurityContext from configuration and host-supplied ports.
 *
 * @throws AuthError CONFIGURATION_ERROR on an unusable token secret or lifetime
 */
export function createSecurityContext(
  config: SecurityContextConfig,
  collaborators: SecurityCollaborators
): SecurityContext {
  const lookupTimeoutMs = config.lookupTimeoutMs;

  const identityContext = new IdentityContext();
  const generations = new GenerationIndex(collaborators.generationStore, { lookupTimeoutMs });
  const loginEvents = new LoginEventRegistry(collaborators.loginEventStore, { lookupTimeoutMs });
  const auditService = collaborators.auditService ?? new AuditService(config.audit);
  const policyStore =
    collaborators.policyStore ?? new InMemoryPolicyStore(config.authorization?.rules ?? []);

  const roleResolver = new RoleResolver(collaborators.identityRegistry, collaborators.tenantContext, {
    ...config.identity,
    lookupTimeoutMs,
  });

  const authService = new AuthenticationService(
    {
      codec: new TokenCodec({
        secret: config.token.secret,
        bearerSentinel: config.token.bearerSentinel,
      }),
      generations,
      loginEvents,
      roleResolver,
      identityContext,
      tenantContext: collaborators.tenantContext,
      identityRegistry: collaborators.identityRegistry,
      auditService,
    },
    {
      lifetimeMinutes: config.token.lifetimeMinutes,
      lookupTimeoutMs,
      now: config.now,
    }
  );

  return new SecurityContext({
    authService,
    permissionResolver: new PermissionResolver(policyStore),
    identityContext,
    generations,
    loginEvents,
    auditService,
  });
}
