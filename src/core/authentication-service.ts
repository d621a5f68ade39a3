/**
 * Authentication Service - Session Authentication State Machine
 *
 * Establishes the current identity for a request, either from a session token
 * (cookie) or from credentials, and mints fresh tokens for signed-in users.
 *
 * Coordinates:
 * - Token decoding (TokenCodec)
 * - Liveness checks (GenerationIndex, LoginEventRegistry)
 * - Role computation (RoleResolver)
 * - Request-scoped identity (IdentityContext)
 * - Audit logging (AuditService)
 *
 * CRITICAL POLICIES:
 * - authenticateByToken NEVER throws: every failure is `false` (fail closed)
 * - Raw tokens are never logged; a fingerprint stands in for them
 * - Unknown login and wrong password are indistinguishable to the caller
 * - Source field MUST be 'auth:session' for all audit entries
 */

import {
  AuthErrors,
  PasswordReuseError,
  sanitizeError,
} from '../utils/errors.js';
import type { AuthError, IdentityRejection } from '../utils/errors.js';
import { withTimeout } from '../utils/timeout.js';
import { AuditService } from './audit-service.js';
import type { GenerationIndex } from './generation-index.js';
import type { IdentityContext } from './identity-context.js';
import type { LoginEventRegistry } from './login-event-registry.js';
import type { RoleResolver } from './role-resolver.js';
import { TokenCodec } from './token-codec.js';
import { NEVER_EXPIRES, createUserAccount, err, isLostUser, ok } from './types.js';
import type {
  Account,
  CurrentIdentity,
  IdentityRegistry,
  LoginEventFactory,
  Result,
  SessionTokenFields,
  TenantContext,
  UserAccount,
} from './types.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface AuthenticationServiceConfig {
  /** Lifetime of minted tokens in minutes; 0 = never expires (default: 0) */
  lifetimeMinutes?: number;

  /** Upper bound for a single registry call (ms); undefined = no limit */
  lookupTimeoutMs?: number;

  /** Clock in epoch milliseconds (default: Date.now) */
  now?: () => number;
}

export interface AuthenticationServiceDependencies {
  codec: TokenCodec;
  generations: GenerationIndex;
  loginEvents: LoginEventRegistry;
  roleResolver: RoleResolver;
  identityContext: IdentityContext;
  tenantContext: TenantContext;
  identityRegistry: IdentityRegistry;

  /** Optional audit service (Null Object Pattern if not provided) */
  auditService?: AuditService;
}

/** Request details used for log context only. */
export interface CallerContext {
  ipAddress?: string;
  url?: string;
}

/**
 * Why a token was refused. Logged and audited, never returned to the caller.
 */
export type TokenRejectionReason =
  | 'decode_failed'
  | 'tenant_mismatch'
  | 'stale_tenant_generation'
  | 'expired'
  | 'stale_user_generation'
  | 'revoked_login_event'
  | 'identity_rejected'
  | 'internal_error';

export type AuthenticationResult =
  | {
      success: true;
      identity: CurrentIdentity;
      /** Fresh session token; null for system accounts */
      token: string | null;
    }
  | {
      success: false;
      /** An IdentityRejection, or AUTHENTICATION_UNAVAILABLE on internal failure */
      error: IdentityRejection | AuthError;
    };

const AUDIT_SOURCE = 'auth:session';
const MS_PER_MINUTE = 60_000;

// ============================================================================
// Authentication Service Class
// ============================================================================

/**
 * Authentication Service - per-request session authentication
 *
 * Token flow:
 * 1. Empty or bearer sentinel → false
 * 2. Decode (integrity + version)
 * 3. Tenant must match the current tenant
 * 4. Tenant generation, expiry, user generation, login event must be live
 * 5. Role computation → current identity
 *
 * Usage:
 * ```typescript
 * const auth = new AuthenticationService(deps, { lifetimeMinutes: 60 });
 * await identityContext.run(async () => {
 *   if (await auth.authenticateByToken(cookie, { ipAddress })) {
 *     identityContext.current(); // authenticated identity
 *   }
 * });
 * ```
 */
export class AuthenticationService {
  private readonly codec: TokenCodec;
  private readonly generations: GenerationIndex;
  private readonly loginEvents: LoginEventRegistry;
  private readonly roleResolver: RoleResolver;
  private readonly identityContext: IdentityContext;
  private readonly tenantContext: TenantContext;
  private readonly identityRegistry: IdentityRegistry;
  private readonly auditService: AuditService;
  private readonly lifetimeMinutes: number;
  private readonly lookupTimeoutMs?: number;
  private readonly now: () => number;

  constructor(deps: AuthenticationServiceDependencies, config: AuthenticationServiceConfig = {}) {
    this.codec = deps.codec;
    this.generations = deps.generations;
    this.loginEvents = deps.loginEvents;
    this.roleResolver = deps.roleResolver;
    this.identityContext = deps.identityContext;
    this.tenantContext = deps.tenantContext;
    this.identityRegistry = deps.identityRegistry;
    this.auditService = deps.auditService ?? new AuditService(); // Null Object Pattern
    this.lifetimeMinutes = config.lifetimeMinutes ?? 0;
    this.lookupTimeoutMs = config.lookupTimeoutMs;
    this.now = config.now ?? Date.now;

    if (!Number.isInteger(this.lifetimeMinutes) || this.lifetimeMinutes < 0) {
      throw AuthErrors.CONFIGURATION_ERROR('lifetimeMinutes must be a non-negative integer');
    }
  }

  // ==========================================================================
  // Token authentication
  // ==========================================================================

  /**
   * Authenticate the current request from a session token.
   *
   * Returns true only when the token is intact, belongs to the current tenant,
   * is live on every revocation axis, and its user may hold an identity.
   */
  async authenticateByToken(
    raw: string | null | undefined,
    caller: CallerContext = {}
  ): Promise<boolean> {
    if (!raw) {
      return false;
    }

    if (this.codec.isBearerSentinel(raw)) {
      // Header-based auth is in use; not a failure
      console.info('[AuthenticationService] Bearer sentinel received, skipping cookie auth:', caller);
      return false;
    }

    const fingerprint = TokenCodec.fingerprint(raw);

    try {
      this.identityContext.beginAuthentication();

      const decoded = this.codec.decode(raw);
      if (!decoded.ok) {
        console.warn('[AuthenticationService] Cannot decode session token:', {
          token: fingerprint,
          reason: decoded.error.reason,
          ...caller,
        });
        await this.rejectToken('decode_failed', fingerprint, undefined, decoded.error.reason);
        return false;
      }

      const fields = decoded.value;
      const stale = await this.checkLiveness(fields);
      if (stale) {
        console.debug('[AuthenticationService] Session token refused:', {
          token: fingerprint,
          tenantId: fields.tenantId,
          userId: fields.userId,
          reason: stale,
        });
        await this.rejectToken(stale, fingerprint, fields);
        return false;
      }

      const assigned = await this.assignIdentity(createUserAccount(fields.userId, fields.tenantId));
      if (!assigned.ok) {
        console.debug('[AuthenticationService] Token user may not sign in:', {
          token: fingerprint,
          tenantId: fields.tenantId,
          userId: fields.userId,
          code: assigned.error.code,
        });
        await this.rejectToken('identity_rejected', fingerprint, fields, assigned.error.code);
        return false;
      }

      await this.auditService.log({
        timestamp: new Date(this.now()),
        source: AUDIT_SOURCE,
        tenantId: fields.tenantId,
        userId: fields.userId,
        action: 'authenticate_token',
        success: true,
        metadata: { token: fingerprint },
      });
      return true;
    } catch (error) {
      this.identityContext.markRejected();
      console.error('[AuthenticationService] Token authentication failed:', {
        token: fingerprint,
        ...caller,
        error: sanitizeError(error),
      });
      await this.auditFailureQuietly('authenticate_token', 'internal_error', { token: fingerprint });
      return false;
    }
  }

  // ==========================================================================
  // Credential / id authentication
  // ==========================================================================

  /**
   * Sign in with login and password hash. Unknown login and wrong password
   * both resolve to the lost-user sentinel and fail with the same
   * InvalidCredentialError.
   */
  async authenticateByCredential(
    login: string,
    passwordHash: string,
    loginEventFactory?: LoginEventFactory
  ): Promise<AuthenticationResult> {
    const resolveAccount = async (tenantId: number): Promise<Account> => {
      const user = await this.lookup(
        this.identityRegistry.resolveByCredential(tenantId, login, passwordHash),
        'IdentityRegistry.resolveByCredential'
      );
      return createUserAccount(user.id, tenantId, user.displayName);
    };

    return this.signIn('authenticate_credential', { login }, resolveAccount, loginEventFactory);
  }

  /**
   * Sign in as a known account id (user or system), e.g. after an external
   * identity provider has vouched for the user.
   */
  async authenticateByUserId(
    userId: string,
    loginEventFactory?: LoginEventFactory
  ): Promise<AuthenticationResult> {
    const resolveAccount = (tenantId: number): Promise<Account> =>
      this.lookup(this.identityRegistry.resolveById(tenantId, userId), 'IdentityRegistry.resolveById');

    return this.signIn('authenticate_user_id', { accountId: userId }, resolveAccount, loginEventFactory);
  }

  /**
   * Compute the identity for an account and make it current. On rejection the
   * current identity is left anonymous.
   *
   * @throws AuthError NO_REQUEST_SCOPE outside a request scope
   */
  async assignIdentity(account: Account): Promise<Result<CurrentIdentity, IdentityRejection>> {
    const resolved = await this.roleResolver.resolve(account);
    if (!resolved.ok) {
      this.identityContext.markRejected();
      return resolved;
    }

    this.identityContext.set(resolved.value);
    return resolved;
  }

  logout(): void {
    const identity = this.identityContext.current();
    this.identityContext.clear();
    console.info('[AuthenticationService] Logged out:', {
      tenantId: identity.account.tenantId,
      accountId: identity.account.id,
    });
  }

  // ==========================================================================
  // Password change and revocation
  // ==========================================================================

  /**
   * Store a new password hash and invalidate every outstanding token of the
   * user. The new hash must differ from the current one.
   *
   * @returns The new user generation
   */
  async changePassword(
    userId: string,
    passwordHash: string
  ): Promise<Result<number, PasswordReuseError>> {
    const tenantId = this.tenantContext.getCurrentTenantId();
    const current = await this.lookup(
      this.identityRegistry.resolveByCredential(tenantId, userId, passwordHash),
      'IdentityRegistry.resolveByCredential'
    );

    if (!isLostUser(current)) {
      await this.auditFailureQuietly('change_password', 'password_reuse', { userId });
      return err(new PasswordReuseError());
    }

    await this.identityRegistry.setPasswordHash(tenantId, userId, passwordHash);
    const generation = await this.generations.bumpUser(userId);

    await this.auditService.log({
      timestamp: new Date(this.now()),
      source: AUDIT_SOURCE,
      tenantId,
      userId,
      action: 'change_password',
      success: true,
    });
    return ok(generation);
  }

  /** Invalidate every token of the user on every device. */
  async logoutAllSessions(userId: string): Promise<void> {
    const tenantId = this.tenantContext.getCurrentTenantId();
    await this.generations.bumpUser(userId);
    await this.loginEvents.revokeAll(tenantId, userId);
    await this.auditRevocation('logout_all_sessions', tenantId, userId);
  }

  /** Invalidate every token issued for the current tenant. */
  async resetTenantSessions(): Promise<void> {
    const tenantId = this.tenantContext.getCurrentTenantId();
    await this.generations.bumpTenant(tenantId);
    await this.auditRevocation('reset_tenant_sessions', tenantId);
  }

  /** Sign out one device; the user's other sessions stay valid. */
  async revokeLoginEvent(userId: string, loginEventId: number): Promise<void> {
    const tenantId = this.tenantContext.getCurrentTenantId();
    await this.loginEvents.revoke(tenantId, userId, loginEventId);
    await this.auditRevocation('revoke_login_event', tenantId, userId, { loginEventId });
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  /**
   * Checks in order: tenant, tenant generation, expiry, user generation,
   * login event. Returns the first failing check, or null when live.
   */
  private async checkLiveness(fields: SessionTokenFields): Promise<TokenRejectionReason | null> {
    if (fields.tenantId !== this.tenantContext.getCurrentTenantId()) {
      return 'tenant_mismatch';
    }

    if (fields.tenantGeneration !== (await this.generations.tenantGeneration(fields.tenantId))) {
      return 'stale_tenant_generation';
    }

    if (fields.expiresAt !== NEVER_EXPIRES && fields.expiresAt.getTime() < this.now()) {
      return 'expired';
    }

    if (fields.userGeneration !== (await this.generations.userGeneration(fields.userId))) {
      return 'stale_user_generation';
    }

    if (!(await this.loginEvents.isValid(fields.tenantId, fields.userId, fields.loginEventId))) {
      return 'revoked_login_event';
    }

    return null;
  }

  private async signIn(
    action: string,
    metadata: Record<string, unknown>,
    resolveAccount: (tenantId: number) => Promise<Account>,
    loginEventFactory?: LoginEventFactory
  ): Promise<AuthenticationResult> {
    let tenantId: number | undefined;
    let issued: { account: UserAccount; loginEventId: number } | undefined;

    try {
      this.identityContext.beginAuthentication();
      tenantId = this.tenantContext.getCurrentTenantId();

      const account = await resolveAccount(tenantId);
      const assigned = await this.assignIdentity(account);

      if (!assigned.ok) {
        console.debug('[AuthenticationService] Sign-in rejected:', {
          tenantId,
          code: assigned.error.code,
        });
        await this.auditService.log({
          timestamp: new Date(this.now()),
          source: AUDIT_SOURCE,
          tenantId,
          action,
          success: false,
          reason: assigned.error.code,
          metadata,
        });
        return { success: false, error: assigned.error };
      }

      const identity = assigned.value;
      let token: string | null = null;
      if (identity.account.kind === 'user') {
        const loginEventId =
          (loginEventFactory ? await loginEventFactory(identity.account) : null) ?? 0;
        issued = { account: identity.account, loginEventId };
        token = await this.mintToken(identity.account, loginEventId);
      }

      await this.auditService.log({
        timestamp: new Date(this.now()),
        source: AUDIT_SOURCE,
        tenantId,
        userId: identity.account.id,
        action,
        success: true,
        metadata,
      });
      return { success: true, identity, token };
    } catch (error) {
      this.identityContext.markRejected();
      console.error('[AuthenticationService] Sign-in failed:', {
        tenantId,
        action,
        error: sanitizeError(error),
      });
      if (tenantId !== undefined && issued && issued.loginEventId !== 0) {
        await this.revokeUnissuedLoginEvent(tenantId, issued.account.id, issued.loginEventId);
      }
      await this.auditFailureQuietly(action, 'internal_error', metadata);
      return { success: false, error: AuthErrors.AUTHENTICATION_UNAVAILABLE() };
    }
  }

  /**
   * Encode a fresh token for the user, carrying the generations read now.
   */
  private async mintToken(account: UserAccount, loginEventId: number): Promise<string> {
    const tenantId = this.tenantContext.getCurrentTenantId();

    const [tenantGeneration, userGeneration] = await Promise.all([
      this.generations.tenantGeneration(tenantId),
      this.generations.userGeneration(account.id),
    ]);

    const expiresAt =
      this.lifetimeMinutes === 0
        ? NEVER_EXPIRES
        : new Date(this.now() + this.lifetimeMinutes * MS_PER_MINUTE);

    return this.codec.encode({
      tenantId,
      userId: account.id,
      tenantGeneration,
      userGeneration,
      expiresAt,
      loginEventId,
    });
  }

  private async rejectToken(
    reason: TokenRejectionReason,
    fingerprint: string,
    fields?: SessionTokenFields,
    detail?: string
  ): Promise<void> {
    this.identityContext.markRejected();
    await this.auditService.log({
      timestamp: new Date(this.now()),
      source: AUDIT_SOURCE,
      tenantId: fields?.tenantId,
      userId: fields?.userId,
      action: 'authenticate_token',
      success: false,
      reason,
      error: detail,
      metadata: { token: fingerprint },
    });
  }

  private async auditRevocation(
    action: string,
    tenantId: number,
    userId?: string,
    metadata?: Record<string, unknown>
  ): Promise<void> {
    await this.auditService.log({
      timestamp: new Date(this.now()),
      source: AUDIT_SOURCE,
      tenantId,
      userId,
      action,
      success: true,
      metadata,
    });
  }

  /**
   * Remove a login event registered for a sign-in that never handed out its
   * token. A store error here is logged; the sign-in already failed.
   */
  private async revokeUnissuedLoginEvent(
    tenantId: number,
    userId: string,
    loginEventId: number
  ): Promise<void> {
    try {
      await this.loginEvents.revoke(tenantId, userId, loginEventId);
    } catch (revokeError) {
      console.error('[AuthenticationService] Could not revoke unissued login event:', {
        tenantId,
        userId,
        loginEventId,
        error: sanitizeError(revokeError),
      });
    }
  }

  /**
   * Audit from a failure path. An audit backend error must not turn a
   * rejection into an exception, so it is logged instead.
   */
  private async auditFailureQuietly(
    action: string,
    reason: string,
    metadata?: Record<string, unknown>
  ): Promise<void> {
    try {
      await this.auditService.log({
        timestamp: new Date(this.now()),
        source: AUDIT_SOURCE,
        action,
        success: false,
        reason,
        metadata,
      });
    } catch (auditError) {
      console.error('[AuthenticationService] Audit write failed:', {
        action,
        error: sanitizeError(auditError),
      });
    }
  }

  private lookup<T>(promise: Promise<T>, operation: string): Promise<T> {
    return withTimeout(promise, this.lookupTimeoutMs, operation);
  }
}
