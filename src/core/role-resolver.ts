/**
 * Role Resolver - Identity Assignment Rules
 *
 * Turns an Account into a CurrentIdentity (account + role set), or explains
 * why the account may not become the current identity.
 *
 * Role set:
 * - everyone: always
 * - system: system account matching the configured system id
 * - administrators: user in the admin group
 * - users: every accepted user account
 *
 * POLICY: expected rejections (guest, unknown user, disabled, unlicensed) are
 * returned as a Result, never thrown. Store failures DO propagate so the
 * authentication boundary can log them at error level.
 */

import {
  AccountDisabledError,
  FeatureNotLicensedError,
  InvalidCredentialError,
} from '../utils/errors.js';
import type { IdentityRejection } from '../utils/errors.js';
import { withTimeout } from '../utils/timeout.js';
import {
  ADMIN_GROUP_ID,
  CORE_SYSTEM_ACCOUNT_ID,
  DIRECTORY_LOGIN_FEATURE,
  ROLE_ADMINISTRATORS,
  ROLE_EVERYONE,
  ROLE_SYSTEM,
  ROLE_USERS,
  createUserAccount,
  err,
  isLostUser,
  ok,
} from './types.js';
import type {
  Account,
  CurrentIdentity,
  IdentityRegistry,
  Result,
  Role,
  TenantContext,
  UserAccount,
} from './types.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface RoleResolverConfig {
  /** Account id that receives the system role (default: CORE_SYSTEM_ACCOUNT_ID) */
  systemAccountId?: string;

  /** Group whose members are administrators (default: ADMIN_GROUP_ID) */
  adminGroupId?: string;

  /**
   * Standalone (self-hosted) installs are entitled to every feature,
   * including directory-bound login.
   */
  standalone?: boolean;

  lookupTimeoutMs?: number;
}

// ============================================================================
// Role Resolver Class
// ============================================================================

export class RoleResolver {
  private readonly config: Required<Omit<RoleResolverConfig, 'lookupTimeoutMs'>> &
    Pick<RoleResolverConfig, 'lookupTimeoutMs'>;

  constructor(
    private readonly registry: IdentityRegistry,
    private readonly tenantContext: TenantContext,
    config?: RoleResolverConfig
  ) {
    this.config = {
      systemAccountId: (config?.systemAccountId ?? CORE_SYSTEM_ACCOUNT_ID).toLowerCase(),
      adminGroupId: (config?.adminGroupId ?? ADMIN_GROUP_ID).toLowerCase(),
      standalone: config?.standalone ?? false,
      lookupTimeoutMs: config?.lookupTimeoutMs,
    };
  }

  /**
   * Compute the identity for an account.
   *
   * User accounts are re-read from the registry so status and group changes
   * take effect on the next request; the returned identity carries the
   * registry's display name.
   */
  async resolve(account: Account): Promise<Result<CurrentIdentity, IdentityRejection>> {
    const roles: Role[] = [ROLE_EVERYONE];

    switch (account.kind) {
      case 'anonymous':
        return err(new InvalidCredentialError());

      case 'system':
        if (account.id.toLowerCase() === this.config.systemAccountId) {
          roles.push(ROLE_SYSTEM);
        }
        return ok(this.freeze(account, roles));

      case 'user':
        return this.resolveUser(account, roles);

      default: {
        const unreachable: never = account;
        throw new Error(`Unhandled account kind: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  getConfig(): RoleResolverConfig {
    return { ...this.config };
  }

  private async resolveUser(
    account: UserAccount,
    roles: Role[]
  ): Promise<Result<CurrentIdentity, IdentityRejection>> {
    const tenantId = this.tenantContext.getCurrentTenantId();
    const user = await this.lookup(
      this.registry.getUser(tenantId, account.id),
      'IdentityRegistry.getUser'
    );

    if (isLostUser(user)) {
      return err(new InvalidCredentialError());
    }

    if (user.status !== 'active') {
      return err(new AccountDisabledError(user.id));
    }

    // Directory-bound users need the tenant's plan to include directory login
    if (user.directorySid && !this.config.standalone) {
      const licensed = await this.lookup(
        this.tenantContext.hasFeature(tenantId, DIRECTORY_LOGIN_FEATURE),
        'TenantContext.hasFeature'
      );
      if (!licensed) {
        return err(new FeatureNotLicensedError(DIRECTORY_LOGIN_FEATURE));
      }
    }

    const isAdmin = await this.lookup(
      this.registry.isUserInGroup(tenantId, user.id, this.config.adminGroupId),
      'IdentityRegistry.isUserInGroup'
    );
    if (isAdmin) {
      roles.push(ROLE_ADMINISTRATORS);
    }
    roles.push(ROLE_USERS);

    return ok(this.freeze(createUserAccount(user.id, tenantId, user.displayName), roles));
  }

  private freeze(account: Account, roles: Role[]): CurrentIdentity {
    const identity: CurrentIdentity = { account, roles: Object.freeze([...roles]) };
    return Object.freeze(identity);
  }

  private lookup<T>(promise: Promise<T>, operation: string): Promise<T> {
    return withTimeout(promise, this.config.lookupTimeoutMs, operation);
  }
}
