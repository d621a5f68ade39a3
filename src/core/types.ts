/**
 * Core Types - Accounts, Identities, Tokens and Collaborator Ports
 *
 * Architectural Rule: src/core/ MUST NOT import from src/stores/ or src/config/.
 * Stores implement the ports declared here; config feeds plain option objects.
 */

// ============================================================================
// Well-known identifiers
// ============================================================================

/** Guest account used whenever nobody is authenticated. */
export const GUEST_ACCOUNT_ID = '712d9ec3-5d2b-4b13-824f-71f00191dcca';

/** Built-in system account (background jobs, migrations). */
export const CORE_SYSTEM_ACCOUNT_ID = 'a37ee56e-3302-4a7b-b67e-ddbea64cd032';

/** Sentinel returned by IdentityRegistry when a user cannot be found. */
export const LOST_USER_ID = '4a515a15-d4d6-4b8e-828e-e0586f18f3a3';

/** Members of this group receive the administrators role. */
export const ADMIN_GROUP_ID = 'cd84e66b-b803-40fc-99f9-b2969a54a1de';

/** Entitlement required for directory-bound (LDAP) users. */
export const DIRECTORY_LOGIN_FEATURE = 'ldap';

// ============================================================================
// Roles
// ============================================================================

export const ROLE_EVERYONE = 'everyone';
export const ROLE_SYSTEM = 'system';
export const ROLE_ADMINISTRATORS = 'administrators';
export const ROLE_USERS = 'users';

export type Role =
  | typeof ROLE_EVERYONE
  | typeof ROLE_SYSTEM
  | typeof ROLE_ADMINISTRATORS
  | typeof ROLE_USERS;

// ============================================================================
// Accounts (tagged union)
// ============================================================================

interface AccountBase {
  readonly id: string;
  readonly tenantId: number;
  readonly displayName: string;
}

export interface UserAccount extends AccountBase {
  readonly kind: 'user';
  readonly authenticated: true;
}

export interface SystemAccount extends AccountBase {
  readonly kind: 'system';
  readonly authenticated: true;
}

export interface AnonymousAccount extends AccountBase {
  readonly kind: 'anonymous';
  readonly authenticated: false;
}

export type Account = UserAccount | SystemAccount | AnonymousAccount;

export function createUserAccount(id: string, tenantId: number, displayName = id): UserAccount {
  const account: UserAccount = { kind: 'user', id, tenantId, displayName, authenticated: true };
  return Object.freeze(account);
}

export function createSystemAccount(
  id: string,
  tenantId: number,
  displayName = 'System'
): SystemAccount {
  const account: SystemAccount = { kind: 'system', id, tenantId, displayName, authenticated: true };
  return Object.freeze(account);
}

export function createAnonymousAccount(tenantId = 0): AnonymousAccount {
  const account: AnonymousAccount = {
    kind: 'anonymous',
    id: GUEST_ACCOUNT_ID,
    tenantId,
    displayName: 'Guest',
    authenticated: false,
  };
  return Object.freeze(account);
}

// ============================================================================
// User records (IdentityRegistry payload)
// ============================================================================

export type UserStatus = 'active' | 'disabled' | 'pending' | 'terminated';

export interface UserRecord {
  id: string;
  tenantId: number;
  displayName: string;
  status: UserStatus;
  /** Set for users provisioned from an external directory (LDAP SID). */
  directorySid?: string;
}

export function createLostUser(tenantId: number): UserRecord {
  return {
    id: LOST_USER_ID,
    tenantId,
    displayName: 'Unknown',
    status: 'terminated',
  };
}

export function isLostUser(user: UserRecord): boolean {
  return user.id === LOST_USER_ID;
}

// ============================================================================
// Current identity
// ============================================================================

export interface CurrentIdentity {
  readonly account: Account;
  readonly roles: readonly Role[];
}

export function hasRole(identity: CurrentIdentity, role: Role): boolean {
  return identity.roles.includes(role);
}

// ============================================================================
// Session token
// ============================================================================

/** Marks a token that never expires (INT64_MAX on the wire). */
export const NEVER_EXPIRES = 'never';

export type TokenExpiry = Date | typeof NEVER_EXPIRES;

export interface SessionTokenFields {
  tenantId: number;
  userId: string;
  tenantGeneration: number;
  userGeneration: number;
  expiresAt: TokenExpiry;
  /** 0 = login event not tracked */
  loginEventId: number;
}

// ============================================================================
// Results
// ============================================================================

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// ============================================================================
// Collaborator ports
// ============================================================================

export interface TenantContext {
  getCurrentTenantId(): number;

  /** Plan entitlement check (e.g. DIRECTORY_LOGIN_FEATURE). */
  hasFeature(tenantId: number, feature: string): Promise<boolean>;
}

export interface IdentityRegistry {
  /** Resolves user or system accounts; unknown ids resolve to the anonymous account. */
  resolveById(tenantId: number, accountId: string): Promise<Account>;

  /** Never throws for "not found": returns the lost-user sentinel instead. */
  resolveByCredential(tenantId: number, login: string, passwordHash: string): Promise<UserRecord>;

  /** Returns the lost-user sentinel when the id is unknown. */
  getUser(tenantId: number, userId: string): Promise<UserRecord>;

  isUserInGroup(tenantId: number, userId: string, groupId: string): Promise<boolean>;

  setPasswordHash(tenantId: number, userId: string, passwordHash: string): Promise<void>;
}

export interface GenerationIndexStore {
  getTenantGeneration(tenantId: number): Promise<number>;
  getUserGeneration(userId: string): Promise<number>;
  incrementTenantGeneration(tenantId: number): Promise<number>;
  incrementUserGeneration(userId: string): Promise<number>;
}

export interface LoginEventStore {
  getValidEventIds(tenantId: number, userId: string): Promise<ReadonlySet<number>>;
  /** Registers a new login event and returns its (non-zero) id. */
  addEvent(tenantId: number, userId: string): Promise<number>;
  removeEvent(tenantId: number, userId: string, eventId: number): Promise<void>;
  removeAllEvents(tenantId: number, userId: string): Promise<void>;
}

/**
 * Supplies a login-event id for the account being signed in.
 * Returning null means "do not track" (encoded as 0).
 */
export type LoginEventFactory = (account: UserAccount) => Promise<number | null> | number | null;

// ============================================================================
// Audit
// ============================================================================

export interface AuditEntry {
  timestamp: Date;

  /** MANDATORY: origin of the entry, e.g. 'auth:session', 'authz:resolver' */
  source: string;

  tenantId?: number;
  userId?: string;
  action: string;
  success: boolean;

  /** Machine-readable reason code for failures (e.g. 'stale_user_generation') */
  reason?: string;
  error?: string;
  metadata?: Record<string, unknown>;
}
