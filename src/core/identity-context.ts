/**
 * Identity Context - Request-Scoped Current Identity
 *
 * The current identity lives in an AsyncLocalStorage slot opened per request,
 * never in a module-level variable, so concurrent requests cannot observe
 * each other's identity.
 *
 * Usage:
 * ```typescript
 * const context = new IdentityContext();
 * await context.run(async () => {
 *   await session.authenticateByToken(cookie);
 *   context.current(); // identity for this request only
 * });
 * ```
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { AuthErrors } from '../utils/errors.js';
import { createAnonymousAccount, ROLE_EVERYONE } from './types.js';
import type { CurrentIdentity, Role } from './types.js';

/**
 * anonymous → authenticating → authenticated | rejected;
 * authenticated → anonymous on logout.
 */
export type SessionState = 'anonymous' | 'authenticating' | 'authenticated' | 'rejected';

interface IdentitySlot {
  identity: CurrentIdentity | null;
  state: SessionState;
}

const anonymousRoles: Role[] = [ROLE_EVERYONE];
Object.freeze(anonymousRoles);

/** Identity seen when nobody has authenticated in the current scope. */
const anonymous: CurrentIdentity = {
  account: createAnonymousAccount(),
  roles: anonymousRoles,
};

export const ANONYMOUS_IDENTITY: CurrentIdentity = Object.freeze(anonymous);

export class IdentityContext {
  private readonly storage = new AsyncLocalStorage<IdentitySlot>();

  /**
   * Run fn inside a fresh request scope. The scope starts anonymous and is
   * discarded when fn settles.
   */
  run<T>(fn: () => T): T {
    return this.storage.run({ identity: null, state: 'anonymous' }, fn);
  }

  isInScope(): boolean {
    return this.storage.getStore() !== undefined;
  }

  /** Current identity, or the anonymous identity outside authentication. */
  current(): CurrentIdentity {
    return this.storage.getStore()?.identity ?? ANONYMOUS_IDENTITY;
  }

  state(): SessionState {
    return this.storage.getStore()?.state ?? 'anonymous';
  }

  /**
   * @throws AuthError NO_REQUEST_SCOPE when called outside run()
   */
  set(identity: CurrentIdentity): void {
    const slot = this.requireSlot();
    slot.identity = identity;
    slot.state = 'authenticated';
  }

  /**
   * Enter 'authenticating'. Any previous identity is dropped so a failed
   * attempt can never leave an earlier identity in place.
   */
  beginAuthentication(): void {
    const slot = this.requireSlot();
    slot.identity = null;
    slot.state = 'authenticating';
  }

  markRejected(): void {
    const slot = this.storage.getStore();
    if (slot) {
      slot.identity = null;
      slot.state = 'rejected';
    }
  }

  /** Reset to anonymous. A no-op outside a request scope. */
  clear(): void {
    const slot = this.storage.getStore();
    if (slot) {
      slot.identity = null;
      slot.state = 'anonymous';
    }
  }

  private requireSlot(): IdentitySlot {
    const slot = this.storage.getStore();
    if (!slot) {
      throw AuthErrors.NO_REQUEST_SCOPE();
    }
    return slot;
  }
}
