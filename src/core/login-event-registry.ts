/**
 * Login Event Registry - Per-Session Revocation
 *
 * A token minted with a non-zero loginEventId stays valid only while that id
 * is in the user's set of valid login events. Removing one id signs out one
 * device; the user's other sessions keep working.
 */

import { withTimeout } from '../utils/timeout.js';
import type { LoginEventFactory, LoginEventStore } from './types.js';

export interface LoginEventRegistryOptions {
  lookupTimeoutMs?: number;
}

export class LoginEventRegistry {
  private readonly store: LoginEventStore;
  private readonly lookupTimeoutMs?: number;

  constructor(store: LoginEventStore, options: LoginEventRegistryOptions = {}) {
    this.store = store;
    this.lookupTimeoutMs = options.lookupTimeoutMs;
  }

  /**
   * Check membership. loginEventId 0 means "not tracked" and is always valid.
   */
  async isValid(tenantId: number, userId: string, loginEventId: number): Promise<boolean> {
    if (loginEventId === 0) {
      return true;
    }

    const validIds = await withTimeout(
      this.store.getValidEventIds(tenantId, userId),
      this.lookupTimeoutMs,
      'LoginEventRegistry.getValidEventIds'
    );
    return validIds.has(loginEventId);
  }

  async register(tenantId: number, userId: string): Promise<number> {
    const eventId = await this.store.addEvent(tenantId, userId);
    if (!Number.isInteger(eventId) || eventId === 0) {
      throw new Error(`LoginEventStore returned an invalid event id: ${eventId}`);
    }
    return eventId;
  }

  async revoke(tenantId: number, userId: string, loginEventId: number): Promise<void> {
    await this.store.removeEvent(tenantId, userId, loginEventId);
    console.info('[LoginEventRegistry] Login event revoked:', { tenantId, userId, loginEventId });
  }

  async revokeAll(tenantId: number, userId: string): Promise<void> {
    await this.store.removeAllEvents(tenantId, userId);
    console.info('[LoginEventRegistry] All login events revoked:', { tenantId, userId });
  }

  /**
   * Factory for authenticateByCredential / authenticateByUserId that registers
   * a fresh login event for the account being signed in.
   */
  createFactory(): LoginEventFactory {
    return (account) => this.register(account.tenantId, account.id);
  }
}
