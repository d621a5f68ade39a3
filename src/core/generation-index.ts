/**
 * Generation Index - Blanket Token Revocation
 *
 * Every issued token carries the tenant's and the user's generation counter at
 * mint time. Bumping a counter invalidates every older token of that scope
 * without enumerating tokens.
 *
 * Values are read from the store on every call. Nothing is cached: a cached
 * counter would let a revoked token through until the cache expired.
 */

import { withTimeout } from '../utils/timeout.js';
import type { GenerationIndexStore } from './types.js';

export interface GenerationIndexOptions {
  /** Upper bound for a single store call (ms); undefined = no limit */
  lookupTimeoutMs?: number;
}

export class GenerationIndex {
  private readonly store: GenerationIndexStore;
  private readonly lookupTimeoutMs?: number;

  constructor(store: GenerationIndexStore, options: GenerationIndexOptions = {}) {
    this.store = store;
    this.lookupTimeoutMs = options.lookupTimeoutMs;
  }

  tenantGeneration(tenantId: number): Promise<number> {
    return withTimeout(
      this.store.getTenantGeneration(tenantId),
      this.lookupTimeoutMs,
      'GenerationIndex.tenantGeneration'
    );
  }

  userGeneration(userId: string): Promise<number> {
    return withTimeout(
      this.store.getUserGeneration(userId),
      this.lookupTimeoutMs,
      'GenerationIndex.userGeneration'
    );
  }

  /**
   * Invalidate every token issued for the tenant (e.g. cookie secret rotation).
   *
   * @returns The new tenant generation
   */
  async bumpTenant(tenantId: number): Promise<number> {
    const generation = await this.store.incrementTenantGeneration(tenantId);
    console.info('[GenerationIndex] Tenant generation bumped:', { tenantId, generation });
    return generation;
  }

  /**
   * Invalidate every token issued for the user (password change, forced logout).
   *
   * @returns The new user generation
   */
  async bumpUser(userId: string): Promise<number> {
    const generation = await this.store.incrementUserGeneration(userId);
    console.info('[GenerationIndex] User generation bumped:', { userId, generation });
    return generation;
  }
}
