/**
 * Audit Service - Security Event Trail (Null Object Pattern)
 *
 * Records authentication attempts, token rejections, permission denials and
 * revocations. Disabled by default: an unconfigured service accepts entries and
 * drops them, so callers never need to null-check it.
 *
 * Every entry MUST carry a source (e.g. 'auth:session', 'authz:resolver').
 */

import type { AuditEntry } from './types.js';

// ============================================================================
// Interfaces
// ============================================================================

export interface AuditServiceConfig {
  /** Whether audit logging is enabled (default: false) */
  enabled?: boolean;

  /** Record successful attempts too, not just failures (default: true) */
  logAllAttempts?: boolean;

  /** Custom storage implementation (default: InMemoryAuditStorage) */
  storage?: AuditStorage;

  /** Capacity of the default in-memory storage (default: 10000) */
  maxEntries?: number;

  /** Invoked with a snapshot when the in-memory storage overflows */
  onOverflow?: (entries: AuditEntry[]) => void;
}

/**
 * Write-only storage. Querying belongs to an indexed backend, not this API.
 */
export interface AuditStorage {
  log(entry: AuditEntry): Promise<void> | void;
}

// ============================================================================
// In-Memory Storage Implementation
// ============================================================================

export class InMemoryAuditStorage implements AuditStorage {
  private entries: AuditEntry[] = [];
  private readonly maxEntries: number;
  private readonly onOverflow?: (entries: AuditEntry[]) => void;

  constructor(maxEntries: number = 10000, onOverflow?: (entries: AuditEntry[]) => void) {
    this.maxEntries = maxEntries;
    this.onOverflow = onOverflow;
  }

  log(entry: AuditEntry): void {
    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      this.onOverflow?.([...this.entries]);
      this.entries.shift();
    }
  }

  /** @internal test helper */
  getEntries(): AuditEntry[] {
    return [...this.entries];
  }

  /** @internal test helper */
  clear(): void {
    this.entries = [];
  }
}

// ============================================================================
// Audit Service
// ============================================================================

export class AuditService {
  private readonly enabled: boolean;
  private readonly logAllAttempts: boolean;
  private readonly storage: AuditStorage;

  constructor(config?: AuditServiceConfig) {
    this.enabled = config?.enabled ?? false;
    this.logAllAttempts = config?.logAllAttempts ?? true;
    this.storage =
      config?.storage ?? new InMemoryAuditStorage(config?.maxEntries ?? 10000, config?.onOverflow);
  }

  /**
   * Record an entry.
   *
   * @throws Error if the entry has no source
   */
  async log(entry: AuditEntry): Promise<void> {
    if (!this.enabled) {
      return;
    }

    if (!entry.source) {
      throw new Error('AuditEntry missing required field: source');
    }

    if (entry.success && !this.logAllAttempts) {
      return;
    }

    await this.storage.log(entry);
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /** @internal */
  _getStorage(): AuditStorage {
    return this.storage;
  }
}
