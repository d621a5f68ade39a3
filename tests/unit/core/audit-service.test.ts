/**
 * AuditService Tests
 *
 * Null Object behaviour, success filtering and in-memory overflow handling.
 */

import { describe, it, expect, vi } from 'vitest';
import { AuditService, InMemoryAuditStorage } from '../../../src/core/audit-service.js';
import type { AuditStorage } from '../../../src/core/audit-service.js';
import type { AuditEntry } from '../../../src/core/types.js';

function entry(overrides: Partial<AuditEntry> = {}): AuditEntry {
  return {
    timestamp: new Date('2026-03-01T12:00:00.000Z'),
    source: 'auth:session',
    tenantId: 7,
    userId: '3f2b8c1e-9d4a-4e6f-8b7c-1a2b3c4d5e6f',
    action: 'authenticate_token',
    success: false,
    reason: 'expired',
    ...overrides,
  };
}

describe('AuditService', () => {
  describe('Null Object Pattern', () => {
    it('should accept entries without configuration', async () => {
      const audit = new AuditService();

      await expect(audit.log(entry())).resolves.toBeUndefined();
      expect(audit.isEnabled()).toBe(false);
    });

    it('should not reach storage when disabled', async () => {
      const storage = new InMemoryAuditStorage();
      const audit = new AuditService({ enabled: false, storage });

      await audit.log(entry());

      expect(storage.getEntries()).toHaveLength(0);
    });

    it('should not validate entries when disabled', async () => {
      const audit = new AuditService();

      await expect(audit.log(entry({ source: '' }))).resolves.toBeUndefined();
    });
  });

  describe('Enabled', () => {
    it('should store the entry as given', async () => {
      const storage = new InMemoryAuditStorage();
      const audit = new AuditService({ enabled: true, storage });

      await audit.log(entry());

      expect(storage.getEntries()).toEqual([entry()]);
    });

    it('should require a source', async () => {
      const audit = new AuditService({ enabled: true });

      await expect(audit.log(entry({ source: '' }))).rejects.toThrow(
        'AuditEntry missing required field: source'
      );
    });

    it('should drop successful attempts when logAllAttempts is false', async () => {
      const storage = new InMemoryAuditStorage();
      const audit = new AuditService({ enabled: true, logAllAttempts: false, storage });

      await audit.log(entry({ success: true, reason: undefined }));
      await audit.log(entry({ reason: 'revoked_login_event' }));

      expect(storage.getEntries().map((e) => e.reason)).toEqual(['revoked_login_event']);
    });

    it('should await asynchronous storage', async () => {
      const written: AuditEntry[] = [];
      const storage: AuditStorage = {
        log: async (e) => {
          await Promise.resolve();
          written.push(e);
        },
      };
      const audit = new AuditService({ enabled: true, storage });

      await audit.log(entry());

      expect(written).toHaveLength(1);
    });

    it('should propagate storage failures', async () => {
      const storage: AuditStorage = {
        log: () => {
          throw new Error('disk full');
        },
      };
      const audit = new AuditService({ enabled: true, storage });

      await expect(audit.log(entry())).rejects.toThrow('disk full');
    });
  });

  describe('InMemoryAuditStorage', () => {
    it('should keep the newest entries up to capacity', () => {
      const storage = new InMemoryAuditStorage(2);

      storage.log(entry({ action: 'a' }));
      storage.log(entry({ action: 'b' }));
      storage.log(entry({ action: 'c' }));

      expect(storage.getEntries().map((e) => e.action)).toEqual(['b', 'c']);
    });

    it('should hand a full snapshot to onOverflow before evicting', () => {
      const onOverflow = vi.fn();
      const storage = new InMemoryAuditStorage(2, onOverflow);

      storage.log(entry({ action: 'a' }));
      storage.log(entry({ action: 'b' }));
      expect(onOverflow).not.toHaveBeenCalled();

      storage.log(entry({ action: 'c' }));

      expect(onOverflow).toHaveBeenCalledTimes(1);
      expect(onOverflow.mock.calls[0][0].map((e: AuditEntry) => e.action)).toEqual(['a', 'b', 'c']);
    });

    it('should wire maxEntries and onOverflow through the service config', async () => {
      const onOverflow = vi.fn();
      const audit = new AuditService({ enabled: true, maxEntries: 1, onOverflow });

      await audit.log(entry());
      await audit.log(entry());

      expect(onOverflow).toHaveBeenCalledTimes(1);
    });

    it('should return copies from getEntries', () => {
      const storage = new InMemoryAuditStorage();
      storage.log(entry());

      storage.getEntries().pop();

      expect(storage.getEntries()).toHaveLength(1);
    });

    it('should empty on clear', () => {
      const storage = new InMemoryAuditStorage();
      storage.log(entry());

      storage.clear();

      expect(storage.getEntries()).toEqual([]);
    });
  });
});
